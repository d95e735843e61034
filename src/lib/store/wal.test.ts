import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NOW_ISO, makeSession, testUuid } from "../engine/test-utils";
import type { MicrodoseSession } from "../engine/types";
import { SerializationError } from "../errors";
import { toSessionRecord } from "../validation";
import { appendSession, parseWalContents, readSessions } from "./wal";

let dir: string;
let walPath: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "microdose-wal-"));
  walPath = path.join(dir, "wal", "microdose_sessions.wal");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function recordLine(session: MicrodoseSession): string {
  return JSON.stringify(toSessionRecord(session));
}

describe("appendSession / readSessions", () => {
  it("round-trips sessions in append order", async () => {
    const full = makeSession({
      id: testUuid(101),
      definitionId: "emom_burpee_5m",
      performedAt: new Date(NOW_ISO),
      startedAt: new Date("2026-02-11T11:55:00.000Z"),
      completedAt: new Date("2026-02-11T12:00:00.000Z"),
      actualDurationSeconds: 300,
      metricsRealized: [{ type: "reps", key: "reps", default: 4, min: 2, max: 10, step: 1, progressable: true }],
      perceivedRpe: 7,
      avgHr: 141,
      maxHr: 163,
    });
    const minimal = makeSession({ id: testUuid(102), definitionId: "mobility_hip_cars" });

    await appendSession(walPath, full);
    await appendSession(walPath, minimal);

    expect(await readSessions(walPath)).toEqual([full, minimal]);
  });

  it("writes one snake_case JSON line per session", async () => {
    const session = makeSession({ id: testUuid(103), definitionId: "gtg_pullup_band" });
    await appendSession(walPath, session);

    const contents = await readFile(walPath, "utf8");
    expect(contents).toBe(
      `{"id":"${testUuid(103)}","definition_id":"gtg_pullup_band","performed_at":"${NOW_ISO}",` +
        `"started_at":null,"completed_at":null,"actual_duration_seconds":null,"metrics_realized":[],` +
        `"perceived_rpe":null,"avg_hr":null,"max_hr":null}\n`
    );
  });

  it("reads a missing WAL or directory as empty", async () => {
    expect(await readSessions(walPath)).toEqual([]);
    expect(await readSessions(path.join(dir, "nope", "nope", "x.wal"))).toEqual([]);
  });

  it("starts a fresh line after a torn final record", async () => {
    const first = makeSession({ id: testUuid(104) });
    const second = makeSession({ id: testUuid(105) });
    await appendSession(walPath, first);
    await writeFile(walPath, `${recordLine(first)}\n{"id":"${testUuid(106)}","defin`);

    await appendSession(walPath, second);

    const lines = (await readFile(walPath, "utf8")).split("\n");
    expect(lines).toEqual([recordLine(first), `{"id":"${testUuid(106)}","defin`, recordLine(second), ""]);
    expect((await readSessions(walPath)).map((session) => session.id)).toEqual([testUuid(104), testUuid(105)]);
  });

  it("refuses a session that would not read back", async () => {
    const invalid = makeSession({ id: testUuid(107), perceivedRpe: 11 });
    const undated = makeSession({ id: testUuid(108), performedAt: new Date("not a date") });

    await expect(appendSession(walPath, invalid)).rejects.toBeInstanceOf(SerializationError);
    await expect(appendSession(walPath, undated)).rejects.toBeInstanceOf(SerializationError);
    await expect(access(walPath)).rejects.toThrow();
  });

  it("keeps every session when appends race", async () => {
    const sessions = Array.from({ length: 10 }, (_, i) => makeSession({ id: testUuid(200 + i) }));

    await Promise.all(sessions.map((session) => appendSession(walPath, session)));

    const ids = (await readSessions(walPath)).map((session) => session.id).sort();
    expect(ids).toEqual(sessions.map((session) => session.id).sort());
  });
});

describe("parseWalContents", () => {
  it("skips blank, malformed and invalid lines", () => {
    const valid = makeSession({ id: testUuid(301), definitionId: "mobility_shoulder_cars" });
    const contents = [
      recordLine(valid),
      "",
      "not json",
      JSON.stringify({ id: testUuid(302), definition_id: "emom_kb_swing_5m" }),
      JSON.stringify({ ...toSessionRecord(valid), id: "not-a-uuid" }),
      "   ",
    ].join("\n");

    expect(parseWalContents(contents)).toEqual([valid]);
  });

  it("accepts records without realized metrics", () => {
    const record = { ...toSessionRecord(makeSession({ id: testUuid(303) })), metrics_realized: undefined };
    const [session] = parseWalContents(JSON.stringify(record));
    expect(session?.metricsRealized).toEqual([]);
  });
});
