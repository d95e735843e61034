import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NOW_ISO, hoursBefore, makeSession, testUuid } from "../engine/test-utils";
import { ARCHIVE_HEADER, appendArchiveRows, encodeArchiveRow } from "./archive-csv";
import { loadRecentSessions } from "./history-loader";
import { appendSession } from "./wal";

let dir: string;
let walPath: string;
let archivePath: string;
const now = new Date(NOW_ISO);

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "microdose-history-"));
  walPath = path.join(dir, "wal", "microdose_sessions.wal");
  archivePath = path.join(dir, "sessions.csv");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadRecentSessions", () => {
  it("merges WAL and archive within the window, newest first, preferring the WAL copy", async () => {
    const walOnly = makeSession({ id: testUuid(1), performedAt: hoursBefore(NOW_ISO, 1) });
    const archived = makeSession({ id: testUuid(2), definitionId: "gtg_pullup_band", performedAt: hoursBefore(NOW_ISO, 30) });
    const tooOld = makeSession({ id: testUuid(3), performedAt: hoursBefore(NOW_ISO, 8 * 24) });
    const onBoundary = makeSession({ id: testUuid(4), definitionId: "mobility_hip_cars", performedAt: hoursBefore(NOW_ISO, 7 * 24) });
    const archivedCopy = makeSession({ id: testUuid(5), definitionId: "emom_burpee_5m", performedAt: hoursBefore(NOW_ISO, 2) });
    const walCopy = { ...archivedCopy, definitionId: "emom_kb_swing_5m" };

    await appendArchiveRows(archivePath, [archived, tooOld, onBoundary, archivedCopy]);
    await appendSession(walPath, walOnly);
    await appendSession(walPath, walCopy);

    const sessions = await loadRecentSessions(walPath, archivePath, 7, now);

    expect(sessions.map((session) => session.id)).toEqual([testUuid(1), testUuid(5), testUuid(2), testUuid(4)]);
    expect(sessions[1]?.definitionId).toBe("emom_kb_swing_5m");
  });

  it("returns nothing when neither source exists", async () => {
    expect(await loadRecentSessions(walPath, archivePath, 7, now)).toEqual([]);
  });

  it("skips malformed archive rows", async () => {
    const good = makeSession({ id: testUuid(6), performedAt: hoursBefore(NOW_ISO, 3) });
    await writeFile(archivePath, `${ARCHIVE_HEADER}\nbroken,row\n${encodeArchiveRow(good)}\n`);

    const sessions = await loadRecentSessions(walPath, archivePath, 7, now);
    expect(sessions).toEqual([good]);
  });

  it("honours a shorter window", async () => {
    await appendSession(walPath, makeSession({ id: testUuid(7), performedAt: hoursBefore(NOW_ISO, 30) }));
    expect(await loadRecentSessions(walPath, archivePath, 1, now)).toEqual([]);
  });
});
