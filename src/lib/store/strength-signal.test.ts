import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseStrengthSessionType } from "../validation";
import { loadStrengthSignal } from "./strength-signal";

let dir: string;
let signalPath: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "microdose-strength-"));
  signalPath = path.join(dir, "signal.json");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadStrengthSignal", () => {
  it("parses a valid signal", async () => {
    await writeFile(
      signalPath,
      JSON.stringify({ last_session_at: "2026-02-10T18:30:00Z", session_type: "Lower" })
    );

    expect(await loadStrengthSignal(signalPath)).toEqual({
      lastSessionAt: new Date("2026-02-10T18:30:00.000Z"),
      sessionType: { kind: "lower" },
    });
  });

  it("returns null for a missing file", async () => {
    expect(await loadStrengthSignal(signalPath)).toBeNull();
  });

  it("returns null for invalid JSON or a bad shape", async () => {
    await writeFile(signalPath, "{");
    expect(await loadStrengthSignal(signalPath)).toBeNull();

    await writeFile(signalPath, JSON.stringify({ last_session_at: "last tuesday", session_type: "lower" }));
    expect(await loadStrengthSignal(signalPath)).toBeNull();
  });
});

describe("parseStrengthSessionType", () => {
  it("normalises case and full-body aliases", () => {
    expect(parseStrengthSessionType("UPPER")).toEqual({ kind: "upper" });
    expect(parseStrengthSessionType("Full_Body")).toEqual({ kind: "full" });
    expect(parseStrengthSessionType("fullbody")).toEqual({ kind: "full" });
    expect(parseStrengthSessionType(" Push ")).toEqual({ kind: "other", label: "push" });
  });
});
