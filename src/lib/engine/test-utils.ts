/**
 * Shared fixtures for engine and store tests.
 */
import { realSession } from "./history";
import { createDefaultUserState, type MicrodoseSession, type SessionKind, type UserContext } from "./types";

export const NOW_ISO = "2026-02-11T12:00:00.000Z";
export const HOUR_MS = 60 * 60 * 1000;

let sessionCounter = 0;

/** Deterministic v4-shaped UUIDs so failures are easy to read. */
export function testUuid(n: number): string {
  return `00000000-0000-4000-8000-${n.toString().padStart(12, "0")}`;
}

export function hoursBefore(iso: string, hours: number): Date {
  return new Date(new Date(iso).getTime() - hours * HOUR_MS);
}

export function makeSession(overrides: Partial<MicrodoseSession> = {}): MicrodoseSession {
  sessionCounter += 1;
  return {
    id: testUuid(sessionCounter),
    definitionId: "emom_kb_swing_5m",
    performedAt: new Date(NOW_ISO),
    metricsRealized: [],
    ...overrides,
  };
}

export function realAt(definitionId: string, hoursAgo: number): SessionKind {
  return realSession(makeSession({ definitionId, performedAt: hoursBefore(NOW_ISO, hoursAgo) }));
}

export function makeContext(overrides: Partial<UserContext> = {}): UserContext {
  return {
    now: new Date(NOW_ISO),
    userState: createDefaultUserState(),
    recentSessions: [],
    externalStrength: null,
    equipmentAvailable: ["kettlebell", "pullup_bar", "bands"],
    ...overrides,
  };
}
