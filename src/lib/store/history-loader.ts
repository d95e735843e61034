import type { MicrodoseSession } from "../engine/types";
import { readArchive } from "./archive-csv";
import { readSessions } from "./wal";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Sessions performed within the last `windowDays`, from both the WAL and the
 * archive, newest first. A session present in both keeps its WAL copy.
 */
export async function loadRecentSessions(
  walPath: string,
  archivePath: string,
  windowDays: number,
  now: Date = new Date()
): Promise<MicrodoseSession[]> {
  const cutoff = now.getTime() - windowDays * DAY_MS;

  const [walSessions, archiveSessions] = await Promise.all([
    readSessions(walPath),
    readArchive(archivePath),
  ]);

  const byId = new Map<string, MicrodoseSession>();
  for (const session of archiveSessions) {
    byId.set(session.id, session);
  }
  for (const session of walSessions) {
    byId.set(session.id, session);
  }

  const recent = [...byId.values()]
    .filter((session) => session.performedAt.getTime() >= cutoff)
    .sort((a, b) => b.performedAt.getTime() - a.performedAt.getTime());

  console.debug(
    `[history] ${recent.length} session(s) in the last ${windowDays} day(s) ` +
      `(${walSessions.length} in WAL, ${archiveSessions.length} archived)`
  );
  return recent;
}
