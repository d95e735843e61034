import { mkdir, open, readFile, type FileHandle } from "node:fs/promises";
import path from "node:path";
import type { MicrodoseSession } from "../engine/types";
import { SerializationError, asPersistenceError, errorMessage, isNodeErrorWithCode } from "../errors";
import { formatZodIssues, sessionRecordSchema, toSessionRecord } from "../validation";
import { withFileLock } from "./file-lock";

const RECORD_SEPARATOR = "\n";

/**
 * Appends one session as a JSON line under an exclusive lock, fsyncing
 * before the lock is released.
 */
export async function appendSession(walPath: string, session: MicrodoseSession): Promise<void> {
  const line = encodeRecord(session);

  try {
    await mkdir(path.dirname(walPath), { recursive: true });
    await withFileLock(walPath, async () => {
      const handle = await open(walPath, "a+");
      try {
        const prefix = (await endsWithTornRecord(handle)) ? RECORD_SEPARATOR : "";
        await handle.appendFile(prefix + line, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
    });
  } catch (error) {
    throw asPersistenceError(error, `Failed to append session ${session.id} to ${walPath}`);
  }

  console.debug(`[wal] appended session ${session.id}`);
}

/** One WAL line, refused up front if it would not read back. */
function encodeRecord(session: MicrodoseSession): string {
  let record: ReturnType<typeof toSessionRecord>;
  try {
    record = toSessionRecord(session);
  } catch (error) {
    throw new SerializationError(`Session ${session.id} cannot be serialized: ${errorMessage(error)}`, error);
  }
  const check = sessionRecordSchema.safeParse(record);
  if (!check.success) {
    throw new SerializationError(`Session ${session.id} is invalid: ${formatZodIssues(check.error)}`);
  }
  return JSON.stringify(record) + RECORD_SEPARATOR;
}

/**
 * Every parseable session in append order. A missing WAL reads as empty;
 * malformed or torn lines are skipped with a warning.
 */
export async function readSessions(walPath: string): Promise<MicrodoseSession[]> {
  try {
    // proper-lockfile has no shared mode; readers take the exclusive lock.
    return await withFileLock(walPath, () => readSessionsUnlocked(walPath));
  } catch (error) {
    if (isNodeErrorWithCode(error, "ENOENT")) {
      return [];
    }
    throw error;
  }
}

/** Caller must already hold the WAL lock. */
export async function readSessionsUnlocked(walPath: string): Promise<MicrodoseSession[]> {
  let contents: string;
  try {
    contents = await readFile(walPath, "utf8");
  } catch (error) {
    if (isNodeErrorWithCode(error, "ENOENT")) {
      return [];
    }
    throw error;
  }
  return parseWalContents(contents, walPath);
}

export function parseWalContents(contents: string, source = "WAL"): MicrodoseSession[] {
  const sessions: MicrodoseSession[] = [];

  contents.split(RECORD_SEPARATOR).forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }
    const lineNumber = index + 1;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      console.warn(`[wal] skipping line ${lineNumber} of ${source}: ${errorMessage(error)}`);
      return;
    }

    const parsed = sessionRecordSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`[wal] skipping line ${lineNumber} of ${source}: ${formatZodIssues(parsed.error)}`);
      return;
    }
    sessions.push(parsed.data);
  });

  return sessions;
}

async function endsWithTornRecord(handle: FileHandle): Promise<boolean> {
  const { size } = await handle.stat();
  if (size === 0) {
    return false;
  }
  const lastByte = Buffer.alloc(1);
  await handle.read(lastByte, 0, 1, size - 1);
  return lastByte.toString("utf8") !== RECORD_SEPARATOR;
}
