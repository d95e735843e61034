import type { Dirent } from "node:fs";
import { access, readdir, rename, rm } from "node:fs/promises";
import path from "node:path";
import { asPersistenceError, isNodeErrorWithCode } from "../errors";
import { appendArchiveRows } from "./archive-csv";
import { syncDirectory } from "./atomic-write";
import { withFileLock } from "./file-lock";
import { readSessionsUnlocked } from "./wal";

export const PROCESSED_SUFFIX = ".processed";

/**
 * Moves every WAL session into the archive and retires the WAL segment.
 * The WAL lock is held throughout, so an append lands either before the
 * read or in a fresh WAL after the rename. Returns the number of sessions
 * archived.
 */
export async function rollupWal(walPath: string, archivePath: string): Promise<number> {
  try {
    await access(walPath);
  } catch (error) {
    if (isNodeErrorWithCode(error, "ENOENT")) {
      console.info(`[rollup] no WAL at ${walPath}; nothing to roll up`);
      return 0;
    }
    throw asPersistenceError(error, `Failed to access ${walPath}`);
  }

  let count: number;
  try {
    count = await withFileLock(walPath, async () => {
      const sessions = await readSessionsUnlocked(walPath);
      if (sessions.length === 0) {
        return 0;
      }

      await appendArchiveRows(archivePath, sessions);

      const processedPath = await nextProcessedPath(walPath);
      await rename(walPath, processedPath);
      await syncDirectory(path.dirname(walPath));
      console.debug(`[rollup] retired ${walPath} as ${path.basename(processedPath)}`);
      return sessions.length;
    });
  } catch (error) {
    throw asPersistenceError(error, `Failed to roll up ${walPath}`);
  }

  console.info(`[rollup] archived ${count} session(s) to ${archivePath}`);
  return count;
}

async function nextProcessedPath(walPath: string): Promise<string> {
  const preferred = walPath + PROCESSED_SUFFIX;
  if (!(await exists(preferred))) {
    return preferred;
  }
  const stamp = new Date().toISOString().replace(/[:.]/g, "-");
  let candidate = `${walPath}.${stamp}${PROCESSED_SUFFIX}`;
  for (let attempt = 1; await exists(candidate); attempt++) {
    candidate = `${walPath}.${stamp}-${attempt}${PROCESSED_SUFFIX}`;
  }
  return candidate;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch (error) {
    if (isNodeErrorWithCode(error, "ENOENT")) {
      return false;
    }
    throw error;
  }
}

/** Deletes retired WAL segments in `dir`. Returns how many were removed. */
export async function cleanupProcessed(dir: string): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNodeErrorWithCode(error, "ENOENT")) {
      return 0;
    }
    throw asPersistenceError(error, `Failed to list ${dir}`);
  }

  let removed = 0;
  for (const entry of entries) {
    if (!entry.isFile() || !entry.name.endsWith(PROCESSED_SUFFIX)) {
      continue;
    }
    try {
      await rm(path.join(dir, entry.name));
      removed++;
    } catch (error) {
      if (!isNodeErrorWithCode(error, "ENOENT")) {
        throw asPersistenceError(error, `Failed to remove ${entry.name}`);
      }
    }
  }

  console.info(`[rollup] removed ${removed} processed segment(s) from ${dir}`);
  return removed;
}
