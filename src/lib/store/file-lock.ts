import { access } from "node:fs/promises";
import path from "node:path";
import lockfile from "proper-lockfile";
import { LockTimeoutError, isNodeErrorWithCode } from "../errors";

export type FileLockOptions = {
  /** Lock attempts after the first one before giving up. */
  retries?: number;
  /** Age after which a lock left by a crashed process is reclaimed. */
  staleMs?: number;
};

// Roughly three seconds of bounded waiting before a retryable LockTimeoutError.
const DEFAULT_RETRIES = 30;
const DEFAULT_STALE_MS = 10_000;

/**
 * Runs `task` while holding an advisory cross-process lock on `targetPath`.
 * The target itself need not exist, but its directory must. The lock is
 * released on every exit path, and a release failure on the success path is
 * rethrown.
 */
export async function withFileLock<T>(
  targetPath: string,
  task: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  // proper-lockfile retries every error, so a missing directory would only
  // surface after the whole retry budget.
  await access(path.dirname(targetPath));

  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(targetPath, {
      realpath: false,
      stale: options.staleMs ?? DEFAULT_STALE_MS,
      retries: {
        retries: options.retries ?? DEFAULT_RETRIES,
        factor: 1.2,
        minTimeout: 20,
        maxTimeout: 150,
      },
    });
  } catch (error) {
    if (isNodeErrorWithCode(error, "ELOCKED")) {
      throw new LockTimeoutError(targetPath, error);
    }
    throw error;
  }

  try {
    return await task();
  } finally {
    await release();
  }
}
