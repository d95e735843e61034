import { mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { createDefaultUserState, type UserMicrodoseState } from "../engine/types";
import {
  LockTimeoutError,
  SerializationError,
  asPersistenceError,
  errorMessage,
  isNodeErrorWithCode,
} from "../errors";
import { formatZodIssues, toUserStateFile, userStateFileSchema } from "../validation";
import { writeFileAtomic } from "./atomic-write";
import { withFileLock } from "./file-lock";

/**
 * Reads the progression state. Missing, unreadable and corrupt files all
 * yield the default state; only a lock timeout is raised.
 */
export async function loadUserState(statePath: string): Promise<UserMicrodoseState> {
  let contents: string;
  try {
    contents = await withFileLock(statePath, () => readFile(statePath, "utf8"));
  } catch (error) {
    if (error instanceof LockTimeoutError) {
      throw error;
    }
    if (isNodeErrorWithCode(error, "ENOENT")) {
      console.info(`[state-store] no state at ${statePath}; starting from defaults`);
      return createDefaultUserState();
    }
    console.warn(`[state-store] could not read ${statePath}; using defaults: ${errorMessage(error)}`);
    return createDefaultUserState();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    console.warn(`[state-store] ${statePath} is not valid JSON; using defaults: ${errorMessage(error)}`);
    return createDefaultUserState();
  }

  const parsed = userStateFileSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[state-store] ${statePath} failed validation; using defaults: ${formatZodIssues(parsed.error)}`);
    return createDefaultUserState();
  }
  return parsed.data;
}

export async function saveUserState(statePath: string, state: UserMicrodoseState): Promise<void> {
  let contents: string;
  try {
    contents = JSON.stringify(toUserStateFile(state), null, 2) + "\n";
  } catch (error) {
    throw new SerializationError(`State cannot be serialized: ${errorMessage(error)}`, error);
  }
  try {
    await mkdir(path.dirname(statePath), { recursive: true });
    await withFileLock(statePath, () => writeFileAtomic(statePath, contents));
  } catch (error) {
    throw asPersistenceError(error, `Failed to save state to ${statePath}`);
  }
  console.debug(`[state-store] saved ${statePath}`);
}

/**
 * Load, mutate, save. The lock is not held across the mutator, so two
 * processes updating at once can lose one update.
 */
export async function updateUserState(
  statePath: string,
  mutator: (state: UserMicrodoseState) => UserMicrodoseState
): Promise<UserMicrodoseState> {
  const next = mutator(await loadUserState(statePath));
  await saveUserState(statePath, next);
  return next;
}
