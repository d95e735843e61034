import { readFile } from "node:fs/promises";
import type { ExternalStrengthSignal } from "../engine/types";
import { errorMessage, isNodeErrorWithCode } from "../errors";
import { formatZodIssues, strengthSignalFileSchema } from "../validation";

/** The latest strength session written by an external tool, or null. Never throws. */
export async function loadStrengthSignal(signalPath: string): Promise<ExternalStrengthSignal | null> {
  let contents: string;
  try {
    contents = await readFile(signalPath, "utf8");
  } catch (error) {
    if (isNodeErrorWithCode(error, "ENOENT")) {
      console.debug(`[strength] no signal at ${signalPath}`);
    } else {
      console.warn(`[strength] could not read ${signalPath}: ${errorMessage(error)}`);
    }
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    console.warn(`[strength] ${signalPath} is not valid JSON: ${errorMessage(error)}`);
    return null;
  }

  const parsed = strengthSignalFileSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[strength] ignoring ${signalPath}: ${formatZodIssues(parsed.error)}`);
    return null;
  }
  return parsed.data;
}
