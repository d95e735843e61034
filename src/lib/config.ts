import os from "node:os";
import path from "node:path";
import { DEFAULT_HISTORY_WINDOW_DAYS, DEFAULT_PROGRESSION_CONFIG } from "./engine/rules";
import type { ProgressionConfig } from "./engine/types";
import { ConfigError } from "./errors";
import { configEnvSchema, formatZodIssues } from "./validation";

export const DEFAULT_EQUIPMENT = ["kettlebell", "pullup_bar", "bands"];

export type MicrodoseConfig = {
  dataDir: string;
  equipmentAvailable: string[];
  progression: ProgressionConfig;
  historyWindowDays: number;
};

export function defaultDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdgDataHome = env.XDG_DATA_HOME?.trim();
  const base = xdgDataHome ? xdgDataHome : path.join(os.homedir(), ".local", "share");
  return path.join(base, "microdose");
}

function parseEquipment(raw: string | undefined): string[] {
  if (!raw) {
    return [...DEFAULT_EQUIPMENT];
  }
  const items = raw
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
  return items.length > 0 ? items : [...DEFAULT_EQUIPMENT];
}

/**
 * Reads MICRODOSE_* variables. Unset or empty variables take their defaults;
 * anything present but invalid throws ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MicrodoseConfig {
  const parsed = configEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodIssues(parsed.error)}`);
  }
  const values = parsed.data;

  return {
    dataDir: values.MICRODOSE_DATA_DIR ? path.resolve(values.MICRODOSE_DATA_DIR) : defaultDataDir(env),
    equipmentAvailable: parseEquipment(values.MICRODOSE_EQUIPMENT),
    progression: {
      burpeeRepCeiling: values.MICRODOSE_BURPEE_REP_CEILING ?? DEFAULT_PROGRESSION_CONFIG.burpeeRepCeiling,
      kbSwingMaxReps: values.MICRODOSE_KB_SWING_MAX_REPS ?? DEFAULT_PROGRESSION_CONFIG.kbSwingMaxReps,
      pullupMaxReps: values.MICRODOSE_PULLUP_MAX_REPS ?? DEFAULT_PROGRESSION_CONFIG.pullupMaxReps,
    },
    historyWindowDays: values.MICRODOSE_HISTORY_WINDOW_DAYS ?? DEFAULT_HISTORY_WINDOW_DAYS,
  };
}
