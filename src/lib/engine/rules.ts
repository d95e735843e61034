import type { BurpeeStyle, MicrodoseCategory, ProgressionConfig } from "./types";

const HOUR_MS = 60 * 60 * 1000;

export const MICRODOSE_CATEGORIES: readonly MicrodoseCategory[] = ["vo2", "gtg", "mobility"];

// A lower-body strength session inside this window pushes toward GTG work.
export const STRENGTH_OVERRIDE_WINDOW_MS = 24 * HOUR_MS;
// VO2 work is due again once the last VO2 entry is older than this.
export const VO2_RECENCY_THRESHOLD_MS = 4 * HOUR_MS;

export const DEFAULT_HISTORY_WINDOW_DAYS = 7;

export const CATEGORY_ROTATION: Record<MicrodoseCategory, MicrodoseCategory> = {
  vo2: "gtg",
  gtg: "mobility",
  mobility: "vo2",
};

// Substrings in a definition id that mark its category. Checked in order.
export const CATEGORY_ID_MARKERS: ReadonlyArray<{ category: MicrodoseCategory; markers: readonly string[] }> = [
  { category: "vo2", markers: ["vo2", "emom"] },
  { category: "gtg", markers: ["gtg"] },
  { category: "mobility", markers: ["mobility"] },
];

export const DEFAULT_PROGRESSION_CONFIG: ProgressionConfig = {
  burpeeRepCeiling: 10,
  kbSwingMaxReps: 15,
  pullupMaxReps: 8,
};

/** Next burpee style and the reps it restarts at; `null` at the top of the ladder. */
export const BURPEE_STYLE_LADDER: Record<BurpeeStyle, { next: BurpeeStyle; resetReps: number } | null> = {
  four_count: { next: "six_count", resetReps: 6 },
  six_count: { next: "six_count_two_pump", resetReps: 5 },
  six_count_two_pump: { next: "seal", resetReps: 4 },
  seal: null,
};

export function hoursBetween(earlier: Date, later: Date): number {
  return (later.getTime() - earlier.getTime()) / HOUR_MS;
}
