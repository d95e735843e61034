export type MovementKind = "kettlebell_swing" | "burpee" | "pullup" | "mobility_drill";
export type MicrodoseCategory = "vo2" | "gtg" | "mobility";

/** Burpee variations, easiest first. */
export type BurpeeStyle = "four_count" | "six_count" | "six_count_two_pump" | "seal";

/**
 * Style a movement is performed in.
 * A band of `null` means unassisted.
 */
export type MovementStyle =
  | { type: "none" }
  | { type: "burpee"; style: BurpeeStyle }
  | { type: "band"; band: string | null };

export type Movement = {
  id: string;
  name: string;
  kind: MovementKind;
  defaultStyle: MovementStyle;
  tags: string[];
  referenceUrl: string | null;
};

export type RepsMetricSpec = {
  type: "reps";
  key: string;
  default: number;
  min: number;
  max: number;
  step: number;
  progressable: boolean;
};

export type BandMetricSpec = {
  type: "band";
  key: string;
  default: string;
  progressable: boolean;
};

export type MetricSpec = RepsMetricSpec | BandMetricSpec;

export type MicrodoseBlock = {
  movementId: string;
  movementStyle: MovementStyle;
  durationHintSeconds: number;
  metrics: MetricSpec[];
};

export type MicrodoseDefinition = {
  id: string;
  name: string;
  category: MicrodoseCategory;
  suggestedDurationSeconds: number;
  gtgFriendly: boolean;
  blocks: MicrodoseBlock[];
  referenceUrl: string | null;
};

export type Catalog = {
  movements: Readonly<Record<string, Movement>>;
  microdoses: Readonly<Record<string, MicrodoseDefinition>>;
};

/** A performed session. The only session shape the stores accept. */
export type MicrodoseSession = {
  id: string;
  definitionId: string;
  performedAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  actualDurationSeconds?: number;
  metricsRealized: MetricSpec[];
  perceivedRpe?: number;
  avgHr?: number;
  maxHr?: number;
};

/**
 * History entry seen by the engine. `shown_but_skipped` only lives in memory
 * for the current decision loop; the stores take `MicrodoseSession`, so a
 * skip marker cannot reach disk.
 */
export type SessionKind =
  | { kind: "real"; session: MicrodoseSession }
  | { kind: "shown_but_skipped"; definitionId: string; shownAt: Date };

export type ProgressionState = {
  reps: number;
  style: MovementStyle;
  level: number;
  lastUpgraded: Date | null;
};

export type UserMicrodoseState = {
  progressions: Record<string, ProgressionState>;
  lastMobilityDefId: string | null;
};

export type StrengthSessionType =
  | { kind: "lower" }
  | { kind: "upper" }
  | { kind: "full" }
  | { kind: "other"; label: string };

export type ExternalStrengthSignal = {
  lastSessionAt: Date;
  sessionType: StrengthSessionType;
};

export type UserContext = {
  now: Date;
  userState: UserMicrodoseState;
  recentSessions: SessionKind[];
  externalStrength: ExternalStrengthSignal | null;
  // Informational only; no rule filters on it yet.
  equipmentAvailable: string[];
};

export type Prescription = {
  definition: MicrodoseDefinition;
  category: MicrodoseCategory;
  reps: number | null;
  style: MovementStyle | null;
};

export type ProgressionConfig = {
  burpeeRepCeiling: number;
  kbSwingMaxReps: number;
  pullupMaxReps: number;
};

export function createDefaultUserState(): UserMicrodoseState {
  return { progressions: {}, lastMobilityDefId: null };
}
