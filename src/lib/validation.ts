import { z } from "zod";
import type {
  ExternalStrengthSignal,
  MetricSpec,
  MicrodoseSession,
  MovementStyle,
  ProgressionState,
  StrengthSessionType,
  UserMicrodoseState,
} from "./engine/types";

export const MICRODOSE_CATEGORY_VALUES = ["vo2", "gtg", "mobility"] as const;
export const BURPEE_STYLE_VALUES = ["four_count", "six_count", "six_count_two_pump", "seal"] as const;

export const ARCHIVE_COLUMNS = [
  "id",
  "definition_id",
  "performed_at",
  "started_at",
  "completed_at",
  "duration",
  "perceived_rpe",
  "avg_hr",
  "max_hr",
] as const;

export type ArchiveColumn = (typeof ARCHIVE_COLUMNS)[number];

const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess((value) => {
    if (value === null || value === "") {
      return undefined;
    }
    if (typeof value === "number" && Number.isNaN(value)) {
      return undefined;
    }
    return value;
  }, schema.optional());

const optionalString = (schema: z.ZodString) =>
  z.preprocess((value) => {
    if (typeof value === "string" && value.trim() === "") {
      return undefined;
    }
    return value;
  }, schema.optional());

const isoDateSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const optionalIsoDate = z.preprocess(
  (value) => (value === null || value === "" ? undefined : value),
  isoDateSchema.optional()
);

// Archive rows keep the session when an optional timestamp is garbled.
const lenientIsoDate = optionalIsoDate.catch(undefined);

const heartRateSchema = z.number().int().min(0).max(255);
const rpeSchema = z.number().int().min(0).max(10);

export const movementStyleSchema: z.ZodType<MovementStyle> = z.discriminatedUnion("type", [
  z.object({ type: z.literal("none") }),
  z.object({ type: z.literal("burpee"), style: z.enum(BURPEE_STYLE_VALUES) }),
  z.object({ type: z.literal("band"), band: z.string().min(1).nullable() }),
]);

export const metricSpecSchema: z.ZodType<MetricSpec> = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("reps"),
    key: z.string(),
    default: z.number().int(),
    min: z.number().int(),
    max: z.number().int(),
    step: z.number().int(),
    progressable: z.boolean(),
  }),
  z.object({
    type: z.literal("band"),
    key: z.string(),
    default: z.string(),
    progressable: z.boolean(),
  }),
]);

/** One WAL line. Field names are the on-disk snake_case form. */
export const sessionRecordSchema = z
  .object({
    id: z.string().uuid(),
    definition_id: z.string().min(1),
    performed_at: isoDateSchema,
    started_at: optionalIsoDate,
    completed_at: optionalIsoDate,
    actual_duration_seconds: optionalNumber(z.number().int().min(0)),
    metrics_realized: z.array(metricSpecSchema).default([]),
    perceived_rpe: optionalNumber(rpeSchema),
    avg_hr: optionalNumber(heartRateSchema),
    max_hr: optionalNumber(heartRateSchema),
  })
  .transform(
    (record): MicrodoseSession => ({
      id: record.id,
      definitionId: record.definition_id,
      performedAt: record.performed_at,
      startedAt: record.started_at,
      completedAt: record.completed_at,
      actualDurationSeconds: record.actual_duration_seconds,
      metricsRealized: record.metrics_realized,
      perceivedRpe: record.perceived_rpe,
      avgHr: record.avg_hr,
      maxHr: record.max_hr,
    })
  );

export function toSessionRecord(session: MicrodoseSession) {
  return {
    id: session.id,
    definition_id: session.definitionId,
    performed_at: session.performedAt.toISOString(),
    started_at: session.startedAt?.toISOString() ?? null,
    completed_at: session.completedAt?.toISOString() ?? null,
    actual_duration_seconds: session.actualDurationSeconds ?? null,
    metrics_realized: session.metricsRealized,
    perceived_rpe: session.perceivedRpe ?? null,
    avg_hr: session.avgHr ?? null,
    max_hr: session.maxHr ?? null,
  };
}

/** One archive row, keyed by header name; every value is a raw CSV field. */
export const archiveRowSchema = z
  .object({
    id: z.string().uuid(),
    definition_id: z.string().min(1),
    performed_at: isoDateSchema,
    started_at: lenientIsoDate,
    completed_at: lenientIsoDate,
    duration: optionalNumber(z.coerce.number().int().min(0)),
    perceived_rpe: optionalNumber(z.coerce.number().int().min(0).max(10)),
    avg_hr: optionalNumber(z.coerce.number().int().min(0).max(255)),
    max_hr: optionalNumber(z.coerce.number().int().min(0).max(255)),
  })
  .transform(
    (row): MicrodoseSession => ({
      id: row.id,
      definitionId: row.definition_id,
      performedAt: row.performed_at,
      startedAt: row.started_at,
      completedAt: row.completed_at,
      actualDurationSeconds: row.duration,
      // Realized metrics are not archived.
      metricsRealized: [],
      perceivedRpe: row.perceived_rpe,
      avgHr: row.avg_hr,
      maxHr: row.max_hr,
    })
  );

export function toArchiveRow(session: MicrodoseSession): Record<ArchiveColumn, string> {
  return {
    id: session.id,
    definition_id: session.definitionId,
    performed_at: session.performedAt.toISOString(),
    started_at: session.startedAt?.toISOString() ?? "",
    completed_at: session.completedAt?.toISOString() ?? "",
    duration: session.actualDurationSeconds?.toString() ?? "",
    perceived_rpe: session.perceivedRpe?.toString() ?? "",
    avg_hr: session.avgHr?.toString() ?? "",
    max_hr: session.maxHr?.toString() ?? "",
  };
}

const progressionRecordSchema = z
  .object({
    reps: z.number().int().min(0),
    style: movementStyleSchema,
    level: z.number().int().min(0),
    last_upgraded: optionalIsoDate,
  })
  .transform(
    (record): ProgressionState => ({
      reps: record.reps,
      style: record.style,
      level: record.level,
      lastUpgraded: record.last_upgraded ?? null,
    })
  );

export const userStateFileSchema = z
  .object({
    progressions: z.record(progressionRecordSchema).default({}),
    last_mobility_def_id: z.string().nullish(),
  })
  .transform(
    (file): UserMicrodoseState => ({
      progressions: file.progressions,
      lastMobilityDefId: file.last_mobility_def_id || null,
    })
  );

export function toUserStateFile(state: UserMicrodoseState) {
  return {
    progressions: Object.fromEntries(
      Object.entries(state.progressions).map(([definitionId, progression]) => [
        definitionId,
        {
          reps: progression.reps,
          style: progression.style,
          level: progression.level,
          last_upgraded: progression.lastUpgraded?.toISOString() ?? null,
        },
      ])
    ),
    last_mobility_def_id: state.lastMobilityDefId,
  };
}

export function parseStrengthSessionType(value: string): StrengthSessionType {
  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case "lower":
      return { kind: "lower" };
    case "upper":
      return { kind: "upper" };
    case "full":
    case "full_body":
    case "fullbody":
      return { kind: "full" };
    default:
      return { kind: "other", label: normalized };
  }
}

export const strengthSignalFileSchema = z
  .object({
    last_session_at: isoDateSchema,
    session_type: z.string().min(1),
  })
  .transform(
    (file): ExternalStrengthSignal => ({
      lastSessionAt: file.last_session_at,
      sessionType: parseStrengthSessionType(file.session_type),
    })
  );

export const microdoseCategorySchema = z.enum(MICRODOSE_CATEGORY_VALUES);

export const configEnvSchema = z.object({
  MICRODOSE_DATA_DIR: optionalString(z.string()),
  MICRODOSE_EQUIPMENT: optionalString(z.string()),
  MICRODOSE_BURPEE_REP_CEILING: optionalNumber(z.coerce.number().int().min(1)),
  MICRODOSE_KB_SWING_MAX_REPS: optionalNumber(z.coerce.number().int().min(1)),
  MICRODOSE_PULLUP_MAX_REPS: optionalNumber(z.coerce.number().int().min(1)),
  MICRODOSE_HISTORY_WINDOW_DAYS: optionalNumber(z.coerce.number().int().min(1)),
  XDG_DATA_HOME: optionalString(z.string()),
});

export type ConfigEnv = z.infer<typeof configEnvSchema>;

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
