import { randomUUID } from "node:crypto";
import type { MicrodoseConfig } from "@/lib/config";
import {
  getDefaultCatalog,
  increaseIntensity,
  prescribeNext,
  realSession,
  seedProgression,
  shownButSkipped,
  type Catalog,
  type IncreaseIntensityResult,
  type MetricSpec,
  type MicrodoseCategory,
  type MicrodoseSession,
  type Prescription,
  type SessionKind,
  type UserContext,
  type UserMicrodoseState,
} from "@/lib/engine";
import {
  appendSession,
  cleanupProcessed,
  loadRecentSessions,
  loadStrengthSignal,
  loadUserState,
  resolveDataPaths,
  rollupWal,
  saveUserState,
  updateUserState,
  type DataPaths,
} from "@/lib/store";

export type MicrodoseDeps = {
  catalog: Catalog;
  config: MicrodoseConfig;
  paths: DataPaths;
};

export function createMicrodoseDeps(config: MicrodoseConfig, catalog: Catalog = getDefaultCatalog()): MicrodoseDeps {
  return { catalog, config, paths: resolveDataPaths(config.dataDir) };
}

/**
 * Assembles the engine input from disk. `skipped` markers are in-memory only
 * and are merged ahead of the persisted history.
 */
export async function buildPrescriptionContext(
  deps: MicrodoseDeps,
  now: Date = new Date(),
  skipped: SessionKind[] = []
): Promise<UserContext> {
  const { paths, config } = deps;
  const [userState, sessions, externalStrength] = await Promise.all([
    loadUserState(paths.statePath),
    loadRecentSessions(paths.walPath, paths.archivePath, config.historyWindowDays, now),
    loadStrengthSignal(paths.strengthSignalPath),
  ]);

  return {
    now,
    userState,
    recentSessions: [...skipped, ...sessions.map(realSession)],
    externalStrength,
    equipmentAvailable: config.equipmentAvailable,
  };
}

export async function prescribe(
  deps: MicrodoseDeps,
  options: { now?: Date; skipped?: SessionKind[]; targetCategory?: MicrodoseCategory | null } = {}
): Promise<{ prescription: Prescription; context: UserContext }> {
  const context = await buildPrescriptionContext(deps, options.now, options.skipped);
  const prescription = prescribeNext(deps.catalog, context, options.targetCategory);
  return { prescription, context };
}

/** In-memory marker for a prescription the user passed on. Never persisted. */
export function skipPrescription(prescription: Prescription, shownAt: Date = new Date()): SessionKind {
  console.debug(`[microdose] skipped ${prescription.definition.id}`);
  return shownButSkipped(prescription.definition.id, shownAt);
}

function realizedMetrics(prescription: Prescription): MetricSpec[] {
  const block = prescription.definition.blocks[0];
  if (!block) {
    return [];
  }
  return block.metrics.map((metric) =>
    metric.type === "reps" && prescription.reps !== null ? { ...metric, default: prescription.reps } : metric
  );
}

export type CompletionDetails = {
  perceivedRpe?: number;
  avgHr?: number;
  maxHr?: number;
  actualDurationSeconds?: number;
};

/**
 * Logs a performed prescription: the session goes to the WAL first, then the
 * progression state is seeded and the mobility cursor advanced.
 */
export async function recordCompletedSession(
  deps: MicrodoseDeps,
  prescription: Prescription,
  now: Date = new Date(),
  details: CompletionDetails = {}
): Promise<{ session: MicrodoseSession; userState: UserMicrodoseState }> {
  const { definition } = prescription;
  const session: MicrodoseSession = {
    id: randomUUID(),
    definitionId: definition.id,
    performedAt: now,
    startedAt: now,
    completedAt: now,
    actualDurationSeconds: details.actualDurationSeconds ?? definition.suggestedDurationSeconds,
    metricsRealized: realizedMetrics(prescription),
    perceivedRpe: details.perceivedRpe,
    avgHr: details.avgHr,
    maxHr: details.maxHr,
  };

  await appendSession(deps.paths.walPath, session);

  const userState = await updateUserState(deps.paths.statePath, (state) => {
    const seeded = seedProgression(deps.catalog, definition.id, state);
    return prescription.category === "mobility" ? { ...seeded, lastMobilityDefId: definition.id } : seeded;
  });

  console.info(`[microdose] logged ${definition.id} (${session.id})`);
  return { session, userState };
}

/** Applies one progression step. Touches the state file only, never the WAL. */
export async function upgradeIntensity(
  deps: MicrodoseDeps,
  definitionId: string,
  now: Date = new Date()
): Promise<IncreaseIntensityResult> {
  const current = await loadUserState(deps.paths.statePath);
  const result = increaseIntensity(deps.catalog, definitionId, current, deps.config.progression, now);
  if (result.upgraded) {
    await saveUserState(deps.paths.statePath, result.userState);
  }
  return result;
}

export async function rollupSessions(
  deps: MicrodoseDeps,
  options: { cleanup?: boolean } = {}
): Promise<{ archived: number; removed: number }> {
  const archived = await rollupWal(deps.paths.walPath, deps.paths.archivePath);
  const removed = options.cleanup ? await cleanupProcessed(deps.paths.walDir) : 0;
  return { archived, removed };
}

export function cleanupSessions(deps: MicrodoseDeps): Promise<number> {
  return cleanupProcessed(deps.paths.walDir);
}
