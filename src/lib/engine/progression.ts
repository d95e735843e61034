import { getDefinition, getPrimaryMovement } from "./catalog";
import { BURPEE_STYLE_LADDER } from "./rules";
import type {
  Catalog,
  MicrodoseDefinition,
  MovementKind,
  ProgressionConfig,
  ProgressionState,
  RepsMetricSpec,
  UserMicrodoseState,
} from "./types";

export type ProgressionRule = "burpee" | "kettlebell_swing" | "pullup";

export type UpgradeResult = {
  state: ProgressionState;
  upgraded: boolean;
};

export type IncreaseIntensityResult = {
  userState: UserMicrodoseState;
  upgraded: boolean;
  progression: ProgressionState | null;
};

const RULE_BY_KIND: Record<MovementKind, ProgressionRule | null> = {
  burpee: "burpee",
  kettlebell_swing: "kettlebell_swing",
  pullup: "pullup",
  mobility_drill: null,
};

function bump(state: ProgressionState, reps: number, now: Date): UpgradeResult {
  return {
    state: { ...state, reps, level: state.level + 1, lastUpgraded: now },
    upgraded: true,
  };
}

/**
 * Reps climb to the ceiling, then the style steps up the ladder and reps
 * restart lower. At `seal` on the ceiling there is nothing left to upgrade.
 */
export function upgradeBurpee(state: ProgressionState, repCeiling: number, now: Date): UpgradeResult {
  if (state.reps < repCeiling) {
    return bump(state, state.reps + 1, now);
  }

  const current = state.style.type === "burpee" ? state.style.style : "four_count";
  const step = BURPEE_STYLE_LADDER[current];
  if (!step) {
    return { state: { ...state, reps: repCeiling }, upgraded: false };
  }

  return {
    state: {
      reps: step.resetReps,
      style: { type: "burpee", style: step.next },
      level: state.level + 1,
      lastUpgraded: now,
    },
    upgraded: true,
  };
}

export function upgradeKettlebellSwing(
  state: ProgressionState,
  baseReps: number,
  maxReps: number,
  now: Date
): UpgradeResult {
  if (state.reps >= maxReps) {
    return { state, upgraded: false };
  }
  return bump(state, Math.min(baseReps + state.level + 1, maxReps), now);
}

/** Band selection stays manual; only reps move. */
export function upgradePullup(state: ProgressionState, maxReps: number, now: Date): UpgradeResult {
  if (state.reps >= maxReps) {
    return { state, upgraded: false };
  }
  return bump(state, state.reps + 1, now);
}

function findProgressableReps(definition: MicrodoseDefinition): RepsMetricSpec | undefined {
  return definition.blocks[0]?.metrics.find(
    (metric): metric is RepsMetricSpec => metric.type === "reps" && metric.progressable
  );
}

export function resolveProgressionRule(catalog: Catalog, definitionId: string): ProgressionRule | null {
  const definition = getDefinition(catalog, definitionId);
  if (!definition || !findProgressableReps(definition)) {
    return null;
  }
  const movement = getPrimaryMovement(catalog, definition);
  return movement ? RULE_BY_KIND[movement.kind] : null;
}

export function initialProgression(definition: MicrodoseDefinition): ProgressionState {
  const block = definition.blocks[0];
  return {
    reps: findProgressableReps(definition)?.default ?? 0,
    style: block ? block.movementStyle : { type: "none" },
    level: 0,
    lastUpgraded: null,
  };
}

/**
 * Adds a level-0 progression entry for a progressable definition that has none.
 * Returns the input unchanged otherwise.
 */
export function seedProgression(
  catalog: Catalog,
  definitionId: string,
  userState: UserMicrodoseState
): UserMicrodoseState {
  const definition = getDefinition(catalog, definitionId);
  if (!definition || userState.progressions[definitionId] || !resolveProgressionRule(catalog, definitionId)) {
    return userState;
  }
  return {
    ...userState,
    progressions: { ...userState.progressions, [definitionId]: initialProgression(definition) },
  };
}

export function increaseIntensity(
  catalog: Catalog,
  definitionId: string,
  userState: UserMicrodoseState,
  config: ProgressionConfig,
  now: Date
): IncreaseIntensityResult {
  const definition = getDefinition(catalog, definitionId);
  const rule = resolveProgressionRule(catalog, definitionId);
  if (!definition || !rule) {
    console.warn(`[progression] no progression rule for ${definitionId}; leaving intensity unchanged`);
    return {
      userState,
      upgraded: false,
      progression: userState.progressions[definitionId] ?? null,
    };
  }

  const current = userState.progressions[definitionId] ?? initialProgression(definition);
  const result = applyRule(rule, current, definition, config, now);

  if (result.upgraded) {
    console.info(
      `[progression] ${definitionId}: level ${result.state.level}, ${result.state.reps} reps`
    );
  } else {
    console.info(`[progression] ${definitionId} is already at its ceiling`);
  }

  return {
    userState: {
      ...userState,
      progressions: { ...userState.progressions, [definitionId]: result.state },
    },
    upgraded: result.upgraded,
    progression: result.state,
  };
}

function applyRule(
  rule: ProgressionRule,
  state: ProgressionState,
  definition: MicrodoseDefinition,
  config: ProgressionConfig,
  now: Date
): UpgradeResult {
  switch (rule) {
    case "burpee":
      return upgradeBurpee(state, config.burpeeRepCeiling, now);
    case "kettlebell_swing": {
      const baseReps = findProgressableReps(definition)?.default ?? state.reps;
      return upgradeKettlebellSwing(state, baseReps, config.kbSwingMaxReps, now);
    }
    case "pullup":
      return upgradePullup(state, config.pullupMaxReps, now);
  }
}
