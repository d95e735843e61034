import { PrescriptionError } from "../errors";
import { assertValidCatalog, getDefinitionsByCategory } from "./catalog";
import {
  findLastEntryByCategory,
  getEntryDefinitionId,
  getEntryTimestamp,
  getMostRecentEntry,
  inferCategoryFromDefinitionId,
} from "./history";
import {
  CATEGORY_ROTATION,
  STRENGTH_OVERRIDE_WINDOW_MS,
  VO2_RECENCY_THRESHOLD_MS,
  hoursBetween,
} from "./rules";
import type {
  Catalog,
  MicrodoseCategory,
  MicrodoseDefinition,
  MovementStyle,
  Prescription,
  UserContext,
} from "./types";

export type CategoryRuleName = "strength_override" | "vo2_recency" | "rotation";

export type CategoryRule = {
  name: CategoryRuleName;
  select: (ctx: UserContext) => MicrodoseCategory | null;
};

export type CategoryDecision = {
  category: MicrodoseCategory;
  rule: CategoryRuleName | "target";
};

/**
 * Evaluated top to bottom; the first rule returning a category wins.
 * `rotation` always answers, so the list never falls through.
 */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  {
    name: "strength_override",
    select: (ctx) => {
      const signal = ctx.externalStrength;
      if (!signal || signal.sessionType.kind !== "lower") {
        return null;
      }
      const age = ctx.now.getTime() - signal.lastSessionAt.getTime();
      return age < STRENGTH_OVERRIDE_WINDOW_MS ? "gtg" : null;
    },
  },
  {
    name: "vo2_recency",
    select: (ctx) => {
      const lastVo2 = findLastEntryByCategory(ctx.recentSessions, "vo2");
      if (!lastVo2) {
        return "vo2";
      }
      const age = ctx.now.getTime() - getEntryTimestamp(lastVo2).getTime();
      return age > VO2_RECENCY_THRESHOLD_MS ? "vo2" : null;
    },
  },
  {
    name: "rotation",
    select: (ctx) => {
      const last = getMostRecentEntry(ctx.recentSessions);
      const lastCategory = last ? inferCategoryFromDefinitionId(getEntryDefinitionId(last)) : undefined;
      return lastCategory ? CATEGORY_ROTATION[lastCategory] : "vo2";
    },
  },
];

export function determineCategory(
  ctx: UserContext,
  rules: readonly CategoryRule[] = CATEGORY_RULES
): CategoryDecision {
  for (const rule of rules) {
    const category = rule.select(ctx);
    if (category) {
      return { category, rule: rule.name };
    }
  }
  return { category: "vo2", rule: "rotation" };
}

export function selectDefinition(
  catalog: Catalog,
  ctx: UserContext,
  category: MicrodoseCategory
): MicrodoseDefinition {
  const candidates = getDefinitionsByCategory(catalog, category);
  const first = candidates[0];
  if (!first) {
    throw new PrescriptionError(`No microdoses found in category ${category}`);
  }

  switch (category) {
    case "vo2": {
      const lastVo2 = findLastEntryByCategory(ctx.recentSessions, "vo2");
      if (!lastVo2) {
        return first;
      }
      const lastId = getEntryDefinitionId(lastVo2);
      return candidates.find((definition) => definition.id !== lastId) ?? first;
    }
    case "gtg":
      // Multi-definition GTG catalogs always reduce to the first id.
      return first;
    case "mobility": {
      const cursor = ctx.userState.lastMobilityDefId;
      const index = cursor ? candidates.findIndex((definition) => definition.id === cursor) : -1;
      if (index < 0) {
        return first;
      }
      return candidates[(index + 1) % candidates.length];
    }
  }
}

export function computeIntensity(
  definition: MicrodoseDefinition,
  ctx: UserContext
): { reps: number | null; style: MovementStyle | null } {
  const progression = ctx.userState.progressions[definition.id];
  if (progression) {
    return { reps: progression.reps, style: progression.style };
  }

  const block = definition.blocks[0];
  if (!block) {
    return { reps: null, style: null };
  }
  const repsMetric = block.metrics.find((metric) => metric.type === "reps");
  return {
    reps: repsMetric ? repsMetric.default : null,
    style: block.movementStyle,
  };
}

/**
 * Picks the next microdose and its intensity. Pure apart from debug logging;
 * callers load history, state and the strength signal beforehand.
 */
export function prescribeNext(
  catalog: Catalog,
  ctx: UserContext,
  targetCategory?: MicrodoseCategory | null
): Prescription {
  assertValidCatalog(catalog);

  const decision: CategoryDecision = targetCategory
    ? { category: targetCategory, rule: "target" }
    : determineCategory(ctx);
  logDecision(decision, ctx);

  const definition = selectDefinition(catalog, ctx, decision.category);
  const { reps, style } = computeIntensity(definition, ctx);

  return { definition, category: decision.category, reps, style };
}

function logDecision(decision: CategoryDecision, ctx: UserContext) {
  if (decision.rule === "strength_override" && ctx.externalStrength) {
    const hours = hoursBetween(ctx.externalStrength.lastSessionAt, ctx.now);
    console.debug(`[prescription] lower-body strength ${hours.toFixed(1)}h ago; choosing gtg`);
    return;
  }
  console.debug(`[prescription] category ${decision.category} via ${decision.rule}`);
}
