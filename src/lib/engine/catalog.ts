import { seedMicrodoses, seedMovements } from "../data/catalog";
import { CatalogValidationError } from "../errors";
import { MICRODOSE_CATEGORIES } from "./rules";
import type { Catalog, MicrodoseCategory, MicrodoseDefinition, Movement } from "./types";

const validatedCatalogs = new WeakSet<Catalog>();
let defaultCatalog: Catalog | undefined;

export function buildCatalog(movements: Movement[], microdoses: MicrodoseDefinition[]): Catalog {
  return {
    movements: Object.fromEntries(movements.map((movement) => [movement.id, movement])),
    microdoses: Object.fromEntries(microdoses.map((definition) => [definition.id, definition])),
  };
}

/**
 * Lists every consistency problem in the catalog. Empty means valid.
 */
export function validateCatalog(catalog: Catalog): string[] {
  const issues: string[] = [];

  for (const [key, movement] of Object.entries(catalog.movements)) {
    if (!key || !movement.id) {
      issues.push("Movement has empty id");
    }
    if (key !== movement.id) {
      issues.push(`Movement key '${key}' does not match movement.id '${movement.id}'`);
    }
    if (!movement.name) {
      issues.push(`Movement '${key}' has empty name`);
    }
  }

  for (const [key, definition] of Object.entries(catalog.microdoses)) {
    if (!key || !definition.id) {
      issues.push("Microdose definition has empty id");
    }
    if (key !== definition.id) {
      issues.push(`Microdose key '${key}' does not match definition.id '${definition.id}'`);
    }
    if (!definition.name) {
      issues.push(`Microdose '${key}' has empty name`);
    }
    if (definition.blocks.length === 0) {
      issues.push(`Microdose '${key}' has no blocks`);
    }

    for (const block of definition.blocks) {
      if (!Object.hasOwn(catalog.movements, block.movementId)) {
        issues.push(`Microdose '${key}' references unknown movement '${block.movementId}'`);
      }
      for (const metric of block.metrics) {
        if (metric.type === "reps") {
          if (metric.min > metric.max) {
            issues.push(`Microdose '${key}': min reps ${metric.min} > max ${metric.max}`);
          }
          if (metric.default < metric.min) {
            issues.push(`Microdose '${key}': default reps ${metric.default} < min ${metric.min}`);
          }
          if (metric.default > metric.max) {
            issues.push(`Microdose '${key}': default reps ${metric.default} > max ${metric.max}`);
          }
        } else if (!metric.default) {
          issues.push(`Microdose '${key}': band metric '${metric.key}' has empty default`);
        }
      }
    }
  }

  const definitions = Object.values(catalog.microdoses);
  for (const category of MICRODOSE_CATEGORIES) {
    if (!definitions.some((definition) => definition.category === category)) {
      issues.push(`Catalog has no ${category} microdoses`);
    }
  }

  return issues;
}

/**
 * Throws `CatalogValidationError` unless the catalog is consistent.
 * Validated catalogs are remembered by identity.
 */
export function assertValidCatalog(catalog: Catalog): void {
  if (validatedCatalogs.has(catalog)) {
    return;
  }
  const issues = validateCatalog(catalog);
  if (issues.length > 0) {
    throw new CatalogValidationError(issues);
  }
  validatedCatalogs.add(catalog);
}

/** The built-in catalog: validated and deep-frozen on first use, then shared. */
export function getDefaultCatalog(): Catalog {
  if (!defaultCatalog) {
    const catalog = deepFreeze(buildCatalog(seedMovements, seedMicrodoses));
    assertValidCatalog(catalog);
    defaultCatalog = catalog;
  }
  return defaultCatalog;
}

export function getDefinitionsByCategory(
  catalog: Catalog,
  category: MicrodoseCategory
): MicrodoseDefinition[] {
  return Object.values(catalog.microdoses)
    .filter((definition) => definition.category === category)
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

export function getDefinition(catalog: Catalog, definitionId: string): MicrodoseDefinition | undefined {
  return Object.hasOwn(catalog.microdoses, definitionId) ? catalog.microdoses[definitionId] : undefined;
}

/** Movement of the definition's first block. */
export function getPrimaryMovement(catalog: Catalog, definition: MicrodoseDefinition): Movement | undefined {
  const block = definition.blocks[0];
  if (!block || !Object.hasOwn(catalog.movements, block.movementId)) {
    return undefined;
  }
  return catalog.movements[block.movementId];
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
