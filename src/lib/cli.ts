import type { MicrodoseCategory, Prescription } from "./engine/types";
import { microdoseCategorySchema } from "./validation";

export type CliCommand =
  | { name: "now"; category: MicrodoseCategory | null; dryRun: boolean; autoComplete: boolean }
  | { name: "upgrade"; definitionId: string }
  | { name: "rollup"; cleanup: boolean }
  | { name: "cleanup" }
  | { name: "catalog" }
  | { name: "help" };

export type ParsedCommandLine = {
  command: CliCommand;
  dataDir: string | null;
  warnings: string[];
};

export const USAGE = `Usage: microdose [--data-dir <path>] <command>

Commands:
  now [--category vo2|gtg|mobility] [--dry-run] [--auto-complete]
                         Prescribe the next microdose (default)
  upgrade <definition-id>
                         Make a microdose harder next time
  rollup [--cleanup]     Move logged sessions into the CSV archive
  cleanup                Delete processed WAL segments
  catalog                List available microdoses`;

/** Parses arguments after the script name. Throws on unusable input. */
export function parseCommandLine(argv: string[]): ParsedCommandLine {
  const warnings: string[] = [];
  const positional: string[] = [];
  const flags = new Set<string>();
  let dataDir: string | null = null;
  let categoryArg: string | null = null;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--data-dir" || arg === "--category") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`${arg} requires a value`);
      }
      if (arg === "--data-dir") {
        dataDir = value;
      } else {
        categoryArg = value;
      }
      i++;
    } else if (arg.startsWith("--")) {
      flags.add(arg);
    } else {
      positional.push(arg);
    }
  }

  const [name = "now", ...rest] = positional;
  let command: CliCommand;

  switch (name) {
    case "now": {
      let category: MicrodoseCategory | null = null;
      if (categoryArg !== null) {
        const parsed = microdoseCategorySchema.safeParse(categoryArg.toLowerCase());
        if (parsed.success) {
          category = parsed.data;
        } else {
          warnings.push(`Unknown category: ${categoryArg}. Using default selection.`);
        }
      }
      command = {
        name: "now",
        category,
        dryRun: flags.has("--dry-run"),
        autoComplete: flags.has("--auto-complete"),
      };
      break;
    }
    case "upgrade": {
      const definitionId = rest[0];
      if (!definitionId) {
        throw new Error("upgrade requires a definition id");
      }
      command = { name: "upgrade", definitionId };
      break;
    }
    case "rollup":
      command = { name: "rollup", cleanup: flags.has("--cleanup") };
      break;
    case "cleanup":
      command = { name: "cleanup" };
      break;
    case "catalog":
      command = { name: "catalog" };
      break;
    case "help":
      command = { name: "help" };
      break;
    default:
      throw new Error(`Unknown command: ${name}`);
  }

  if (flags.has("--help")) {
    command = { name: "help" };
  }

  return { command, dataDir, warnings };
}

export function formatPrescription(prescription: Prescription): string {
  const { definition, reps, style } = prescription;
  const seconds = definition.suggestedDurationSeconds;
  const lines = [
    `${prescription.category.toUpperCase()} MICRODOSE`,
    "",
    `  ${definition.name}`,
    `  Duration: ~${seconds} seconds (${Math.floor(seconds / 60)} min)`,
  ];

  if (reps !== null) {
    lines.push(`  -> ${reps} reps`);
  }
  if (style?.type === "burpee") {
    lines.push(`  -> Style: ${style.style}`);
  } else if (style?.type === "band") {
    lines.push(`  -> Band: ${style.band ?? "none"}`);
  }
  if (definition.referenceUrl) {
    lines.push("", `  Reference: ${definition.referenceUrl}`);
  }

  return lines.join("\n");
}
