/**
 * Microdose command line.
 * Run with: npm run microdose -- [--data-dir <path>] <command>
 */
import * as dotenv from "dotenv";
dotenv.config({ path: ".env.local" });
dotenv.config(); // fallback to .env
import path from "node:path";
import * as readline from "node:readline/promises";

import {
  cleanupSessions,
  createMicrodoseDeps,
  prescribe,
  recordCompletedSession,
  rollupSessions,
  skipPrescription,
  upgradeIntensity,
  type MicrodoseDeps,
} from "../src/lib/api/microdose-session";
import { USAGE, formatPrescription, parseCommandLine } from "../src/lib/cli";
import { loadConfig } from "../src/lib/config";
import { MICRODOSE_CATEGORIES } from "../src/lib/engine/rules";
import { getDefinitionsByCategory } from "../src/lib/engine/catalog";
import type { MicrodoseCategory, SessionKind } from "../src/lib/engine/types";
import { MicrodoseError, errorMessage } from "../src/lib/errors";

type UserAction = "done" | "skip" | "harder";

const DIVIDER = "-".repeat(41);

async function promptUserAction(rl: readline.Interface): Promise<UserAction> {
  console.log(DIVIDER);
  console.log("Press Enter when done");
  console.log("  's' + Enter to skip");
  console.log("  'h' + Enter to mark 'harder next time'");
  const answer = (await rl.question("> ")).trim().toLowerCase();
  if (answer === "s" || answer === "skip") {
    return "skip";
  }
  if (answer === "h" || answer === "harder") {
    return "harder";
  }
  return "done";
}

async function runNow(
  deps: MicrodoseDeps,
  options: { category: MicrodoseCategory | null; dryRun: boolean; autoComplete: boolean }
) {
  const skipped: SessionKind[] = [];
  const rl = options.dryRun || options.autoComplete ? null : readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  try {
    for (;;) {
      const now = new Date();
      const { prescription } = await prescribe(deps, { now, skipped, targetCategory: options.category });
      console.log("\n" + formatPrescription(prescription) + "\n");

      if (options.dryRun) {
        console.log("[Dry run - not logging session]");
        return;
      }

      const action = rl ? await promptUserAction(rl) : "done";
      switch (action) {
        case "done":
          await recordCompletedSession(deps, prescription, now);
          console.log("\nSession logged.");
          return;
        case "harder": {
          const result = await upgradeIntensity(deps, prescription.definition.id, now);
          if (result.upgraded && result.progression) {
            console.log("\nIntensity increased for next time.");
            console.log(`  Level: ${result.progression.level}`);
            console.log(`  Reps: ${result.progression.reps}`);
          } else {
            console.log("\nNothing to increase for this microdose.");
          }
          return;
        }
        case "skip":
          skipped.push(skipPrescription(prescription, now));
          console.log("\nSkipped. Here is another option:");
          break;
      }
    }
  } finally {
    rl?.close();
  }
}

function printCatalog(deps: MicrodoseDeps) {
  for (const category of MICRODOSE_CATEGORIES) {
    console.log(`${category}:`);
    for (const definition of getDefinitionsByCategory(deps.catalog, category)) {
      console.log(`  ${definition.id.padEnd(24)} ${definition.name}`);
    }
  }
}

async function main() {
  const { command, dataDir, warnings } = parseCommandLine(process.argv.slice(2));
  for (const warning of warnings) {
    console.warn(warning);
  }
  if (command.name === "help") {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const deps = createMicrodoseDeps(dataDir ? { ...config, dataDir: path.resolve(dataDir) } : config);

  switch (command.name) {
    case "now":
      await runNow(deps, command);
      break;
    case "upgrade": {
      const result = await upgradeIntensity(deps, command.definitionId);
      if (result.upgraded && result.progression) {
        console.log(`${command.definitionId}: level ${result.progression.level}, ${result.progression.reps} reps`);
      } else {
        console.log(`${command.definitionId}: unchanged`);
      }
      break;
    }
    case "rollup": {
      const { archived, removed } = await rollupSessions(deps, { cleanup: command.cleanup });
      console.log(`Rolled up ${archived} session(s) to ${deps.paths.archivePath}`);
      if (command.cleanup) {
        console.log(`Removed ${removed} processed WAL file(s)`);
      }
      break;
    }
    case "cleanup": {
      const removed = await cleanupSessions(deps);
      console.log(`Removed ${removed} processed WAL file(s)`);
      break;
    }
    case "catalog":
      printCatalog(deps);
      break;
  }
}

main().catch((error) => {
  console.error(`Error: ${errorMessage(error)}`);
  if (error instanceof MicrodoseError && error.retryable) {
    console.error("This looks temporary; try the command again.");
  }
  process.exitCode = 1;
});
