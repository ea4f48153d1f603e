/**
 * CLI Runner
 *
 * Replays a governance scenario against an in-memory engine.
 * Usage: npm run scenario -- --fixture dual-chamber-delegation.json
 */

import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { parseArgs } from "util";
import { governanceLogger as logger, logError } from "@sealvote/shared";
import { loadGovernanceConfig } from "../config.js";
import { parseScenario, runScenario, type Scenario, type ScenarioReport } from "./scenario.js";

const BUNDLED_FIXTURES = fileURLToPath(new URL("../../fixtures/", import.meta.url));

// ============================================
// CLI ARGUMENTS
// ============================================

interface CliArgs {
  fixture?: string;
  events: boolean;
  help: boolean;
}

function readArgs(): CliArgs {
  const { values } = parseArgs({
    options: {
      fixture: { type: "string", short: "f" },
      events: { type: "boolean", short: "e", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return {
    ...(values.fixture !== undefined ? { fixture: values.fixture } : {}),
    events: values.events === true,
    help: values.help === true,
  };
}

function printHelp(): void {
  console.log(`
SealVote Scenario Runner

Usage:
  npm run scenario -- [options]

Options:
  -f, --fixture <path>    Scenario file (JSON); bundled fixtures are found by name
  -e, --events            Print the full event log
  -h, --help              Show this help message

Examples:
  npm run scenario -- --fixture dual-chamber-delegation.json
  npm run scenario -- --fixture ./my-scenario.json --events
`);
}

// ============================================
// FIXTURE LOADING
// ============================================

async function loadScenario(fixturePath: string): Promise<Scenario> {
  const searchPaths = [
    path.resolve(process.cwd(), fixturePath),
    path.join(BUNDLED_FIXTURES, fixturePath),
  ];

  for (const searchPath of searchPaths) {
    let content: string;
    try {
      content = await fs.readFile(searchPath, "utf-8");
    } catch {
      // Not at this location
      continue;
    }
    logger.info({ path: searchPath }, "Loaded scenario file");
    return parseScenario(JSON.parse(content));
  }

  throw new Error(`Scenario not found: ${fixturePath}`);
}

// ============================================
// OUTPUT FORMATTING
// ============================================

function formatReport(report: ScenarioReport, showEvents: boolean): void {
  console.log("\n" + "=".repeat(80));
  console.log(`  SCENARIO: ${report.name}`);
  console.log("=".repeat(80) + "\n");

  console.log("STEPS:");
  for (const step of report.steps) {
    const mark = step.expected ? (step.ok ? "ok  " : "rej ") : "FAIL";
    const code = step.code !== undefined ? ` (${step.code})` : "";
    console.log(`  [${mark}] t+${String(step.at).padStart(6)}  ${step.op.padEnd(20)} as ${step.as}${code}`);
  }

  console.log("\nPROPOSALS:");
  for (const p of report.proposals) {
    console.log(`  ${p.label}: ${p.status.toUpperCase()}${p.isExecuted ? " (executed)" : ""}`);
    console.log(`    capital    yes ${p.yesCapital}  no ${p.noCapital}`);
    console.log(`    community  yes ${p.yesCommunity}  no ${p.noCommunity}`);
    console.log(`    reveals    ${p.revealCount}/${p.commitCount}`);
    if (p.executionUnlocksAt > 0) {
      console.log(`    unlocks at ${p.executionUnlocksAt}`);
    }
  }

  console.log("\nTREASURY:");
  for (const entry of report.treasury) {
    console.log(`  ${entry.label}: ${entry.balance}`);
  }

  if (report.incentives.length > 0) {
    console.log("\nREVEAL INCENTIVES:");
    for (const entry of report.incentives) {
      console.log(`  ${entry.alias}: ${entry.amount}`);
    }
  }

  if (showEvents) {
    console.log("\nEVENTS:");
    for (const event of report.events) {
      console.log(`  #${event.sequence} @${event.at} ${event.type}`);
    }
  }

  console.log("\n" + "=".repeat(80) + "\n");
}

// ============================================
// MAIN
// ============================================

async function main(): Promise<void> {
  const args = readArgs();

  if (args.help) {
    printHelp();
    return;
  }
  if (!args.fixture) {
    console.error("Error: --fixture is required\n");
    printHelp();
    process.exitCode = 1;
    return;
  }

  const config = loadGovernanceConfig();
  logger.info({ revealRebate: config.revealRebate.toString() }, "Configuration loaded");

  const scenario = await loadScenario(args.fixture);
  const report = runScenario(scenario, config);
  formatReport(report, args.events);

  if (report.unexpected.length > 0) {
    process.exitCode = 2;
  }
}

main().catch((error: unknown) => {
  logError(error, { component: "cli" }, "Scenario run failed", logger);
  process.exitCode = 1;
});
