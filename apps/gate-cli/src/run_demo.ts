#!/usr/bin/env node
/**
 * Rotation gate demonstration.
 *
 * Evaluates each scenario of a scenario set file and prints the gain, the
 * vetoed angle and the rotated state. The text is for humans; nothing parses it.
 *
 * Usage:
 *   tsx apps/gate-cli/src/run_demo.ts [--file scenarios.json] [--kappa 0.25] [--log-level debug]
 *
 * Env fallbacks: ROTATION_GATE_SCENARIOS, ROTATION_GATE_KAPPA, LOG_LEVEL.
 */

import process from "node:process";
import pino, { type Logger } from "pino";
import { RotationGate } from "@antifragile/rotation-gate";

import { parseArgs } from "./args";
import { loadScenarioSet } from "./scenario_file";
import { runScenarioSet } from "./report";

export function main(argv: ReadonlyArray<string>, env: NodeJS.ProcessEnv, logger: Logger): void {
  const args = parseArgs(argv, env);
  logger.level = args.logLevel; // --log-level wins over the LOG_LEVEL the logger was built with

  const set = loadScenarioSet(args.file);
  logger.info({ file: args.file, scenarios: set.scenarios.length }, "scenario set loaded");

  const gate = new RotationGate({ kappa: args.kappa ?? set.kappa, logger });
  const { lines, outcomes } = runScenarioSet(set, gate);
  for (const line of lines) console.log(line);

  const vetoed = outcomes.filter((o) => o.vetoed).length;
  console.log(`PASS: ${outcomes.length} scenarios evaluated kappa=${gate.kappa} vetoed=${vetoed}`);
}

/**
 * Runs main and maps a failure to exit code 1, logging it and printing a FAIL marker.
 */
export function runCli(argv: ReadonlyArray<string>, env: NodeJS.ProcessEnv, logger: Logger): number {
  try {
    main(argv, env, logger);
    return 0;
  } catch (err) {
    logger.error({ err }, "demo failed");
    console.error(`FAIL: ${err instanceof Error ? err.message : String(err)}`); // stderr for acceptance scripts.
    return 1;
  }
}

if (require.main === module) {
  const logger = pino({ level: process.env.LOG_LEVEL ?? "info" }, pino.destination(2)); // Logs on stderr; stdout carries the report.
  process.exitCode = runCli(process.argv.slice(2), process.env, logger);
}
