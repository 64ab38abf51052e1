/**
 * Cellar CLI — Configuration
 *
 * Central location for CLI paths and engine options.
 * All Cellar data lives under ~/.cellar unless CELLAR_HOME says otherwise.
 */

import * as fs from "fs";
import { InvalidArgumentError } from "commander";
import { cellarHome, engineOptionsFromEnv, EngineOptions } from "@cellar/engine";

export interface CliSettings {
  verbose?: boolean;
  /** Bound for the target run, overriding CELLAR_RUN_TIMEOUT */
  runTimeoutSeconds?: number;
}

/**
 * Ensure the Cellar data directory exists.
 */
export function ensureDirectories(home: string): void {
  fs.mkdirSync(home, { recursive: true });
}

/**
 * Build EngineOptions from the environment and command-line flags.
 */
export function getEngineOptions(
  settings: CliSettings = {},
  env: NodeJS.ProcessEnv = process.env,
): EngineOptions {
  const home = cellarHome(env);
  ensureDirectories(home);

  const options = engineOptionsFromEnv(home, env);
  return {
    ...options,
    verbose: settings.verbose || options.verbose,
    ...(settings.runTimeoutSeconds !== undefined
      ? { run_timeout_ms: Math.round(settings.runTimeoutSeconds * 1000) }
      : {}),
  };
}

/**
 * Parse a positive number of seconds from a command-line flag.
 */
export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError(`Expected a positive number of seconds, got "${value}"`);
  }
  return seconds;
}
