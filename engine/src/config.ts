/**
 * Cellar Engine — Configuration
 *
 * EngineOptions are validated and defaulted once, then frozen. The engine
 * never reads process-wide state after construction; front ends (CLI,
 * backend) build the options from their own environment at startup.
 */

import * as os from "os";
import * as path from "path";
import { z } from "zod";

/** Largest delay setTimeout honours; longer ones fire immediately */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const EngineOptionsSchema = z.object({
  /** sql.js install history database */
  state_db_path: z.string().min(1),
  /** Directory holding one wine prefix per bottle */
  prefix_base: z.string().min(1),
  /** Scratch directory for extracted disk images */
  staging_dir: z.string().min(1),
  /** YAML sidecar for manually recorded shortcuts */
  shortcut_sidecar_path: z.string().min(1),
  /** Dependency catalog override (defaults to the one shipped with @cellar/catalog) */
  catalog_path: z.string().min(1).optional(),
  /** Bound for every environment-manager call except the target run */
  command_timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS).default(300_000),
  /** Bound for running the target binary */
  run_timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS).default(1_800_000),
  shortcut_poll_attempts: z.number().int().min(1).default(5),
  shortcut_poll_interval_ms: z.number().int().min(0).default(1_000),
  /** Component ids installed into every bottle ahead of resolved ones */
  baseline_components: z.array(z.string().min(1)).default([]),
  verbose: z.boolean().default(false),
});

export type EngineOptions = z.input<typeof EngineOptionsSchema>;
export type ResolvedEngineOptions = Readonly<z.output<typeof EngineOptionsSchema>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Validate options, apply defaults and freeze the result.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveEngineOptions(options: EngineOptions): ResolvedEngineOptions {
  const parsed = EngineOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid engine options: ${issues}`);
  }
  return Object.freeze({
    ...parsed.data,
    baseline_components: [...parsed.data.baseline_components],
  });
}

// ─── Environment ─────────────────────────────────────────────

/** Bottles' prefix directory for the Flatpak installation */
export const DEFAULT_PREFIX_BASE = path.join(
  os.homedir(),
  ".var",
  "app",
  "com.usebottles.bottles",
  "data",
  "bottles",
  "bottles",
);

/** Cellar's own data directory: $CELLAR_HOME or ~/.cellar */
export function cellarHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.CELLAR_HOME || path.join(os.homedir(), ".cellar");
}

function secondsToMs(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number of seconds, got "${raw}"`);
  }
  return Math.round(value * 1000);
}

/**
 * Engine options from CELLAR_* environment variables, with every path
 * defaulting under `home`.
 *
 *   CELLAR_PREFIX_BASE       bottle prefix directory
 *   CELLAR_STAGING_DIR       disk image extraction directory
 *   CELLAR_CATALOG           dependency catalog override
 *   CELLAR_BASELINE          comma-separated baseline component ids
 *   CELLAR_COMMAND_TIMEOUT   seconds per environment-manager call
 *   CELLAR_RUN_TIMEOUT       seconds for the target run
 *   CELLAR_VERBOSE           "1" or "true" enables logging
 *
 * @throws ConfigError for a malformed timeout
 */
export function engineOptionsFromEnv(
  home: string = cellarHome(),
  env: NodeJS.ProcessEnv = process.env,
): EngineOptions {
  const baseline = env.CELLAR_BASELINE?.split(",")
    .map((id) => id.trim())
    .filter(Boolean);

  return {
    state_db_path: path.join(home, "state.db"),
    prefix_base: env.CELLAR_PREFIX_BASE || DEFAULT_PREFIX_BASE,
    staging_dir: env.CELLAR_STAGING_DIR || path.join(home, "staging"),
    shortcut_sidecar_path: path.join(home, "shortcuts.yaml"),
    catalog_path: env.CELLAR_CATALOG || undefined,
    command_timeout_ms: secondsToMs(env, "CELLAR_COMMAND_TIMEOUT"),
    run_timeout_ms: secondsToMs(env, "CELLAR_RUN_TIMEOUT"),
    baseline_components: baseline,
    verbose: env.CELLAR_VERBOSE === "1" || env.CELLAR_VERBOSE === "true",
  };
}
