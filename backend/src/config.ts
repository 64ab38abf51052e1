/**
 * Cellar Backend — Configuration
 *
 * Central configuration loaded from environment variables with sensible defaults.
 * Engine options come from the same environment through engineOptionsFromEnv.
 */

import { LOG_LEVELS, LogLevel } from '@cellar/engine';

export interface Config {
  /** Server port */
  port: number;
  /** Interface to bind; loopback unless CELLAR_HOST opens it up */
  host: string;
  /** Node environment */
  env: string;
  /** CORS allowed origins (comma-separated); none by default */
  corsOrigins: string[];
  logLevel: LogLevel;
  /** Finished install jobs kept for install_status */
  maxFinishedJobs: number;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const logLevel = env.CELLAR_LOG_LEVEL || 'info';
  return {
    port: parseInt(env.CELLAR_PORT || '3100', 10),
    host: env.CELLAR_HOST || '127.0.0.1',
    env: env.NODE_ENV || 'development',
    corsOrigins: (env.CELLAR_CORS_ORIGINS || '')
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    maxFinishedJobs: positiveInt(env.CELLAR_MAX_JOBS, 100),
  };
}
