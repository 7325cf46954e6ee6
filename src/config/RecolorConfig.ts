/**
 * RecolorConfig - run settings
 *
 * @file src/config/RecolorConfig.ts
 *
 * @remarks
 * There is no config file. Settings come from defaults, then environment
 * variables, then command-line flags, later sources winning.
 */

import type { LogLevel } from '../interfaces/ILogger.js';
import { isLogLevel } from '../interfaces/ILogger.js';

export type Env = Record<string, string | undefined>;

export interface RecolorConfig {
  /** Colorize every match in a line, not only the first */
  global: boolean;
  logLevel: LogLevel;
  /** Colors in recolor's own diagnostics (never affects the colorized data) */
  diagnosticColors: boolean;
}

export interface CliFlags {
  global?: boolean;
  verbose?: boolean;
}

export const DEFAULT_CONFIG: RecolorConfig = {
  global: false,
  logLevel: 'warn',
  diagnosticColors: true,
};

/**
 * Read overrides from the environment.
 *
 * - RECOLOR_LOG: debug | info | warn | error
 * - DEBUG: any value turns on debug logging when RECOLOR_LOG is unset
 * - NO_COLOR: any non-empty value disables colored diagnostics
 */
export function loadEnvConfig(env: Env): Partial<RecolorConfig> {
  const config: Partial<RecolorConfig> = {};

  const level = env.RECOLOR_LOG?.trim().toLowerCase();
  if (level && isLogLevel(level)) {
    config.logLevel = level;
  } else if (env.DEBUG) {
    config.logLevel = 'debug';
  }

  if (env.NO_COLOR) {
    config.diagnosticColors = false;
  }

  return config;
}

export function resolveConfig(flags: CliFlags, env: Env): RecolorConfig {
  const config: RecolorConfig = { ...DEFAULT_CONFIG, ...loadEnvConfig(env) };

  if (flags.global !== undefined) {
    config.global = flags.global;
  }
  if (flags.verbose) {
    config.logLevel = 'debug';
  }

  return config;
}
