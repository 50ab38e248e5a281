import { envVar } from './branding.js';
import type { Settings } from '../types/descriptor.js';
import { parseLogLevel, type LogLevel } from '../core/logger.js';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_TIMEOUT_MS } from '../core/engine.js';
import { getBundledCatalogPath, getDefaultScratchDir } from '../core/userdata.js';

export interface CommandFlags {
  logLevel?: string;
  logFile?: string;
  catalog?: string;
  timeout?: string;
}

export interface RunConfig {
  logLevel: LogLevel;
  logFile?: string;
  catalogPath: string;
  scratchDir: string;
  timeoutMs: number;
  extraPaths: string[];
}

type Env = Record<string, string | undefined>;

function pickLevel(source: string, value: string | undefined): LogLevel | undefined {
  if (value === undefined || value === '') return undefined;
  const level = parseLogLevel(value);
  if (!level) {
    throw new ConfigError(`Invalid log level "${value}" from ${source} (use Debug, Info, Warning or Error)`);
  }
  return level;
}

function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new ConfigError(`Invalid timeout "${value}" (expected a positive number of seconds)`);
  }
  return seconds;
}

/** Per-command defaults, consulted after flags, environment and settings. */
export interface CommandDefaults {
  logLevel?: LogLevel;
}

/**
 * Layers command-line flags over environment variables over the settings
 * file over built-in defaults.
 */
export function resolveRunConfig(
  flags: CommandFlags,
  settings: Settings,
  env: Env = process.env,
  defaults: CommandDefaults = {},
): RunConfig {
  const logLevel =
    pickLevel('--log-level', flags.logLevel) ??
    pickLevel(envVar('LOG_LEVEL'), env[envVar('LOG_LEVEL')]) ??
    settings.log_level ??
    defaults.logLevel ??
    'Info';

  const timeoutSeconds = flags.timeout !== undefined
    ? parseTimeoutSeconds(flags.timeout)
    : settings.timeout_seconds;

  return {
    logLevel,
    logFile: flags.logFile ?? settings.log_file,
    catalogPath: flags.catalog ?? env[envVar('CATALOG')] ?? settings.catalog ?? getBundledCatalogPath(),
    scratchDir: settings.scratch_dir ?? getDefaultScratchDir(),
    timeoutMs: timeoutSeconds !== undefined ? timeoutSeconds * 1000 : DEFAULT_TIMEOUT_MS,
    extraPaths: settings.extra_paths ?? [],
  };
}
