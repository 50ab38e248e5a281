import { Option } from 'commander';
import * as settings from '../config/settings.js';
import { LOG_LEVELS } from '../config/schema.js';
import {
  resolveRunConfig,
  type CommandDefaults,
  type CommandFlags,
  type RunConfig,
} from '../config/resolve.js';
import { loadCatalog } from '../core/catalog.js';
import { getConfigPath } from '../core/userdata.js';
import type { Catalog } from '../types/descriptor.js';

export interface CommandContext {
  config: RunConfig;
  catalog: Catalog;
}

export function logLevelOption(): Option {
  return new Option('--log-level <level>', 'Minimum level written to the log').choices([
    ...LOG_LEVELS,
  ]);
}

export function catalogOption(): Option {
  return new Option('-c, --catalog <path>', 'Catalog file (YAML)');
}

/** Settings file, flags and catalog, resolved in that order. */
export function loadContext(flags: CommandFlags, defaults: CommandDefaults = {}): CommandContext {
  settings.init(getConfigPath());
  const config = resolveRunConfig(flags, settings.all(), process.env, defaults);
  const catalog = loadCatalog(config.catalogPath);
  return { config, catalog };
}

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
