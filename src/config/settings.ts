import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import yaml from 'js-yaml';
import { SettingsSchema, SETTING_KEYS } from './schema.js';
import type { Settings } from '../types/descriptor.js';
import { ConfigError, errorMessage } from '../core/errors.js';

type SettingKey = (typeof SETTING_KEYS)[number];

let configPath = '';
let configData: Settings = {};

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((k) => k === key);
}

function readRaw(path: string): unknown {
  if (!existsSync(path)) return {};
  try {
    return yaml.load(readFileSync(path, 'utf-8')) ?? {};
  } catch (err) {
    throw new ConfigError(`Cannot read settings ${path}: ${errorMessage(err)}`);
  }
}

/** Loads settings from `path`; a missing file means defaults. */
export function init(path: string): void {
  configPath = path;
  const parsed = SettingsSchema.safeParse(readRaw(path));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid settings in ${path}: ${issues}`);
  }
  configData = parsed.data;
}

export function get(key: string): string {
  if (!isSettingKey(key)) return '';
  const value = configData[key];
  if (value == null) return '';
  return Array.isArray(value) ? value.join(',') : String(value);
}

export function set(key: string, value: string): void {
  if (!isSettingKey(key)) {
    throw new ConfigError(`Unknown setting "${key}". Known settings: ${SETTING_KEYS.join(', ')}`);
  }
  const raw = key === 'extra_paths'
    ? value.split(',').map((p) => p.trim()).filter((p) => p.length > 0)
    : value;
  const parsed = SettingsSchema.safeParse({ ...configData, [key]: raw });
  if (!parsed.success) {
    throw new ConfigError(`Invalid value for ${key}: ${parsed.error.issues[0]?.message ?? value}`);
  }
  configData = parsed.data;
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, yaml.dump(configData), 'utf-8');
}

export function all(): Settings {
  return { ...configData };
}
