import { homedir, tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync } from 'node:fs';
import { APP_NAME, HOME_DIR, envVar } from '../config/branding.js';

// ── Directory constants ─────────────────────────────────────────────

const CONFIG_FILE = 'config.yaml';
const CATALOG_DIR = 'catalog';
const DEFAULT_CATALOG_FILE = 'default.yaml';

// ── Path resolution ─────────────────────────────────────────────────

export function getHomeRoot(): string {
  return process.env[envVar('HOME')] ?? join(homedir(), HOME_DIR);
}

export function getConfigPath(): string {
  return join(getHomeRoot(), CONFIG_FILE);
}

export function getDefaultScratchDir(): string {
  return join(tmpdir(), APP_NAME);
}

/**
 * Catalog shipped with the package. Looked up relative to this module so it
 * resolves from both `src/core/` and the bundled `dist/`.
 */
export function getBundledCatalogPath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    resolve(here, '..', CATALOG_DIR, DEFAULT_CATALOG_FILE),
    resolve(here, '..', '..', CATALOG_DIR, DEFAULT_CATALOG_FILE),
  ];
  return candidates.find((path) => existsSync(path)) ?? candidates[candidates.length - 1];
}
