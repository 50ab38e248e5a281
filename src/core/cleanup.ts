import { lstatSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import type { ProcessRunner } from '../utils/process.js';
import { expandPath, matchPaths } from '../utils/paths.js';
import { errorMessage } from './errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CleanupOptions {
  olderThanDays: number;
  dryRun?: boolean;
  now?: number;
  env?: Record<string, string | undefined>;
}

export interface CleanupEntryError {
  path: string;
  message: string;
}

export interface CleanupResult {
  removed: string[];
  freedBytes: number;
  errors: CleanupEntryError[];
}

function entrySize(path: string): number {
  const stat = lstatSync(path);
  if (!stat.isDirectory()) return stat.size;
  let total = 0;
  for (const name of readdirSync(path)) {
    total += entrySize(join(path, name));
  }
  return total;
}

/**
 * Removes every entry matched by `patterns` whose modification time is older
 * than the cutoff. Per-entry failures (locked files, permissions) are
 * collected in `errors` and do not stop the sweep.
 */
export function cleanPaths(patterns: readonly string[], options: CleanupOptions): CleanupResult {
  const cutoff = (options.now ?? Date.now()) - options.olderThanDays * DAY_MS;
  const result: CleanupResult = { removed: [], freedBytes: 0, errors: [] };

  for (const pattern of patterns) {
    for (const path of matchPaths(expandPath(pattern, options.env))) {
      try {
        const stat = lstatSync(path);
        if (stat.mtimeMs > cutoff) continue;

        const size = entrySize(path);
        if (!options.dryRun) {
          rmSync(path, { recursive: true, force: true });
        }
        result.removed.push(path);
        result.freedBytes += size;
      } catch (err) {
        result.errors.push({ path, message: errorMessage(err) });
      }
    }
  }

  return result;
}

export interface CommandOutcome {
  command: string;
  ok: boolean;
  detail?: string;
}

/** Runs cleanup commands (e.g. `scoop cache rm *`) in order through the shell. */
export async function runCleanupCommands(
  commands: readonly string[],
  runner: ProcessRunner,
  timeoutMs: number,
): Promise<CommandOutcome[]> {
  const outcomes: CommandOutcome[] = [];
  for (const command of commands) {
    const result = await runner.run(command, [], { timeoutMs, shell: true });
    if (result.timedOut) {
      outcomes.push({ command, ok: false, detail: `timed out after ${timeoutMs / 1000}s` });
    } else if (result.spawnError) {
      outcomes.push({ command, ok: false, detail: result.spawnError });
    } else if (result.exitCode !== 0) {
      outcomes.push({ command, ok: false, detail: `exited with code ${result.exitCode}` });
    } else {
      outcomes.push({ command, ok: true });
    }
  }
  return outcomes;
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}
