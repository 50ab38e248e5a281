import type { Command } from 'commander';
import { join } from 'node:path';
import { cleanPaths, formatBytes, runCleanupCommands } from '../core/cleanup.js';
import { errorMessage } from '../core/errors.js';
import { spawnRunner } from '../utils/process.js';
import { die, ok, warn, info } from '../ui/output.js';
import { withSpinner } from '../ui/spinner.js';
import { printTable } from '../ui/table.js';
import { catalogOption, loadContext } from './shared.js';

interface CleanOptions {
  catalog?: string;
  olderThan?: string;
  dryRun?: boolean;
  commands: boolean;
}

function parseDays(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const days = Number(value);
  if (!Number.isFinite(days) || days < 0) {
    throw new Error(`Invalid --older-than value "${value}"`);
  }
  return days;
}

export function registerClean(program: Command): void {
  program
    .command('clean')
    .description('Remove stale caches and temporary files')
    .addOption(catalogOption())
    .option('--older-than <days>', 'Only remove entries older than this many days')
    .option('--dry-run', 'Show what would be removed')
    .option('--no-commands', 'Skip the cleanup commands listed in the catalog')
    .action(async (opts: CleanOptions) => {
      try {
        const { config, catalog } = loadContext(opts);
        const cleanup = catalog.cleanup;
        const olderThanDays = parseDays(opts.olderThan, cleanup?.olderThanDays ?? 7);
        const patterns = [join(config.scratchDir, '*'), ...(cleanup?.paths ?? [])];

        const result = cleanPaths(patterns, { olderThanDays, dryRun: opts.dryRun });

        if (result.removed.length > 0) {
          printTable(['Removed', ''], result.removed.map((path) => [path, '']));
        }
        for (const error of result.errors) {
          warn(`${error.path}: ${error.message}`);
        }

        const verb = opts.dryRun ? 'Would remove' : 'Removed';
        ok(`${verb} ${result.removed.length} item(s), ${formatBytes(result.freedBytes)}.`);

        const commands = cleanup?.commands ?? [];
        if (!opts.commands || commands.length === 0) return;
        if (opts.dryRun) {
          for (const command of commands) info(`Would run: ${command}`);
          return;
        }

        const outcomes = await withSpinner('Running cleanup commands...', () =>
          runCleanupCommands(commands, spawnRunner, config.timeoutMs),
        );
        for (const outcome of outcomes) {
          if (outcome.ok) {
            ok(outcome.command);
          } else {
            warn(`${outcome.command} — ${outcome.detail}`);
          }
        }
      } catch (err) {
        die(errorMessage(err));
      }
    });
}
