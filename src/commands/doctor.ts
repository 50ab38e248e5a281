import type { Command } from 'commander';
import { accessSync, constants } from 'node:fs';
import { DISPLAY_NAME } from '../config/branding.js';
import { PACKAGE_MANAGERS } from '../config/schema.js';
import { errorMessage } from '../core/errors.js';
import { createRuntime } from '../core/runtime.js';
import { getConfigPath } from '../core/userdata.js';
import { ensureDir, fileExists } from '../utils/fs.js';
import { expandPath } from '../utils/paths.js';
import { ok, fail, warn, info, heading } from '../ui/output.js';
import { catalogOption, loadContext, type CommandContext } from './shared.js';

const TOOLS = ['git', 'powershell', 'pwsh'];

interface DoctorOptions {
  catalog?: string;
}

function tryLoadContext(opts: DoctorOptions): CommandContext | null {
  try {
    return loadContext(opts);
  } catch (err) {
    fail(`Catalog — ${errorMessage(err)}`);
    return null;
  }
}

function isWritable(dir: string): boolean {
  try {
    ensureDir(dir);
    accessSync(dir, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

export function registerDoctor(program: Command): void {
  program
    .command('doctor')
    .description('Check package managers, catalog and scratch space')
    .addOption(catalogOption())
    .action((opts: DoctorOptions) => {
      console.log(`\n${DISPLAY_NAME} Doctor\n`);

      const context = tryLoadContext(opts);
      if (!context) {
        process.exitCode = 1;
        return;
      }
      ok(`Catalog — ${context.config.catalogPath} (${context.catalog.apps.length} apps)`);

      const configPath = getConfigPath();
      info(`Settings — ${fileExists(configPath) ? configPath : 'defaults (no settings file)'}`);

      const { adapters, probe } = createRuntime(context.config, { sinks: [] });

      heading('Package managers');
      const missingManagers = new Set<string>();
      for (const id of PACKAGE_MANAGERS) {
        const adapter = adapters[id];
        const { executable } = adapter.definition;
        if (adapter.isBackendAvailable()) {
          ok(`  ${id} — ${probe.resolve(executable)}`);
        } else {
          warn(`  ${id} — not found`);
          missingManagers.add(id);
        }
      }

      heading('Tools');
      for (const tool of TOOLS) {
        const resolved = probe.resolve(tool);
        if (resolved) {
          ok(`  ${tool} — ${resolved}`);
        } else {
          info(`  ${tool} — not found`);
        }
      }

      const blocked = context.catalog.apps.filter((app) => missingManagers.has(app.installMethod));
      if (blocked.length > 0) {
        heading('Catalog');
        for (const app of blocked) {
          warn(`  ${app.name} needs ${app.installMethod}, which is not installed`);
        }
      }

      console.log('');
      const scratchDir = expandPath(context.config.scratchDir);
      if (isWritable(scratchDir)) {
        ok(`Scratch directory — ${scratchDir}`);
      } else {
        fail(`Scratch directory — ${scratchDir} is not writable`);
      }

      ok('Doctor complete.');
    });
}
