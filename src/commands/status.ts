import type { Command } from 'commander';
import { selectApps } from '../core/catalog.js';
import { errorMessage } from '../core/errors.js';
import { createRuntime } from '../core/runtime.js';
import { die } from '../ui/output.js';
import { printTable } from '../ui/table.js';
import { catalogOption, loadContext, logLevelOption, parseList } from './shared.js';

interface StatusOptions {
  logLevel?: string;
  catalog?: string;
  only?: string;
  json?: boolean;
}

export function registerStatus(program: Command): void {
  program
    .command('status')
    .description('Show which catalog applications are already installed')
    .addOption(logLevelOption())
    .addOption(catalogOption())
    .option('--only <names>', 'Comma-separated app names to check')
    .option('--json', 'Output as JSON')
    .action(async (opts: StatusOptions) => {
      try {
        const { config, catalog } = loadContext(
          { catalog: opts.catalog, logLevel: opts.logLevel },
          { logLevel: 'Warning' },
        );
        const apps = selectApps(catalog, parseList(opts.only));
        const { detector } = createRuntime(config);

        const rows: { name: string; method: string; installed: boolean; via: string }[] = [];
        for (const app of apps) {
          const detection = await detector.detect(app);
          rows.push({
            name: app.name,
            method: app.installMethod,
            installed: detection.found,
            via: detection.matchedPath ?? detection.method ?? '',
          });
        }

        if (opts.json) {
          console.log(JSON.stringify(rows, null, 2));
          return;
        }

        printTable(
          ['App', 'Method', 'Installed', 'Detected via'],
          rows.map((r) => [r.name, r.method, r.installed ? 'yes' : 'no', r.via]),
        );
        const missing = rows.filter((r) => !r.installed).length;
        console.log(`${rows.length - missing}/${rows.length} installed, ${missing} missing.`);
      } catch (err) {
        die(errorMessage(err));
      }
    });
}
