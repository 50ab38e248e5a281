import { Option, type Command } from 'commander';
import { INSTALL_METHODS } from '../config/schema.js';
import { errorMessage } from '../core/errors.js';
import type { AppDescriptor } from '../types/descriptor.js';
import { die } from '../ui/output.js';
import { printTable } from '../ui/table.js';
import { catalogOption, loadContext } from './shared.js';

interface ListOptions {
  catalog?: string;
  method?: string;
  json?: boolean;
}

function sourceOf(app: AppDescriptor): string {
  switch (app.installMethod) {
    case 'scoop':
    case 'winget':
      return app.packageRef;
    case 'download':
      return app.downloadUrl;
    case 'custom':
      return app.command;
  }
}

export function registerList(program: Command): void {
  program
    .command('list')
    .description('List the applications in the catalog')
    .addOption(catalogOption())
    .addOption(new Option('--method <method>', 'Filter by install method').choices([...INSTALL_METHODS]))
    .option('--json', 'Output as JSON')
    .action((opts: ListOptions) => {
      try {
        const { catalog } = loadContext(opts);
        const apps = opts.method
          ? catalog.apps.filter((app) => app.installMethod === opts.method)
          : catalog.apps;

        if (opts.json) {
          console.log(JSON.stringify(apps, null, 2));
          return;
        }

        if (apps.length === 0) {
          console.log('No applications found.');
          return;
        }

        printTable(
          ['App', 'Method', 'Source'],
          apps.map((app) => [app.name, app.installMethod, sourceOf(app)]),
        );
      } catch (err) {
        die(errorMessage(err));
      }
    });
}
