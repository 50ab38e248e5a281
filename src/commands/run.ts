import type { Command } from 'commander';
import { selectApps, collectNextSteps } from '../core/catalog.js';
import { errorMessage } from '../core/errors.js';
import { render } from '../core/reporter.js';
import type { ProvisionReport } from '../types/provision.js';
import { createRuntime, type RuntimeOverrides } from '../core/runtime.js';
import { die, info, warn } from '../ui/output.js';
import { askConfirm } from '../ui/prompts.js';
import { catalogOption, loadContext, logLevelOption, parseList } from './shared.js';

interface RunOptions {
  logLevel?: string;
  logFile?: string;
  catalog?: string;
  timeout?: string;
  only?: string;
  email?: string;
  yes?: boolean;
}

/** `overrides` replaces the process runner, downloader or log sinks of the run. */
export function registerRun(program: Command, overrides: RuntimeOverrides = {}): void {
  program
    .command('run')
    .description('Install every catalog application that is not already present')
    .addOption(logLevelOption())
    .addOption(catalogOption())
    .option('--log-file <path>', 'Also append log lines to this file')
    .option('--timeout <seconds>', 'Per-application timeout in seconds')
    .option('--only <names>', 'Comma-separated app names to provision')
    .option('--email <email>', 'Email address used in the follow-up instructions')
    .option('-y, --yes', 'Skip confirmation prompt')
    .action(async (opts: RunOptions) => {
      let report: ProvisionReport;
      let nextSteps: string[];
      try {
        const { config, catalog } = loadContext(opts);
        const apps = selectApps(catalog, parseList(opts.only));

        if (apps.length === 0) {
          info('The catalog lists no applications.');
          return;
        }

        if (!opts.yes) {
          console.log(`\nApplications (${apps.length}):`);
          for (const app of apps) {
            console.log(`  - ${app.name} [${app.installMethod}]`);
          }
          const confirmed = await askConfirm('\nProceed with provisioning?');
          if (!confirmed) {
            console.log('Cancelled.');
            return;
          }
        }

        report = await createRuntime(config, overrides).engine.run(apps);
        nextSteps = collectNextSteps(catalog, apps);
      } catch (err) {
        die(errorMessage(err));
      }

      // The run is complete from here on; per-item failures still exit 0
      let summary: string;
      try {
        summary = render(report, { nextSteps, email: opts.email });
      } catch (err) {
        warn(`Could not render next steps: ${errorMessage(err)}`);
        summary = render(report);
      }
      console.log(`\n${summary}`);
    });
}
