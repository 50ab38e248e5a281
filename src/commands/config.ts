import type { Command } from 'commander';
import * as settings from '../config/settings.js';
import { errorMessage } from '../core/errors.js';
import { getConfigPath } from '../core/userdata.js';
import { die } from '../ui/output.js';

export function registerConfig(program: Command): void {
  const cmd = program
    .command('config')
    .description('Manage user settings');

  cmd
    .command('set')
    .description('Set a config value')
    .argument('<key>', 'Config key')
    .argument('<value>', 'Config value (comma-separated for extra_paths)')
    .action((key: string, value: string) => {
      try {
        settings.init(getConfigPath());
        settings.set(key, value);
        console.log(`Set ${key} = ${value}`);
      } catch (err) {
        die(errorMessage(err));
      }
    });

  cmd
    .command('get')
    .description('Get a config value')
    .argument('<key>', 'Config key')
    .action((key: string) => {
      try {
        settings.init(getConfigPath());
        const value = settings.get(key);
        if (value) {
          console.log(value);
        }
      } catch (err) {
        die(errorMessage(err));
      }
    });

  cmd
    .command('path')
    .description('Print the settings file location')
    .action(() => {
      console.log(getConfigPath());
    });
}
