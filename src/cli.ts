import { Command } from 'commander';
import { APP_NAME, DESCRIPTION } from './config/branding.js';
import {
  registerRun,
  registerStatus,
  registerList,
  registerDoctor,
  registerClean,
  registerConfig,
  registerVersion,
} from './commands/index.js';

const program = new Command()
  .name(APP_NAME)
  .description(
    `${DESCRIPTION}: installs the applications listed in a catalog through\n` +
      'scoop, winget, direct downloads or custom commands, skipping whatever is already present.',
  )
  .enablePositionalOptions()
  .showHelpAfterError(true);

// Register all commands
registerRun(program);
registerStatus(program);
registerList(program);
registerDoctor(program);
registerClean(program);
registerConfig(program);
registerVersion(program);

await program.parseAsync();
