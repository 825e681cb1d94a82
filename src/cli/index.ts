/**
 * CLI program.
 */
import { Command } from 'commander';
import { getPackageVersion } from '../utils/file-system.js';
import { createCastCommand } from './commands/cast.js';
import { createInterpretCommand } from './commands/interpret.js';

const VERSION = getPackageVersion();

/** Create the CLI program. `cast` runs when no command is named. */
export function createCli(): Command {
  const program = new Command()
    .name('iching')
    .description('Cast and interpret I Ching hexagrams')
    .version(VERSION);

  program.addCommand(createCastCommand(), { isDefault: true });
  program.addCommand(createInterpretCommand());
  return program;
}
