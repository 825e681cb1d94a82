/**
 * `iching interpret <input>`: reading from a written notation.
 */
import { Command, Option } from 'commander';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { readingFromNotation } from '../../core/reading/operations.js';
import { logger as log } from '../../utils/logger.js';
import { OUTPUT_FORMATS, openCommandSession, renderReading, type ReadingCommandOptions } from './reading-helpers.js';

/**
 * Create the interpret command.
 */
export function createInterpretCommand(): Command {
  return new Command('interpret')
    .description('Interpret a hexagram number, glyph, line sequence or transition')
    .argument('<input>', 'e.g. 1, ䷀, 7,8,9,6,7,8, 32→34 or 32->34')
    .option('-q, --question <text>', 'Question to record with the reading')
    .addOption(new Option('-f, --format <format>', 'Output format (default: from config)').choices(OUTPUT_FORMATS))
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (input: string, options: ReadingCommandOptions) => {
      try {
        await runInterpret(input, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runInterpret(input: string, options: ReadingCommandOptions): Promise<void> {
  const session = await openCommandSession(options);
  const reading = readingFromNotation(input, options.question);
  console.log(renderReading(reading, session, options.format));
}
