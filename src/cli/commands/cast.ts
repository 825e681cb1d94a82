/**
 * `iching cast`: three-coin cast, or a reading from explicit line values.
 */
import { Command, Option } from 'commander';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { cast } from '../../core/reading/operations.js';
import { logger as log } from '../../utils/logger.js';
import { OUTPUT_FORMATS, openCommandSession, renderReading, type ReadingCommandOptions } from './reading-helpers.js';

interface CastCommandOptions extends ReadingCommandOptions {
  lines?: string;
}

/**
 * Create the cast command.
 */
export function createCastCommand(): Command {
  return new Command('cast')
    .description('Cast a reading with three coins per line')
    .option('-l, --lines <values>', 'Use six line values instead of coins, bottom first (e.g. 7,8,9,6,7,8)')
    .option('-q, --question <text>', 'Question to record with the reading')
    .addOption(new Option('-f, --format <format>', 'Output format (default: from config)').choices(OUTPUT_FORMATS))
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (options: CastCommandOptions) => {
      try {
        await runCast(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runCast(options: CastCommandOptions): Promise<void> {
  const session = await openCommandSession(options);
  const reading = cast({
    lines: options.lines,
    caster: session.caster,
    question: options.question,
  });
  console.log(renderReading(reading, session, options.format));
}
