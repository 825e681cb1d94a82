/**
 * Session stand-in for command tests: fixture corpus, all-heads caster.
 */
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import type { OutputFormat } from '../../../../src/core/config/schema.js';
import { CoinCaster } from '../../../../src/core/divination/coin-caster.js';
import type { ReadingSession } from '../../../../src/core/session/loader.js';
import { testLookup } from '../formatters/fixtures.js';

export function testSession(format: OutputFormat = 'full'): ReadingSession {
  const defaults = getDefaultConfig();
  return {
    config: { ...defaults, output: { format, colors: false } },
    lookup: testLookup,
    caster: new CoinCaster({ name: 'heads', flip: () => true }),
  };
}
