/**
 * Everything a front end needs before it can build readings: config, the
 * logger level, the text corpus and a caster on the configured source.
 */
import { loadConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { loadCorpus } from '../corpus/loader.js';
import type { TextLookup } from '../corpus/lookup.js';
import { CoinCaster } from '../divination/coin-caster.js';
import { getRandomSource } from '../divination/random-source.js';
import { logger } from '../../utils/logger.js';

export interface ReadingSession {
  config: Config;
  lookup: TextLookup;
  caster: CoinCaster;
}

export async function openSession(projectRoot: string, configPath?: string): Promise<ReadingSession> {
  const config = await loadConfig(projectRoot, configPath);
  logger.setLevel(config.logging.level);

  const lookup = await loadCorpus(config.corpus.path, projectRoot);
  const caster = new CoinCaster(getRandomSource(config.random.source));

  return { config, lookup, caster };
}
