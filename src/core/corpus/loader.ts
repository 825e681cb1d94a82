/**
 * Corpus loading: a user file from config, or the bundled names-only corpus.
 */
import * as path from 'node:path';
import { resolveDataPath } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { CorpusSchema } from './schema.js';
import { CorpusTextLookup } from './lookup.js';

const log = logger.child('corpus');

export const BUNDLED_CORPUS_FILE = 'corpus.yaml';

export function getBundledCorpusPath(): string {
  return resolveDataPath(BUNDLED_CORPUS_FILE);
}

/**
 * Load a corpus file. Relative paths resolve against the project root.
 */
export async function loadCorpus(
  corpusPath?: string,
  projectRoot: string = process.cwd()
): Promise<CorpusTextLookup> {
  const fullPath = corpusPath ? path.resolve(projectRoot, corpusPath) : getBundledCorpusPath();
  log.debug('Loading corpus', { path: fullPath });

  const corpus = await loadYamlWithSchema(fullPath, CorpusSchema, ErrorCodes.INVALID_CORPUS);
  const lookup = new CorpusTextLookup(corpus);

  log.debug('Corpus loaded', { path: fullPath, hexagrams: lookup.size });
  return lookup;
}
