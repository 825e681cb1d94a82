/**
 * Configuration loading.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.iching/config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  const exists = await fileExists(fullPath);

  if (!exists) {
    // Return default config if file doesn't exist
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}
