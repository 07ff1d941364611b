/**
 * Configuration loader for promptpane.
 *
 * Reads JSON configuration from disk and validates it against the IConfig
 * schema.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { PathValidator } from '../utils/path-validator.js';
import { ConfigErrorClassifier } from './config-error-classifier.js';
import { validateAndMerge } from './config-validator.js';
import type { IConfigLoader } from './i-config-loader.js';
import type { IConfig } from './i-config.js';

/** File name looked up in the working directory when no path is given. */
export const DEFAULT_CONFIG_FILE = 'promptpane.config.json';

/**
 * Configuration loader class.
 */
export class ConfigLoader implements IConfigLoader {
  /**
   * @param cwd - Directory searched for the default config file
   */
  constructor(private readonly cwd: string = process.cwd()) {}

  /**
   * Load configuration from a file path.
   *
   * Searches for configuration in the following order:
   * 1. Provided configPath parameter
   * 2. promptpane.config.json in the working directory
   * 3. Default configuration
   *
   * @param configPath - Optional path to configuration file
   * @returns Validated configuration object
   * @throws Error if config file is malformed or validation fails
   */
  async load(configPath?: string): Promise<IConfig> {
    let resolvedPath: string | null = null;

    if (configPath === undefined) {
      const defaultPath = path.resolve(this.cwd, DEFAULT_CONFIG_FILE);
      if (existsSync(defaultPath)) {
        resolvedPath = defaultPath;
      }
    } else {
      // Reject empty strings at the API boundary
      if (configPath.trim() === '') {
        throw new Error(
          'Config file path cannot be empty.\n' +
            'Please provide a valid config file path.'
        );
      }
      resolvedPath = PathValidator.validateConfigPath(
        path.resolve(this.cwd, configPath)
      );
    }

    if (!resolvedPath) {
      return validateAndMerge({});
    }

    let userConfig: unknown;
    try {
      const raw = await readFile(resolvedPath, 'utf8');
      userConfig = JSON.parse(raw);
    } catch (error) {
      throw new Error(ConfigErrorClassifier.format(error, resolvedPath));
    }

    try {
      return validateAndMerge(userConfig);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`${message}\n\nConfig file: ${resolvedPath}`);
    }
  }
}
