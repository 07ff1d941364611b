import fs from 'node:fs';
import path from 'node:path';

/**
 * Validates filesystem paths for CLI commands.
 *
 * Checks existence, file type and read permissions before a command touches
 * a path, so failures read as a short explanation instead of an errno.
 */
export const PathValidator = {
  /**
   * Validates that an input file exists, is a regular file and is readable.
   *
   * @param inputPath - The path to validate (relative or absolute)
   * @returns The absolute, normalized path
   * @throws Error if the path is empty, missing, a directory or unreadable
   *
   * @example
   * ```typescript
   * PathValidator.validateInputFile('./notes/question.md');
   * // Returns: /Users/user/project/notes/question.md
   * ```
   */
  validateInputFile(inputPath: string): string {
    if (!inputPath || inputPath.trim() === '') {
      throw new Error(
        'Input path cannot be empty.\nPlease provide a file to send.'
      );
    }

    const absolutePath = path.resolve(inputPath);

    if (!fs.existsSync(absolutePath)) {
      throw new Error(
        `Input file not found: ${absolutePath}\n` +
          'Please check that the file exists and try again.'
      );
    }

    if (!fs.statSync(absolutePath).isFile()) {
      throw new Error(
        `Input path is not a file: ${absolutePath}\n` +
          'Please provide a path to a text file, not a directory.'
      );
    }

    this.validatePathReadable(absolutePath);
    return absolutePath;
  },

  /**
   * Validates that a path is readable.
   *
   * @param absolutePath - The absolute path to check
   * @throws Error if the path is not readable
   */
  validatePathReadable(absolutePath: string): void {
    try {
      fs.accessSync(absolutePath, fs.constants.R_OK);
    } catch (error) {
      if (
        error instanceof Error &&
        'code' in error &&
        error.code === 'EACCES'
      ) {
        throw new Error(
          `Permission denied: ${absolutePath}\n` +
            'You do not have permission to read this path.\n' +
            'Please check the file permissions and try again.'
        );
      }
      throw error;
    }
  },

  /**
   * Validates a config file path.
   *
   * Use this for explicit config paths given by the user, not for
   * auto-discovery.
   *
   * @param configPath - The config file path to validate
   * @returns The absolute, normalized path
   * @throws Error if the config file does not exist or is not a file
   */
  validateConfigPath(configPath: string): string {
    if (!configPath || configPath.trim() === '') {
      throw new Error(
        'Config file path cannot be empty.\n' +
          'Please provide a valid config file path.'
      );
    }

    const absolutePath = path.resolve(configPath);

    if (!fs.existsSync(absolutePath)) {
      throw new Error(
        `Config file not found: ${absolutePath}\n` +
          'Please check that the config file exists and try again.'
      );
    }

    const stats = fs.statSync(absolutePath);
    if (!stats.isFile()) {
      throw new Error(
        `Config path is not a file: ${absolutePath}\n` +
          'Please provide a path to a configuration file, not a directory.'
      );
    }

    return absolutePath;
  },
};
