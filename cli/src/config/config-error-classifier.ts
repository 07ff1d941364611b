/**
 * Configuration error classifier for promptpane.
 *
 * Categorizes configuration loading errors and provides user-facing
 * messages with suggestions.
 */

/**
 * Error category for configuration loading failures.
 */
export type ConfigErrorType = 'syntax' | 'io' | 'unknown';

/**
 * Categorized error details for configuration loading failures.
 */
export interface ConfigErrorDetails {
  /** Error category: syntax, io, or unknown */
  type: ConfigErrorType;
  /** User-friendly error message */
  userMessage: string;
  /** Technical error details from the underlying error */
  technicalDetails: string;
  /** Suggestions to help resolve the error */
  suggestions: string[];
}

/**
 * Error classifier for configuration loading failures.
 *
 * Separates JSON syntax errors from filesystem errors (missing file,
 * permissions) so each gets its own suggestions.
 */
export class ConfigErrorClassifier {
  /**
   * Classify and format a configuration loading error.
   *
   * @param error - The error thrown while reading or parsing the config
   * @param configPath - The path to the config file
   * @returns Formatted error details with categorization and suggestions
   */
  static classify(error: unknown, configPath: string): ConfigErrorDetails {
    const errorMessage = this.extractErrorMessage(error);
    const errorType = this.detectErrorType(error);

    return {
      type: errorType,
      userMessage: this.createUserMessage(errorType),
      technicalDetails: errorMessage,
      suggestions: this.createSuggestions(errorType, errorMessage, configPath),
    };
  }

  /**
   * Build the multi-line message the loader throws.
   */
  static format(error: unknown, configPath: string): string {
    const details = this.classify(error, configPath);
    const lines = [
      details.userMessage,
      '',
      `Config file: ${configPath}`,
      '',
      'Technical details:',
      details.technicalDetails,
    ];

    if (details.suggestions.length > 0) {
      lines.push('', 'Suggestions:');
      for (const suggestion of details.suggestions) {
        lines.push(`  - ${suggestion}`);
      }
    }

    return lines.join('\n');
  }

  private static extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  private static detectErrorType(error: unknown): ConfigErrorType {
    if (error instanceof SyntaxError) {
      return 'syntax';
    }

    if (
      error instanceof Error &&
      'code' in error &&
      typeof error.code === 'string' &&
      ['ENOENT', 'EACCES', 'EISDIR', 'EPERM'].includes(error.code)
    ) {
      return 'io';
    }

    return 'unknown';
  }

  private static createUserMessage(type: ConfigErrorType): string {
    switch (type) {
      case 'syntax': {
        return 'Configuration file is not valid JSON';
      }
      case 'io': {
        return 'Configuration file could not be read';
      }
      case 'unknown': {
        return 'Failed to load configuration file';
      }
    }
  }

  private static createSuggestions(
    type: ConfigErrorType,
    errorMessage: string,
    configPath: string
  ): string[] {
    switch (type) {
      case 'syntax': {
        const suggestions: string[] = [];
        if (errorMessage.includes('Unexpected end of JSON input')) {
          suggestions.push('Check for unclosed braces or brackets');
        } else {
          suggestions.push(
            'Check for trailing commas and unquoted property names'
          );
        }
        suggestions.push('Comments are not allowed in JSON');
        return suggestions;
      }
      case 'io': {
        return [
          `Verify that ${configPath} exists and is a file`,
          'Check file permissions allow reading',
        ];
      }
      case 'unknown': {
        return ['Check the error message above for more details'];
      }
    }
  }
}
