/**
 * Terminal display implementation with formatted output.
 *
 * Uses chalk for colors. Errors go to stderr, everything else to stdout.
 */

import chalk from 'chalk';
import type { IDisplay } from './i-display.js';

/**
 * Terminal display implementation.
 */
export class TerminalDisplay implements IDisplay {
  public showMessage(message: string): void {
    console.log(message);
  }

  public showError(message: string): void {
    console.error(chalk.red('Error: ') + message);
  }

  public showWarning(message: string): void {
    console.log(chalk.yellow('Warning: ') + message);
  }

  public showSuccess(message: string): void {
    console.log(chalk.green('✓ ') + message);
  }

  /**
   * Display configuration as indented `key: value` lines, one section per
   * heading.
   */
  public showConfig(config: Record<string, unknown>): void {
    console.log(chalk.bold('Configuration:'));
    for (const [section, value] of Object.entries(config)) {
      if (value !== null && typeof value === 'object') {
        console.log(`  ${chalk.cyan(section)}:`);
        for (const [key, inner] of Object.entries(value)) {
          console.log(`    ${key}: ${formatValue(inner)}`);
        }
      } else {
        console.log(`  ${chalk.cyan(section)}: ${formatValue(value)}`);
      }
    }
    console.log('');
  }

  public showLines(lines: readonly string[]): void {
    for (const line of lines) {
      console.log(line);
    }
  }
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
