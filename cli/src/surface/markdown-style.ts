/**
 * Light markdown highlighting for terminal surfaces.
 */

import chalk from 'chalk';

const FENCE = /^\s*(```|~~~)/;
const HEADING = /^\s{0,3}#{1,6}\s/;
const BULLET = /^(\s*)([-*+]|\d+\.)(\s)/;
const QUOTE = /^\s*>/;

/**
 * Styles lines one at a time, tracking whether a code fence is open.
 */
export class MarkdownStyler {
  private inFence = false;

  /**
   * Style one source line, before it is wrapped into the box.
   */
  style(line: string): string {
    if (FENCE.test(line)) {
      this.inFence = !this.inFence;
      return chalk.gray(line);
    }
    if (this.inFence) {
      return chalk.green(line);
    }
    if (HEADING.test(line)) {
      return chalk.bold.cyan(line);
    }
    if (QUOTE.test(line)) {
      return chalk.dim(line);
    }
    return line.replace(
      BULLET,
      (_match, indent: string, marker: string, space: string) =>
        indent + chalk.yellow(marker) + space
    );
  }
}
