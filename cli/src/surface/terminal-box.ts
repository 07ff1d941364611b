/**
 * Box layout for terminal surfaces.
 *
 * Content rows are laid out by cli-table3 as a borderless one-column table,
 * which wraps long lines at word boundaries and pads or truncates by
 * display width. The rounded border is drawn around the rows it returns.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { ContentType, SurfaceGeometry } from './i-surface.js';
import { MarkdownStyler } from './markdown-style.js';

/**
 * Everything needed to draw one surface.
 */
export interface BoxFrame {
  readonly geometry: SurfaceGeometry;
  readonly lines: readonly string[];
  readonly contentType: ContentType;
  /** Shown in the bottom border, e.g. "q close · t export". */
  readonly footer?: string;
}

const LAYOUT_CHARS: Record<string, string> = {
  'top': '',
  'top-mid': '',
  'top-left': '',
  'top-right': '',
  'bottom': '',
  'bottom-mid': '',
  'bottom-left': '',
  'bottom-right': '',
  'left': '',
  'left-mid': '',
  'mid': '',
  'mid-mid': '',
  'right': '',
  'right-mid': '',
  'middle': '',
};

const LAYOUT_STYLE: {
  'padding-left': number;
  'padding-right': number;
  head: string[];
  border: string[];
} = {
  'padding-left': 0,
  'padding-right': 0,
  head: [],
  border: [],
};

/**
 * Lay out `lines` in a column `width` display columns wide.
 *
 * Every returned row is exactly `width` columns. With `wordWrap` a long line
 * becomes several rows; without it, or for a single word wider than the
 * column, the row is cut with an ellipsis.
 */
export function layoutRows(
  lines: readonly string[],
  width: number,
  wordWrap: boolean
): string[] {
  if (lines.length === 0) {
    return [];
  }

  const table = new Table({
    chars: LAYOUT_CHARS,
    style: LAYOUT_STYLE,
    colWidths: [width],
    wordWrap,
  });
  for (const line of lines) {
    table.push([line.replaceAll('\t', '  ')]);
  }

  return table
    .toString()
    .split('\n')
    .filter((row) => row.length > 0);
}

/**
 * Draw a rounded box around the frame's content.
 *
 * The content area is `geometry.width` x `geometry.height`; the border adds
 * one column on each side and one row above and below. Wrapped rows past
 * the height are cut, and the bottom border reports how many were hidden.
 *
 * @returns Box rows, top border first
 */
export function renderBox(frame: BoxFrame): string[] {
  const { width, height } = frame.geometry;
  const border = chalk.gray;

  const styler =
    frame.contentType === 'markdown' ? new MarkdownStyler() : undefined;
  const source = styler
    ? frame.lines.map((line) => styler.style(line))
    : frame.lines;

  const laidOut = layoutRows(source, width, true);
  const hidden = Math.max(laidOut.length - height, 0);
  const visible = laidOut.slice(0, height);
  while (visible.length < height) {
    visible.push(' '.repeat(width));
  }

  const notes: string[] = [];
  if (frame.footer) {
    notes.push(frame.footer);
  }
  if (hidden > 0) {
    notes.push(`${hidden} more ${hidden === 1 ? 'line' : 'lines'}`);
  }

  return [
    border('╭' + '─'.repeat(width) + '╮'),
    ...visible.map((row) => border('│') + row + border('│')),
    border(bottomBorder(notes.join(' · '), width)),
  ];
}

function bottomBorder(label: string, width: number): string {
  if (!label) {
    return '╰' + '─'.repeat(width) + '╯';
  }
  const [row] = layoutRows([` ${label} `], width, false);
  const text = row.trimEnd();
  return '╰' + text + '─'.repeat(row.length - text.length) + '╯';
}
