/**
 * Split text into display lines.
 *
 * Empty segments are dropped, so blank lines and a trailing newline do not
 * produce empty entries.
 */
export function splitLines(text: string): string[] {
  return text.split('\n').filter((line) => line !== '');
}
