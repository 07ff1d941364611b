import { StringDecoder } from 'node:string_decoder';

/**
 * Splits a byte stream into lines as chunks arrive.
 *
 * A trailing partial line is held back until the next chunk completes it or
 * until flush(). Empty lines are dropped, and a `\r` before `\n` is removed.
 */
export class LineBuffer {
  private readonly decoder = new StringDecoder('utf8');
  private pending = '';
  private readonly lines: string[] = [];

  /**
   * Append a chunk.
   *
   * @returns The lines completed by this chunk
   */
  push(chunk: Buffer | string): string[] {
    const text =
      typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    const segments = (this.pending + text).split('\n');
    this.pending = segments.pop() ?? '';
    return this.accept(segments);
  }

  /**
   * Emit whatever partial line is left. Call once, at end of stream.
   *
   * @returns The lines completed by flushing
   */
  flush(): string[] {
    const rest = this.pending + this.decoder.end();
    this.pending = '';
    return this.accept(rest.split('\n'));
  }

  /**
   * Record a complete line that did not come from the stream, such as a
   * diagnostic. Any pending partial line is left alone.
   */
  append(line: string): void {
    if (line !== '') {
      this.lines.push(line);
    }
  }

  /** All lines collected so far. */
  snapshot(): string[] {
    return [...this.lines];
  }

  private accept(segments: string[]): string[] {
    const complete = segments
      .map((segment) =>
        segment.endsWith('\r') ? segment.slice(0, -1) : segment
      )
      .filter((segment) => segment !== '');
    this.lines.push(...complete);
    return complete;
  }
}
