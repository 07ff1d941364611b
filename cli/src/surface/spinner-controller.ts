/**
 * Loading animation written into a surface.
 */

import type { ISurface } from './i-surface.js';

/** Frames cycled through, in order. */
export const SPINNER_FRAMES = ['-', '\\', '|', '/'] as const;

/** Text in front of the frame glyph. */
export const SPINNER_LABEL = 'Loading... ';

/**
 * A running (or stopped) animation.
 */
export interface SpinnerHandle {
  readonly surface: ISurface;
  frameIndex: number;
  timer: NodeJS.Timeout | null;
}

/**
 * Starts and stops spinner animations.
 */
export class SpinnerController {
  /**
   * @param interval - Milliseconds between frames (default: 100)
   */
  constructor(private readonly interval: number = 100) {
    if (interval <= 0 || !Number.isFinite(interval)) {
      throw new Error(
        `Invalid spinner interval: ${interval}. ` +
          `Interval must be a positive finite number (milliseconds).`
      );
    }
  }

  /**
   * Start animating. The first frame is written immediately.
   *
   * Frames written after the surface has been destroyed are dropped.
   */
  start(surface: ISurface): SpinnerHandle {
    const handle: SpinnerHandle = { surface, frameIndex: 0, timer: null };
    this.tick(handle);
    handle.timer = setInterval(() => this.tick(handle), this.interval);
    return handle;
  }

  /**
   * Stop animating. Safe to call more than once.
   */
  stop(handle: SpinnerHandle): void {
    if (handle.timer) {
      clearInterval(handle.timer);
      handle.timer = null;
    }
  }

  /**
   * Render the current frame and advance, wrapping after the last one.
   */
  private tick(handle: SpinnerHandle): void {
    const frame = SPINNER_FRAMES[handle.frameIndex];
    const access = handle.surface.setLines([SPINNER_LABEL + frame]);
    if (access.alive) {
      handle.frameIndex = (handle.frameIndex + 1) % SPINNER_FRAMES.length;
    }
  }
}
