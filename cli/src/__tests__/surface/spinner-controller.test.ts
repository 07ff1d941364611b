/**
 * Tests for SpinnerController.
 */

import {
  SPINNER_FRAMES,
  SpinnerController,
} from '../../surface/spinner-controller.js';
import { SurfaceBuffer } from '../../surface/surface-buffer.js';

const GEOMETRY = { width: 20, height: 1, row: 0, col: 0 };

function linesOf(surface: SurfaceBuffer): readonly string[] | undefined {
  const lines = surface.getLines();
  return lines.alive ? lines.value : undefined;
}

describe('SpinnerController', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('rejects a non-positive interval', () => {
    expect(() => new SpinnerController(0)).toThrow(
      'Invalid spinner interval: 0'
    );
    expect(() => new SpinnerController(Number.NaN)).toThrow(
      'Invalid spinner interval'
    );
  });

  it('writes the first frame immediately', () => {
    const surface = new SurfaceBuffer(GEOMETRY);
    const spinner = new SpinnerController(100);

    const handle = spinner.start(surface);

    expect(linesOf(surface)).toEqual(['Loading... -']);
    expect(handle.frameIndex).toBe(1);
    spinner.stop(handle);
  });

  it('cycles through the frames and wraps', () => {
    const surface = new SurfaceBuffer(GEOMETRY);
    const spinner = new SpinnerController(100);
    const seen: string[] = [];

    const handle = spinner.start(surface);
    seen.push(...(linesOf(surface) ?? []));
    for (let tick = 0; tick < SPINNER_FRAMES.length; tick++) {
      jest.advanceTimersByTime(100);
      seen.push(...(linesOf(surface) ?? []));
    }
    spinner.stop(handle);

    expect(seen).toEqual([
      'Loading... -',
      'Loading... \\',
      'Loading... |',
      'Loading... /',
      'Loading... -',
    ]);
  });

  it('writes nothing after stop', () => {
    const surface = new SurfaceBuffer(GEOMETRY);
    const spinner = new SpinnerController(100);

    const handle = spinner.start(surface);
    spinner.stop(handle);
    surface.setLines(['answer']);
    jest.advanceTimersByTime(1000);

    expect(linesOf(surface)).toEqual(['answer']);
    expect(handle.timer).toBeNull();
  });

  it('can be stopped twice', () => {
    const spinner = new SpinnerController(100);
    const handle = spinner.start(new SurfaceBuffer(GEOMETRY));

    spinner.stop(handle);

    expect(() => spinner.stop(handle)).not.toThrow();
    expect(jest.getTimerCount()).toBe(0);
  });

  it('keeps ticking harmlessly on a destroyed surface', () => {
    const surface = new SurfaceBuffer(GEOMETRY);
    const spinner = new SpinnerController(100);
    const handle = spinner.start(surface);

    surface.destroy();
    jest.advanceTimersByTime(500);

    expect(surface.getLines()).toEqual({ alive: false });
    expect(handle.frameIndex).toBe(1);
    spinner.stop(handle);
  });
});
