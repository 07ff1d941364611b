/**
 * Tests for SurfaceBuffer liveness and content operations.
 */

import { SurfaceBuffer } from '../../surface/surface-buffer.js';

const GEOMETRY = { width: 10, height: 3, row: 0, col: 0 };

describe('SurfaceBuffer', () => {
  it('gives each surface a distinct id', () => {
    const first = new SurfaceBuffer(GEOMETRY);
    const second = new SurfaceBuffer(GEOMETRY);

    expect(second.id).not.toBe(first.id);
  });

  it('starts alive, empty and plain text', () => {
    const surface = new SurfaceBuffer(GEOMETRY);

    expect(surface.isAlive()).toBe(true);
    expect(surface.getLines()).toEqual({ alive: true, value: [] });
    expect(surface.getContentType()).toEqual({ alive: true, value: 'text' });
    expect(surface.getMeta()).toEqual({ alive: true, value: undefined });
    expect(surface.getGeometry()).toEqual({ alive: true, value: GEOMETRY });
  });

  it('replaces and inserts lines', () => {
    const surface = new SurfaceBuffer(GEOMETRY);

    surface.setLines(['b', 'c']);
    surface.insertLines(0, ['a']);
    surface.insertLines(99, ['d']);

    expect(surface.getLines()).toEqual({
      alive: true,
      value: ['a', 'b', 'c', 'd'],
    });
  });

  it('returns copies of its lines', () => {
    const surface = new SurfaceBuffer(GEOMETRY);
    const source = ['one'];
    surface.setLines(source);
    source.push('two');

    expect(surface.getLines()).toEqual({ alive: true, value: ['one'] });
  });

  it('replaces a binding when the key is bound again', async () => {
    const surface = new SurfaceBuffer(GEOMETRY);
    const first = jest.fn();
    const second = jest.fn();

    surface.bindAction('q', 'close', first);
    surface.bindAction('q', 'quit', second);

    const bindings = surface.getBindings();
    expect(bindings.alive && bindings.value.map((b) => b.action)).toEqual([
      'quit',
    ]);
    expect(await surface.trigger('q')).toBe(true);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('reports unbound keys', async () => {
    const surface = new SurfaceBuffer(GEOMETRY);

    expect(await surface.trigger('x')).toBe(false);
  });

  it('answers every access with alive: false once destroyed', async () => {
    const surface = new SurfaceBuffer(GEOMETRY);
    const handler = jest.fn();
    surface.bindAction('q', 'close', handler);

    expect(surface.destroy()).toEqual({ alive: true, value: undefined });

    expect(surface.isAlive()).toBe(false);
    expect(surface.destroy()).toEqual({ alive: false });
    expect(surface.getGeometry()).toEqual({ alive: false });
    expect(surface.resize(GEOMETRY)).toEqual({ alive: false });
    expect(surface.getLines()).toEqual({ alive: false });
    expect(surface.setLines(['x'])).toEqual({ alive: false });
    expect(surface.insertLines(0, ['x'])).toEqual({ alive: false });
    expect(surface.getContentType()).toEqual({ alive: false });
    expect(surface.setContentType('markdown')).toEqual({ alive: false });
    expect(surface.getMeta()).toEqual({ alive: false });
    expect(surface.setMeta('m')).toEqual({ alive: false });
    expect(surface.bindAction('t', 'export', handler)).toEqual({
      alive: false,
    });
    expect(surface.getBindings()).toEqual({ alive: false });
    expect(await surface.trigger('q')).toBe(false);
    expect(handler).not.toHaveBeenCalled();
  });
});
