/**
 * In-memory surface state.
 *
 * Holds everything ISurface exposes and enforces liveness. Hosts subclass it
 * and override `changed()` / `destroyed()` to draw.
 */

import type {
  ActionHandler,
  ContentType,
  ISurface,
  SurfaceAccess,
  SurfaceBinding,
  SurfaceGeometry,
} from './i-surface.js';

const GONE: SurfaceAccess<never> = { alive: false };

function live<T>(value: T): SurfaceAccess<T> {
  return { alive: true, value };
}

const DONE: SurfaceAccess = live(undefined);

let nextSurfaceId = 1;

/**
 * Surface whose state lives in memory.
 */
export class SurfaceBuffer implements ISurface {
  readonly id: number = nextSurfaceId++;

  private alive = true;
  private geometry: SurfaceGeometry;
  private lines: string[] = [];
  private contentType: ContentType = 'text';
  private meta: string | undefined;
  private readonly bindings = new Map<string, SurfaceBinding>();

  constructor(geometry: SurfaceGeometry) {
    this.geometry = geometry;
  }

  isAlive(): boolean {
    return this.alive;
  }

  getGeometry(): SurfaceAccess<SurfaceGeometry> {
    return this.alive ? live(this.geometry) : GONE;
  }

  resize(geometry: SurfaceGeometry): SurfaceAccess {
    if (!this.alive) {
      return GONE;
    }
    this.geometry = geometry;
    this.changed();
    return DONE;
  }

  getLines(): SurfaceAccess<readonly string[]> {
    return this.alive ? live([...this.lines]) : GONE;
  }

  setLines(lines: readonly string[]): SurfaceAccess {
    if (!this.alive) {
      return GONE;
    }
    this.lines = [...lines];
    this.changed();
    return DONE;
  }

  insertLines(index: number, lines: readonly string[]): SurfaceAccess {
    if (!this.alive) {
      return GONE;
    }
    const at = Math.min(Math.max(0, index), this.lines.length);
    this.lines.splice(at, 0, ...lines);
    this.changed();
    return DONE;
  }

  getContentType(): SurfaceAccess<ContentType> {
    return this.alive ? live(this.contentType) : GONE;
  }

  setContentType(type: ContentType): SurfaceAccess {
    if (!this.alive) {
      return GONE;
    }
    this.contentType = type;
    this.changed();
    return DONE;
  }

  getMeta(): SurfaceAccess<string | undefined> {
    return this.alive ? live(this.meta) : GONE;
  }

  setMeta(meta: string): SurfaceAccess {
    if (!this.alive) {
      return GONE;
    }
    this.meta = meta;
    return DONE;
  }

  bindAction(
    key: string,
    action: string,
    handler: ActionHandler
  ): SurfaceAccess {
    if (!this.alive) {
      return GONE;
    }
    this.bindings.set(key, { key, action, handler });
    this.changed();
    return DONE;
  }

  getBindings(): SurfaceAccess<readonly SurfaceBinding[]> {
    return this.alive ? live([...this.bindings.values()]) : GONE;
  }

  /**
   * Run the handler bound to `key`.
   *
   * @returns False when the surface is dead or nothing is bound to the key
   */
  async trigger(key: string): Promise<boolean> {
    const binding = this.alive ? this.bindings.get(key) : undefined;
    if (!binding) {
      return false;
    }
    await binding.handler();
    return true;
  }

  destroy(): SurfaceAccess {
    if (!this.alive) {
      return GONE;
    }
    this.alive = false;
    this.bindings.clear();
    this.lines = [];
    this.destroyed();
    return DONE;
  }

  /** Called after every visible change while alive. */
  protected changed(): void {}

  /** Called once, when the surface is destroyed. */
  protected destroyed(): void {}
}
