/**
 * Interfaces for the display surfaces a request renders into.
 *
 * A surface is a transient floating region; a view is a persistent
 * container the user can come back to. Hosts (the terminal, or an editor
 * integration) implement ISurfaceHost.
 */

/**
 * Result of any access to a surface.
 *
 * Every operation reports whether the surface was still alive, so a caller
 * holding a stale surface gets `{ alive: false }` instead of a fault.
 */
export type SurfaceAccess<T = undefined> =
  | { readonly alive: true; readonly value: T }
  | { readonly alive: false };

/**
 * How surface content should be rendered.
 */
export type ContentType = 'text' | 'markdown';

/**
 * Position and size of a surface, in host cells. `row` and `col` are the
 * top-left corner of the content area.
 */
export interface SurfaceGeometry {
  readonly width: number;
  readonly height: number;
  readonly row: number;
  readonly col: number;
}

/**
 * Size of the host's drawable area.
 */
export interface HostDimensions {
  readonly columns: number;
  readonly lines: number;
}

/**
 * Callback run when a bound key is pressed.
 */
export type ActionHandler = () => void | Promise<void>;

/**
 * A key bound on a surface.
 */
export interface SurfaceBinding {
  readonly key: string;
  /** Short name shown to the user, e.g. 'close'. */
  readonly action: string;
  readonly handler: ActionHandler;
}

/**
 * A transient display surface.
 */
export interface ISurface {
  /** Host-unique identifier. */
  readonly id: number;

  isAlive(): boolean;

  getGeometry(): SurfaceAccess<SurfaceGeometry>;
  resize(geometry: SurfaceGeometry): SurfaceAccess;

  getLines(): SurfaceAccess<readonly string[]>;
  /** Replace all content. */
  setLines(lines: readonly string[]): SurfaceAccess;
  /** Insert lines before the line at `index` (0 prepends). */
  insertLines(index: number, lines: readonly string[]): SurfaceAccess;

  getContentType(): SurfaceAccess<ContentType>;
  setContentType(type: ContentType): SurfaceAccess;

  getMeta(): SurfaceAccess<string | undefined>;
  setMeta(meta: string): SurfaceAccess;

  bindAction(
    key: string,
    action: string,
    handler: ActionHandler
  ): SurfaceAccess;
  getBindings(): SurfaceAccess<readonly SurfaceBinding[]>;

  /** Tear the surface down. Later accesses report `{ alive: false }`. */
  destroy(): SurfaceAccess;
}

/**
 * A persistent view.
 */
export interface IView {
  setLines(lines: readonly string[]): void;
  setContentType(type: ContentType): void;
  /** Make this the view the user is looking at. */
  activate(): Promise<void>;
}

/**
 * Creates surfaces and views.
 */
export interface ISurfaceHost {
  dimensions(): HostDimensions;
  openSurface(geometry: SurfaceGeometry): ISurface;
  createView(): IView;
}
