/**
 * Lifecycle of the surface a single request renders into.
 *
 *   loading --present()--> displaying --close()--> closed
 *                                     --export()-> exported
 *
 * `showMeta()` prepends the metadata block while displaying and leaves the
 * state unchanged. Every transition checks the surface first: once it is
 * gone (destroyed by the user or the host) all operations are no-ops.
 */

import type { IKeymapConfig, ISurfaceConfig } from '../config/i-config.js';
import type { DecodedResult } from '../response/response-decoder.js';
import { splitLines } from '../utils/text.js';
import { loadingGeometry, resultGeometry } from './geometry.js';
import type { ISurface, ISurfaceHost } from './i-surface.js';

export type ResultSurfaceState =
  | 'loading'
  | 'displaying'
  | 'closed'
  | 'exported';

/**
 * Surface and keymap settings the controller needs.
 */
export interface ResultSurfaceOptions {
  surface: ISurfaceConfig;
  keymap: IKeymapConfig;
}

/**
 * Drives one result surface from loading to close or export.
 */
export class ResultSurfaceController {
  private state: ResultSurfaceState = 'loading';

  /**
   * Open a loading surface on `host` and wrap it.
   */
  static open(
    host: ISurfaceHost,
    options: ResultSurfaceOptions
  ): ResultSurfaceController {
    const surface = host.openSurface(
      loadingGeometry(host.dimensions(), options.surface)
    );
    return new ResultSurfaceController(host, surface, options);
  }

  constructor(
    private readonly host: ISurfaceHost,
    readonly surface: ISurface,
    private readonly options: ResultSurfaceOptions
  ) {}

  /**
   * Current state. A surface torn down from outside reads as closed.
   */
  getState(): ResultSurfaceState {
    if (
      (this.state === 'loading' || this.state === 'displaying') &&
      !this.surface.isAlive()
    ) {
      this.state = 'closed';
    }
    return this.state;
  }

  /**
   * Render a decoded response: resize, replace content, mark it as
   * markdown, attach the metadata and bind the actions.
   *
   * @returns False if the surface is gone or the result was already shown
   */
  present(result: DecodedResult): boolean {
    if (this.getState() !== 'loading') {
      return false;
    }

    const geometry = resultGeometry(
      this.host.dimensions(),
      this.options.surface
    );
    const steps = [
      () => this.surface.resize(geometry),
      () => this.surface.setLines(splitLines(result.responseText)),
      () => this.surface.setContentType('markdown'),
      () => this.surface.setMeta(result.meta),
      () =>
        this.surface.bindAction(this.options.keymap.close, 'close', () => {
          this.close();
        }),
      () =>
        this.surface.bindAction(
          this.options.keymap.export,
          'export',
          async () => {
            await this.export();
          }
        ),
      () =>
        this.surface.bindAction(
          this.options.keymap.showMeta,
          'show-meta',
          () => {
            this.showMeta();
          }
        ),
    ];

    for (const step of steps) {
      if (!step().alive) {
        this.state = 'closed';
        return false;
      }
    }

    this.state = 'displaying';
    return true;
  }

  /**
   * Destroy the surface.
   *
   * @returns False if there was nothing to close
   */
  close(): boolean {
    if (this.getState() !== 'displaying') {
      return false;
    }
    this.surface.destroy();
    this.state = 'closed';
    return true;
  }

  /**
   * Move the content into a new persistent view and discard the surface.
   *
   * @returns False if the surface was already gone
   */
  async export(): Promise<boolean> {
    if (this.getState() !== 'displaying') {
      return false;
    }

    const lines = this.surface.getLines();
    if (!lines.alive) {
      this.state = 'closed';
      return false;
    }

    this.surface.destroy();
    this.state = 'exported';

    const view = this.host.createView();
    view.setLines(lines.value);
    view.setContentType('markdown');
    await view.activate();
    return true;
  }

  /**
   * Prepend the stored metadata and a blank line to the content.
   *
   * Each call inserts another copy; nothing is toggled or deduplicated.
   *
   * @returns False if the surface is gone or has no metadata
   */
  showMeta(): boolean {
    if (this.getState() !== 'displaying') {
      return false;
    }

    const meta = this.surface.getMeta();
    if (!meta.alive || meta.value === undefined) {
      return false;
    }

    return this.surface.insertLines(0, [...splitLines(meta.value), ''])
      .alive;
  }
}
