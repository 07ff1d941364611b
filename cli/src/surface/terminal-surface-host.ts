/**
 * Surface host that draws on the terminal.
 *
 * Surfaces are drawn as centered boxes, redrawn on every change. Bound
 * actions are offered through a prompts select menu. Exported views are
 * written to disk and opened in the user's editor.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { clearScreenDown, cursorTo } from 'node:readline';
import prompts from 'prompts';
import type { IViewsConfig } from '../config/i-config.js';
import type { IDisplay } from '../display/i-display.js';
import type { IEditorLauncher } from '../editor/i-editor-launcher.js';
import type {
  ContentType,
  HostDimensions,
  ISurface,
  ISurfaceHost,
  IView,
  SurfaceGeometry,
} from './i-surface.js';
import { SurfaceBuffer } from './surface-buffer.js';
import { renderBox } from './terminal-box.js';

/**
 * The parts of a tty stream the host uses.
 */
export interface TerminalOutput extends NodeJS.WritableStream {
  isTTY?: boolean;
  columns?: number;
  rows?: number;
}

/**
 * Options for TerminalSurfaceHost.
 */
export interface TerminalSurfaceHostOptions {
  views: IViewsConfig;
  display: IDisplay;
  editorLauncher: IEditorLauncher;
  /** Default: process.stdout */
  output?: TerminalOutput;
  /** Base for a relative views directory. Default: process.cwd() */
  cwd?: string;
  /** Clock used in exported file names. */
  now?: () => Date;
}

/**
 * A surface drawn by a TerminalSurfaceHost.
 */
export class TerminalSurface extends SurfaceBuffer {
  constructor(
    geometry: SurfaceGeometry,
    private readonly host: TerminalSurfaceHost
  ) {
    super(geometry);
  }

  protected override changed(): void {
    this.host.draw(this);
  }

  protected override destroyed(): void {
    this.host.release(this);
  }
}

/**
 * A persistent view backed by a file.
 */
export class TerminalView implements IView {
  private lines: string[] = [];
  private contentType: ContentType = 'text';
  private filePath: string | undefined;

  constructor(private readonly host: TerminalSurfaceHost) {}

  setLines(lines: readonly string[]): void {
    this.lines = [...lines];
  }

  setContentType(type: ContentType): void {
    this.contentType = type;
  }

  /**
   * Write the view to disk (once) and open it.
   */
  async activate(): Promise<void> {
    this.filePath ??= await this.host.saveView(this.lines, this.contentType);
    await this.host.showView(this.filePath);
  }

  /** Where the view was saved, once activated. */
  getFilePath(): string | undefined {
    return this.filePath;
  }
}

/**
 * ISurfaceHost for a terminal.
 */
export class TerminalSurfaceHost implements ISurfaceHost {
  private readonly output: TerminalOutput;
  private readonly cwd: string;
  private readonly now: () => Date;
  private readonly surfaces = new Map<number, TerminalSurface>();

  constructor(private readonly options: TerminalSurfaceHostOptions) {
    this.output = options.output ?? process.stdout;
    this.cwd = options.cwd ?? process.cwd();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * True when output is a terminal. Nothing is drawn otherwise.
   */
  get interactive(): boolean {
    return this.output.isTTY === true;
  }

  dimensions(): HostDimensions {
    return {
      columns: this.output.columns || 80,
      lines: this.output.rows || 24,
    };
  }

  openSurface(geometry: SurfaceGeometry): ISurface {
    const surface = new TerminalSurface(geometry, this);
    this.surfaces.set(surface.id, surface);
    this.draw(surface);
    return surface;
  }

  createView(): IView {
    return new TerminalView(this);
  }

  /**
   * Offer the surface's bound actions until it is closed or exported.
   *
   * Cancelling the menu (Escape, Ctrl-C) runs the `close` action.
   */
  async interact(surface: ISurface): Promise<void> {
    const terminalSurface = this.surfaces.get(surface.id);
    if (!terminalSurface || !this.interactive) {
      return;
    }

    while (terminalSurface.isAlive()) {
      const bindings = terminalSurface.getBindings();
      if (!bindings.alive || bindings.value.length === 0) {
        return;
      }

      const response = await prompts({
        type: 'select',
        name: 'key',
        message: 'Action',
        choices: bindings.value.map((binding) => ({
          title: `${binding.key}  ${binding.action}`,
          value: binding.key,
        })),
      });
      const key: unknown = response.key;

      if (typeof key === 'string') {
        await terminalSurface.trigger(key);
        continue;
      }

      const close = bindings.value.find(
        (binding) => binding.action === 'close'
      );
      if (close) {
        await terminalSurface.trigger(close.key);
      } else {
        terminalSurface.destroy();
      }
    }
  }

  /**
   * Redraw a surface. Called by TerminalSurface on every change.
   */
  draw(surface: TerminalSurface): void {
    if (!this.interactive) {
      return;
    }
    const geometry = surface.getGeometry();
    const lines = surface.getLines();
    const contentType = surface.getContentType();
    const bindings = surface.getBindings();
    if (
      !geometry.alive ||
      !lines.alive ||
      !contentType.alive ||
      !bindings.alive
    ) {
      return;
    }

    const rows = renderBox({
      geometry: geometry.value,
      lines: lines.value,
      contentType: contentType.value,
      footer: bindings.value
        .map((binding) => `${binding.key} ${binding.action}`)
        .join(' · '),
    });

    this.clearScreen();
    for (const [index, row] of rows.entries()) {
      cursorTo(this.output, geometry.value.col, geometry.value.row + index);
      this.output.write(row);
    }
    cursorTo(this.output, 0, geometry.value.row + rows.length);
    this.output.write('\n');
  }

  /**
   * Forget a destroyed surface and wipe it from the screen.
   */
  release(surface: TerminalSurface): void {
    this.surfaces.delete(surface.id);
    if (this.interactive) {
      this.clearScreen();
    }
  }

  /**
   * Write view content under the views directory.
   *
   * @returns Absolute path of the new file
   */
  async saveView(
    lines: readonly string[],
    contentType: ContentType
  ): Promise<string> {
    const directory = path.resolve(this.cwd, this.options.views.directory);
    await mkdir(directory, { recursive: true });

    const stamp = this.now().toISOString().replaceAll(/[:.]/g, '-');
    const extension = contentType === 'markdown' ? 'md' : 'txt';
    const filePath = path.join(
      directory,
      `${stamp}-${randomUUID().slice(0, 8)}.${extension}`
    );

    await writeFile(filePath, lines.join('\n') + '\n', 'utf8');
    return filePath;
  }

  /**
   * Bring a saved view to the front: the editor when configured and on a
   * terminal, otherwise just report where it is.
   */
  async showView(filePath: string): Promise<void> {
    const { display, editorLauncher, views } = this.options;

    if (views.openInEditor && this.interactive) {
      try {
        await editorLauncher.openFile(filePath);
        return;
      } catch (error) {
        display.showWarning(
          `Could not open the view in an editor: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    display.showSuccess(`Saved view to ${filePath}`);
  }

  private clearScreen(): void {
    cursorTo(this.output, 0, 0);
    clearScreenDown(this.output);
  }
}
