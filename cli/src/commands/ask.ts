/**
 * Ask command implementation.
 *
 * Sends a file, stdin, or a prompt composed in the user's editor to the
 * generative-language API and shows the answer in a floating surface.
 */

import { readFile } from 'node:fs/promises';
import type { IConfigLoader } from '../config/i-config-loader.js';
import type { IConfig, IUserConfig } from '../config/i-config.js';
import { mergeConfig } from '../config/config-validator.js';
import {
  EnvironmentCredentialProvider,
  type ICredentialProvider,
} from '../config/credential-provider.js';
import { EXIT_CODE, type ExitCode } from '../constants/exit-codes.js';
import type { IDisplay } from '../display/i-display.js';
import type { IEditorLauncher } from '../editor/i-editor-launcher.js';
import { TextEditingContext } from '../orchestrator/editing-context.js';
import { RequestOrchestrator } from '../orchestrator/request-orchestrator.js';
import type { IProcessRunner } from '../process/i-process-runner.js';
import { ProcessRunner } from '../process/process-runner.js';
import type { ISurface, ISurfaceHost } from '../surface/i-surface.js';
import { TerminalSurfaceHost } from '../surface/terminal-surface-host.js';
import { PathValidator } from '../utils/path-validator.js';
import { splitLines } from '../utils/text.js';

/**
 * Options accepted by the ask command.
 */
export interface AskOptions {
  config?: string;
  model?: string;
  /** Commander sets this to false for --no-open. */
  open?: boolean;
  verbose?: boolean;
}

/**
 * A surface host the command can hand control to after rendering.
 */
export interface InteractiveSurfaceHost extends ISurfaceHost {
  readonly interactive: boolean;
  interact(surface: ISurface): Promise<void>;
}

/**
 * Collaborators for askCore. Everything except display, configLoader and
 * editorLauncher has a production default.
 */
export interface AskDependencies {
  display: IDisplay;
  configLoader: IConfigLoader;
  editorLauncher: IEditorLauncher;
  credentials?: ICredentialProvider;
  createRunner?: (config: IConfig, verbose: boolean) => IProcessRunner;
  createHost?: (config: IConfig) => InteractiveSurfaceHost;
  readStdin?: () => Promise<string>;
}

/**
 * Core ask logic (extracted for testability).
 *
 * @param path - File to send, '-' for stdin, or undefined to compose in the editor
 * @param options - Command options
 * @param deps - Injected collaborators
 * @returns Exit code; errors other than a missing API key are thrown
 */
export async function askCore(
  path: string | undefined,
  options: AskOptions,
  deps: AskDependencies
): Promise<ExitCode> {
  const { display } = deps;
  const config = applyOverrides(
    await deps.configLoader.load(options.config),
    options
  );
  const verbose = options.verbose ?? false;

  if (verbose) {
    display.showConfig({ ...config });
  }

  const text = await readInput(path, deps);
  if (text === null) {
    display.showMessage('Nothing to send.');
    return EXIT_CODE.USER_CANCELLED;
  }

  const host = deps.createHost
    ? deps.createHost(config)
    : new TerminalSurfaceHost({
        views: config.views,
        display,
        editorLauncher: deps.editorLauncher,
      });
  const runner = deps.createRunner
    ? deps.createRunner(config, verbose)
    : new ProcessRunner({
        killEscalationDelay: config.transport.killEscalationDelay,
        onLine:
          verbose && !host.interactive
            ? (stream, line) => {
                if (stream === 'stderr') {
                  display.showMessage(`[${config.transport.command}] ${line}`);
                }
              }
            : undefined,
      });

  const orchestrator = new RequestOrchestrator({
    config,
    context: new TextEditingContext(text),
    credentials:
      deps.credentials ??
      new EnvironmentCredentialProvider(config.credentials.envVar),
    runner,
    host,
    display,
    verbose,
  });

  const ticket = orchestrator.run();
  if (ticket.status === 'aborted') {
    return EXIT_CODE.ERROR;
  }

  const { result, controller } = await ticket.completion;

  if (host.interactive) {
    await host.interact(controller.surface);
  } else {
    display.showLines(splitLines(result.responseText));
    if (verbose || !result.ok) {
      display.showMessage('');
      display.showLines(splitLines(result.meta));
    }
    controller.close();
  }

  return result.ok ? EXIT_CODE.SUCCESS : EXIT_CODE.ERROR;
}

/**
 * Execute the ask command.
 * This is the entry point called by Commander.js.
 *
 * @returns Exit code (EXIT_CODE.SUCCESS for success, EXIT_CODE.ERROR for failure)
 */
export async function askCommand(
  path: string | undefined,
  options: AskOptions,
  deps: AskDependencies
): Promise<ExitCode> {
  try {
    return await askCore(path, options, deps);
  } catch (error) {
    deps.display.showError(
      error instanceof Error ? error.message : String(error)
    );
    return EXIT_CODE.ERROR;
  }
}

/**
 * Apply command-line flags on top of the loaded configuration.
 */
function applyOverrides(config: IConfig, options: AskOptions): IConfig {
  const overrides: IUserConfig = {};
  if (options.model !== undefined) {
    if (options.model.trim() === '') {
      throw new Error('Model name cannot be empty.');
    }
    overrides.api = { model: options.model };
  }
  if (options.open === false) {
    overrides.views = { openInEditor: false };
  }
  return mergeConfig(config, overrides);
}

/**
 * Read the editing context.
 *
 * @returns The text, or null when the user composed nothing
 */
async function readInput(
  path: string | undefined,
  deps: AskDependencies
): Promise<string | null> {
  if (path === '-') {
    const read = deps.readStdin ?? (() => readStream(process.stdin));
    return await read();
  }

  if (path !== undefined) {
    const absolutePath = PathValidator.validateInputFile(path);
    return await readFile(absolutePath, 'utf8');
  }

  const composed = await deps.editorLauncher.editText('', '.md');
  if (composed === null || composed.trim() === '') {
    return null;
  }
  return composed;
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}
