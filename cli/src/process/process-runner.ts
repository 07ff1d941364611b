/**
 * Subprocess runner implementation.
 *
 * Spawns a process without a shell, feeds it stdin, and buffers stdout and
 * stderr line by line until it exits.
 */

import { spawn, type ChildProcess } from 'child_process';
import type {
  IProcessRunner,
  ProcessInvocation,
  ProcessOutput,
} from './i-process-runner.js';
import { LAUNCH_FAILURE_EXIT_CODE } from './i-process-runner.js';
import { LineBuffer } from './line-buffer.js';

/**
 * Output stream a line arrived on.
 */
export type OutputStream = 'stdout' | 'stderr';

/**
 * Options for ProcessRunner.
 */
export interface ProcessRunnerOptions {
  /**
   * Milliseconds between SIGTERM and SIGKILL after a timeout (default: 5000).
   */
  killEscalationDelay?: number;

  /**
   * Called for every non-empty line as it is decoded.
   */
  onLine?: (stream: OutputStream, line: string) => void;
}

/**
 * Default implementation of IProcessRunner using child_process.spawn.
 */
export class ProcessRunner implements IProcessRunner {
  private readonly killEscalationDelay: number;
  private readonly onLine?: (stream: OutputStream, line: string) => void;

  constructor(options: ProcessRunnerOptions = {}) {
    this.killEscalationDelay = options.killEscalationDelay ?? 5000;
    this.onLine = options.onLine;

    if (
      this.killEscalationDelay <= 0 ||
      !Number.isFinite(this.killEscalationDelay)
    ) {
      throw new Error(
        `Invalid killEscalationDelay: ${this.killEscalationDelay}. ` +
          `Delay must be a positive finite number (milliseconds).`
      );
    }
  }

  /**
   * Launch a process and collect its output.
   *
   * @param invocation - Command, arguments, stdin and timeout
   * @returns Promise that settles once, on exit, and never rejects
   */
  run(invocation: ProcessInvocation): Promise<ProcessOutput> {
    return new Promise<ProcessOutput>((resolve) => {
      const stdout = new LineBuffer();
      const stderr = new LineBuffer();
      let settled = false;
      let cleanup = (): void => {};

      const settle = (output: ProcessOutput): void => {
        if (settled) {
          return;
        }
        settled = true;
        cleanup();
        resolve(output);
      };

      const emit = (stream: OutputStream, lines: string[]): void => {
        if (!this.onLine) {
          return;
        }
        for (const line of lines) {
          this.onLine(stream, line);
        }
      };

      let childProcess: ChildProcess;
      try {
        childProcess = spawn(invocation.command, [...invocation.args], {
          stdio: ['pipe', 'pipe', 'pipe'],
        });
      } catch (error) {
        // spawn throws synchronously for invalid arguments
        settle({
          stdout: [],
          stderr: [],
          exitCode: LAUNCH_FAILURE_EXIT_CODE,
          signal: null,
          launchError: describeError(error),
        });
        return;
      }

      if (invocation.timeout !== undefined) {
        cleanup = this.setupProcessTimeout(
          childProcess,
          invocation.timeout,
          () => {
            const note = `Request timed out after ${invocation.timeout}ms`;
            stderr.append(note);
            emit('stderr', [note]);
          }
        );
      }

      childProcess.stdout?.on('data', (data: Buffer) => {
        emit('stdout', stdout.push(data));
      });

      childProcess.stderr?.on('data', (data: Buffer) => {
        emit('stderr', stderr.push(data));
      });

      childProcess.on('error', (error: Error) => {
        if (childProcess.pid === undefined) {
          settle({
            stdout: [],
            stderr: [],
            exitCode: LAUNCH_FAILURE_EXIT_CODE,
            signal: null,
            launchError: `Failed to launch ${invocation.command}: ${error.message}`,
          });
          return;
        }
        stderr.append(error.message);
        emit('stderr', [error.message]);
      });

      childProcess.on(
        'close',
        (code: number | null, signal: NodeJS.Signals | null) => {
          emit('stdout', stdout.flush());
          emit('stderr', stderr.flush());
          settle({
            stdout: stdout.snapshot(),
            stderr: stderr.snapshot(),
            exitCode: code ?? LAUNCH_FAILURE_EXIT_CODE,
            signal,
          });
        }
      );

      if (childProcess.stdin) {
        // EPIPE when the process exits (or never started) before reading
        childProcess.stdin.on('error', (error: Error) => {
          if (childProcess.pid !== undefined) {
            const line = `stdin: ${error.message}`;
            stderr.append(line);
            emit('stderr', [line]);
          }
        });
        childProcess.stdin.end(invocation.stdin ?? '');
      }
    });
  }

  /**
   * Terminate the process after timeoutMs: SIGTERM first, SIGKILL if it is
   * still running after killEscalationDelay.
   *
   * @returns Function that cancels both timers
   */
  private setupProcessTimeout(
    childProcess: ChildProcess,
    timeoutMs: number,
    onTimeout: () => void
  ): () => void {
    let timeoutId: NodeJS.Timeout | null = null;
    let killTimeoutId: NodeJS.Timeout | null = null;

    timeoutId = setTimeout(() => {
      timeoutId = null;
      onTimeout();
      childProcess.kill('SIGTERM');

      killTimeoutId = setTimeout(() => {
        killTimeoutId = null;
        if (childProcess.exitCode === null) {
          childProcess.kill('SIGKILL');
        }
      }, this.killEscalationDelay);
    }, timeoutMs);

    return () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
        timeoutId = null;
      }
      if (killTimeoutId) {
        clearTimeout(killTimeoutId);
        killTimeoutId = null;
      }
    };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
