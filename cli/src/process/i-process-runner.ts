/**
 * Interface for running an external process to completion.
 */

/**
 * What to launch and what to feed it.
 */
export interface ProcessInvocation {
  /** Executable name or path. */
  command: string;

  /** Arguments, passed without a shell. */
  args: readonly string[];

  /** Written to the process's stdin, which is then closed. */
  stdin?: string;

  /** Milliseconds before the process is terminated (default: none). */
  timeout?: number;
}

/**
 * Buffered result of a finished process.
 *
 * Each stream holds its non-empty lines in emission order. Nothing is
 * known about interleaving between the two streams.
 */
export interface ProcessOutput {
  readonly stdout: readonly string[];
  readonly stderr: readonly string[];

  /**
   * Exit status. LAUNCH_FAILURE_EXIT_CODE when the process could not be
   * started or was ended by a signal.
   */
  readonly exitCode: number;

  /** Signal that ended the process, if any. */
  readonly signal: NodeJS.Signals | null;

  /** Why the process could not be started, when it could not. */
  readonly launchError?: string;
}

/** Exit code reported when there is no real one. */
export const LAUNCH_FAILURE_EXIT_CODE = -1;

/**
 * Process runner interface.
 */
export interface IProcessRunner {
  /**
   * Launch a process and collect its output.
   *
   * The returned promise settles exactly once, when the process exits, and
   * never rejects: launch failures and non-zero exits are both reported
   * through ProcessOutput.
   */
  run(invocation: ProcessInvocation): Promise<ProcessOutput>;
}
