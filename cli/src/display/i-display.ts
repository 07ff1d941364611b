/**
 * Display interface for terminal output.
 *
 * Commands and the orchestrator inject an IDisplay implementation
 * (typically TerminalDisplay) rather than using console.log directly.
 */

/**
 * Display interface for terminal output with dependency injection support.
 */
export interface IDisplay {
  /**
   * Display a simple message.
   */
  showMessage(message: string): void;

  /**
   * Display an error message.
   */
  showError(message: string): void;

  /**
   * Display a warning message.
   */
  showWarning(message: string): void;

  /**
   * Display a success message.
   */
  showSuccess(message: string): void;

  /**
   * Display configuration information (verbose mode).
   *
   * @param config - Configuration object to display
   */
  showConfig(config: Record<string, unknown>): void;

  /**
   * Print content lines as-is, for output that is not a terminal.
   */
  showLines(lines: readonly string[]): void;
}
