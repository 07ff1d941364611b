/**
 * Interface for external editor launcher.
 */

/**
 * Editor launcher interface.
 *
 * Implementations launch external editors (vim, emacs, VS Code, etc.) to
 * compose a prompt or to show an exported view.
 */
export interface IEditorLauncher {
  /**
   * Launch an editor on a temporary file holding `initialText`.
   *
   * @param initialText - Initial text to edit
   * @param extension - File extension for syntax highlighting (default: '.md')
   * @returns Promise resolving to edited text, or null if nothing changed
   */
  editText(initialText: string, extension?: string): Promise<string | null>;

  /**
   * Open an existing file and wait for the editor to exit.
   */
  openFile(filePath: string): Promise<void>;
}
