/**
 * Launches the user's editor.
 *
 * Prompts are composed in a temporary file (tmp library, cleaned up on
 * process exit if manual cleanup fails); exported views are opened in
 * place.
 */

import { spawn } from 'child_process';
import { promises as fs, close as fsCloseCallback } from 'fs';
import { promisify } from 'util';
import tmp from 'tmp';
import type { IEditorLauncher } from './i-editor-launcher.js';

const tmpFile = (
  options: tmp.FileOptions
): Promise<{
  name: string;
  fd: number;
  removeCallback: () => void;
}> => {
  return new Promise((resolve, reject) => {
    tmp.file(options, (err, name, fd, removeCallback) => {
      if (err) {
        reject(err);
      } else {
        resolve({ name, fd, removeCallback });
      }
    });
  });
};

const fsClose = promisify(fsCloseCallback);

/**
 * Launches an external editor.
 */
export class EditorLauncher implements IEditorLauncher {
  /**
   * @param environment - Environment holding VISUAL / EDITOR
   */
  constructor(private readonly environment: NodeJS.ProcessEnv = process.env) {}

  /**
   * Get the preferred editor: VISUAL, then EDITOR, then 'nano'.
   */
  private getEditorCommand(): string {
    return this.environment.VISUAL || this.environment.EDITOR || 'nano';
  }

  /**
   * Launch an editor to edit the given text.
   *
   * @param initialText - Initial text to edit
   * @param extension - File extension for syntax highlighting (default: '.md')
   * @returns Promise resolving to edited text, or null if nothing changed
   */
  async editText(
    initialText: string,
    extension: string = '.md'
  ): Promise<string | null> {
    const {
      name: tempPath,
      fd,
      removeCallback,
    } = await tmpFile({
      prefix: 'promptpane-',
      postfix: extension,
      keep: false,
      discardDescriptor: false,
    });

    try {
      await fsClose(fd);
      await fs.writeFile(tempPath, initialText, 'utf-8');

      await this.launchEditor(this.getEditorCommand(), tempPath);

      const editedText = await fs.readFile(tempPath, 'utf-8');

      this.removeTempFile(removeCallback, tempPath);

      if (editedText.trim() === initialText.trim()) {
        return null;
      }

      return editedText;
    } catch (error) {
      this.removeTempFile(removeCallback, tempPath);
      throw error;
    }
  }

  /**
   * Open a file in the editor and wait for it to exit.
   */
  async openFile(filePath: string): Promise<void> {
    await this.launchEditor(this.getEditorCommand(), filePath);
  }

  private removeTempFile(removeCallback: () => void, tempPath: string): void {
    try {
      removeCallback();
    } catch (cleanupError) {
      // tmp removes it on process exit as a fallback
      console.warn(
        `Warning: Failed to cleanup temp file ${tempPath}:`,
        cleanupError
      );
    }
  }

  /**
   * Launch editor as a child process and wait for it to exit.
   *
   * @param editorCmd - Editor command, possibly with flags ("code --wait")
   * @param filepath - Path to file to edit
   */
  private launchEditor(editorCmd: string, filepath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const parts = editorCmd.trim().split(/\s+/);
      const cmd = parts[0];
      const args = [...parts.slice(1), filepath];

      const editor = spawn(cmd, args, {
        stdio: 'inherit',
      });

      editor.on('exit', (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`Editor exited with code ${code}`));
        }
      });

      editor.on('error', (error) => {
        reject(new Error(`Failed to launch editor: ${error.message}`));
      });
    });
  }
}
