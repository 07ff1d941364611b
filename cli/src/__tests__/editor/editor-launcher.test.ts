/**
 * Tests for EditorLauncher.
 *
 * child_process, fs and tmp are mocked; the fake editor exits when the
 * test emits an event on it.
 */

import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import type tmp from 'tmp';
import { EditorLauncher } from '../../editor/editor-launcher.js';

const mockTmpFile = jest.fn<void, [tmp.FileOptions, tmp.FileCallback]>();

jest.mock('child_process');
jest.mock('fs', () => {
  const actualFs = jest.requireActual('fs');
  return {
    ...actualFs,
    promises: {
      writeFile: jest.fn(),
      readFile: jest.fn(),
    },
    close: jest.fn(
      (_fd: number, callback: (error: Error | null) => void) => callback(null)
    ),
  };
});
jest.mock('tmp', () => ({
  __esModule: true,
  default: {
    file: (options: tmp.FileOptions, callback: tmp.FileCallback) =>
      mockTmpFile(options, callback),
  },
}));

const mockSpawn = spawn as jest.MockedFunction<typeof spawn>;
const mockWriteFile = fs.writeFile as jest.MockedFunction<typeof fs.writeFile>;
const mockReadFile = fs.readFile as jest.MockedFunction<typeof fs.readFile>;

const TEMP_PATH = '/tmp/promptpane-123456.md';

describe('EditorLauncher', () => {
  let mockRemoveCallback: jest.Mock;
  let editor: EventEmitter;

  beforeEach(() => {
    mockRemoveCallback = jest.fn();
    mockTmpFile.mockImplementation((_options, callback) => {
      callback(null, TEMP_PATH, 3, mockRemoveCallback);
    });
    mockWriteFile.mockResolvedValue(undefined);
    mockReadFile.mockResolvedValue('edited content');

    editor = new EventEmitter();
    mockSpawn.mockReturnValue(editor as any);
  });

  function exitEditor(code: number): void {
    setImmediate(() => editor.emit('exit', code));
  }

  describe('editor command selection', () => {
    it('prefers VISUAL', async () => {
      const launcher = new EditorLauncher({ VISUAL: 'vim', EDITOR: 'emacs' });

      const promise = launcher.editText('');
      exitEditor(0);
      await promise;

      expect(mockSpawn).toHaveBeenCalledWith('vim', [TEMP_PATH], {
        stdio: 'inherit',
      });
    });

    it('falls back to EDITOR', async () => {
      const launcher = new EditorLauncher({ EDITOR: 'emacs' });

      const promise = launcher.editText('');
      exitEditor(0);
      await promise;

      expect(mockSpawn.mock.calls[0][0]).toBe('emacs');
    });

    it('falls back to nano', async () => {
      const launcher = new EditorLauncher({});

      const promise = launcher.editText('');
      exitEditor(0);
      await promise;

      expect(mockSpawn.mock.calls[0][0]).toBe('nano');
    });

    it('passes editor flags through without a shell', async () => {
      const launcher = new EditorLauncher({ VISUAL: 'code --wait' });

      const promise = launcher.openFile('/work/view.md');
      exitEditor(0);
      await promise;

      expect(mockSpawn).toHaveBeenCalledWith(
        'code',
        ['--wait', '/work/view.md'],
        { stdio: 'inherit' }
      );
    });
  });

  describe('editText', () => {
    const launcher = new EditorLauncher({ EDITOR: 'vi' });

    it('creates a markdown temp file by default', async () => {
      const promise = launcher.editText('');
      exitEditor(0);
      await promise;

      expect(mockTmpFile).toHaveBeenCalledWith(
        expect.objectContaining({ prefix: 'promptpane-', postfix: '.md' }),
        expect.any(Function)
      );
    });

    it('writes the initial text', async () => {
      const promise = launcher.editText('draft', '.txt');
      exitEditor(0);
      await promise;

      expect(mockWriteFile).toHaveBeenCalledWith(TEMP_PATH, 'draft', 'utf-8');
      expect(mockTmpFile.mock.calls[0][0].postfix).toBe('.txt');
    });

    it('returns the edited text', async () => {
      const promise = launcher.editText('draft');
      exitEditor(0);

      await expect(promise).resolves.toBe('edited content');
      expect(mockRemoveCallback).toHaveBeenCalledTimes(1);
    });

    it('returns null when only whitespace changed', async () => {
      mockReadFile.mockResolvedValue('  draft \n');

      const promise = launcher.editText('draft');
      exitEditor(0);

      await expect(promise).resolves.toBeNull();
    });

    it('rejects and cleans up when the editor fails', async () => {
      const promise = launcher.editText('draft');
      exitEditor(1);

      await expect(promise).rejects.toThrow('Editor exited with code 1');
      expect(mockRemoveCallback).toHaveBeenCalledTimes(1);
    });

    it('rejects when the editor cannot be launched', async () => {
      const promise = launcher.editText('draft');
      setImmediate(() => editor.emit('error', new Error('spawn vi ENOENT')));

      await expect(promise).rejects.toThrow(
        'Failed to launch editor: spawn vi ENOENT'
      );
    });

    it('warns when the temp file cannot be removed', async () => {
      const consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
      mockRemoveCallback.mockImplementation(() => {
        throw new Error('EACCES: permission denied');
      });

      const promise = launcher.editText('draft');
      exitEditor(0);

      await expect(promise).resolves.toBe('edited content');
      expect(consoleWarnSpy).toHaveBeenCalledWith(
        `Warning: Failed to cleanup temp file ${TEMP_PATH}:`,
        expect.any(Error)
      );
      consoleWarnSpy.mockRestore();
    });
  });

  describe('openFile', () => {
    it('resolves when the editor exits cleanly', async () => {
      const promise = new EditorLauncher({ EDITOR: 'vi' }).openFile(
        '/work/view.md'
      );
      exitEditor(0);

      await expect(promise).resolves.toBeUndefined();
      expect(mockTmpFile).not.toHaveBeenCalled();
    });

    it('rejects on a non-zero exit', async () => {
      const promise = new EditorLauncher({ EDITOR: 'vi' }).openFile(
        '/work/view.md'
      );
      exitEditor(2);

      await expect(promise).rejects.toThrow('Editor exited with code 2');
    });
  });
});
