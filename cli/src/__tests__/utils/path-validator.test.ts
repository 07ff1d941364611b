/**
 * Tests for PathValidator.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { PathValidator } from '../../utils/path-validator.js';

describe('PathValidator', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'promptpane-path-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('validateInputFile', () => {
    it('returns the absolute path of a readable file', () => {
      const filePath = path.join(tempDir, 'question.md');
      fs.writeFileSync(filePath, 'why?');

      expect(PathValidator.validateInputFile(filePath)).toBe(filePath);
    });

    it('rejects an empty path', () => {
      expect(() => PathValidator.validateInputFile(' ')).toThrow(
        'Input path cannot be empty.'
      );
    });

    it('rejects a missing file', () => {
      const filePath = path.join(tempDir, 'missing.md');

      expect(() => PathValidator.validateInputFile(filePath)).toThrow(
        `Input file not found: ${filePath}`
      );
    });

    it('rejects a directory', () => {
      expect(() => PathValidator.validateInputFile(tempDir)).toThrow(
        `Input path is not a file: ${tempDir}`
      );
    });
  });

  describe('validateConfigPath', () => {
    it('returns the absolute path of a config file', () => {
      const filePath = path.join(tempDir, 'promptpane.config.json');
      fs.writeFileSync(filePath, '{}');

      expect(PathValidator.validateConfigPath(filePath)).toBe(filePath);
    });

    it('rejects a missing config file', () => {
      const filePath = path.join(tempDir, 'nope.json');

      expect(() => PathValidator.validateConfigPath(filePath)).toThrow(
        `Config file not found: ${filePath}`
      );
    });
  });
});
