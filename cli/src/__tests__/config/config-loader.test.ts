/**
 * Tests for ConfigLoader.
 *
 * Config files are written to a temporary directory for each test.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigLoader } from '../../config/config-loader.js';
import { defaultConfig } from '../../config/i-config.js';

describe('ConfigLoader', () => {
  let tempDir: string;
  let configLoader: ConfigLoader;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'promptpane-config-'));
    configLoader = new ConfigLoader(tempDir);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(filename: string, content: string): string {
    const filePath = path.join(tempDir, filename);
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
  }

  it('returns the defaults when no config file exists', async () => {
    await expect(configLoader.load()).resolves.toEqual(defaultConfig);
  });

  it('picks up promptpane.config.json from the working directory', async () => {
    writeConfig('promptpane.config.json', '{"api": {"model": "gemini-pro"}}');

    const config = await configLoader.load();

    expect(config.api.model).toBe('gemini-pro');
  });

  it('loads an explicit path relative to the working directory', async () => {
    writeConfig('custom.json', '{"keymap": {"close": "x"}}');

    const config = await configLoader.load('custom.json');

    expect(config.keymap).toEqual({ close: 'x', export: 't', showMeta: '?' });
  });

  it('rejects an empty path', async () => {
    await expect(configLoader.load('  ')).rejects.toThrow(
      'Config file path cannot be empty.\nPlease provide a valid config file path.'
    );
  });

  it('rejects a missing explicit file', async () => {
    await expect(configLoader.load('missing.json')).rejects.toThrow(
      `Config file not found: ${path.join(tempDir, 'missing.json')}`
    );
  });

  it('rejects a directory', async () => {
    fs.mkdirSync(path.join(tempDir, 'dir.json'));

    await expect(configLoader.load('dir.json')).rejects.toThrow(
      `Config path is not a file: ${path.join(tempDir, 'dir.json')}`
    );
  });

  it('explains truncated JSON', async () => {
    const filePath = writeConfig('broken.json', '{"api": {');

    const error = await configLoader.load('broken.json').catch((e) => e);

    expect(error).toBeInstanceOf(Error);
    const lines = (error as Error).message.split('\n');
    expect(lines[0]).toBe('Configuration file is not valid JSON');
    expect(lines[2]).toBe(`Config file: ${filePath}`);
    expect(lines).toContain('  - Check for unclosed braces or brackets');
  });

  it('explains trailing commas', async () => {
    writeConfig('comma.json', '{"api": {"model": "x"},}');

    await expect(configLoader.load('comma.json')).rejects.toThrow(
      'Check for trailing commas and unquoted property names'
    );
  });

  it('names the file when validation fails', async () => {
    const filePath = writeConfig('invalid.json', '{"spinner": {"interval": 0}}');

    await expect(configLoader.load('invalid.json')).rejects.toThrow(
      'Invalid configuration:\n' +
        '  - spinner.interval: must be a positive number (milliseconds)\n\n' +
        `Config file: ${filePath}`
    );
  });
});
