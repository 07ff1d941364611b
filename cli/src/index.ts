#!/usr/bin/env node
/**
 * Main entry point for the promptpane CLI.
 *
 * Sets up Commander.js with the `ask` command (also the default).
 */

/* eslint-disable unicorn/no-process-exit, n/no-process-exit */

import { Command } from 'commander';
import { askCommand, type AskOptions } from './commands/ask.js';
import { ConfigLoader, DEFAULT_CONFIG_FILE } from './config/config-loader.js';
import { EXIT_CODE } from './constants/exit-codes.js';
import { TerminalDisplay } from './display/terminal-display.js';
import { EditorLauncher } from './editor/editor-launcher.js';

const program = new Command();

program
  .name('promptpane')
  .description(
    'Send text to the Gemini API and read the answer in a floating pane'
  )
  .version('0.1.0');

// Ask command
program
  .command('ask', { isDefault: true })
  .description(
    'Send a file, stdin (-), or a prompt composed in $EDITOR and show the answer'
  )
  .argument('[file]', "File to send; '-' reads stdin; omit to open $EDITOR")
  .option(
    '--config <path>',
    `Path to configuration file (default: ./${DEFAULT_CONFIG_FILE})`
  )
  .option('--model <id>', 'Model to query (overrides api.model)')
  .option('--no-open', 'Save exported views without opening an editor')
  .option('--verbose', 'Enable verbose output')
  .action(async (file: string | undefined, options: AskOptions) => {
    try {
      const display = new TerminalDisplay();
      const exitCode = await askCommand(file, options, {
        display,
        configLoader: new ConfigLoader(),
        editorLauncher: new EditorLauncher(),
      });
      if (exitCode !== EXIT_CODE.SUCCESS) {
        process.exit(exitCode);
      }
    } catch (error) {
      // Not expected: askCommand reports its own errors
      const errorDisplay = new TerminalDisplay();
      errorDisplay.showError(
        `Unexpected error: ${error instanceof Error ? error.message : String(error)}`
      );
      process.exit(EXIT_CODE.ERROR);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  new TerminalDisplay().showError(
    `Unexpected error: ${error instanceof Error ? error.message : String(error)}`
  );
  process.exit(EXIT_CODE.ERROR);
});
