/**
 * Configuration validation functions.
 *
 * Pure functions for validating and merging user configuration with defaults.
 * Separated from ConfigLoader to enable testing without file I/O.
 */

import { z } from 'zod';
import type { IConfig, IUserConfig } from './i-config.js';
import { defaultConfig } from './i-config.js';

const ratio = z
  .number()
  .gt(0, 'must be greater than 0')
  .max(1, 'must be at most 1');

const milliseconds = z
  .number()
  .finite()
  .positive('must be a positive number (milliseconds)');

const key = z.string().length(1, 'must be a single character');

/**
 * Schema for user configuration. Every section and field is optional;
 * unknown fields are rejected so typos surface early.
 */
export const UserConfigSchema = z
  .object({
    api: z
      .object({
        host: z.string().min(1).regex(/^[^/\s]+$/, 'must be a bare host name'),
        version: z.string().min(1),
        model: z.string().min(1),
      })
      .partial()
      .strict(),
    credentials: z
      .object({
        envVar: z.string().min(1),
      })
      .partial()
      .strict(),
    transport: z
      .object({
        command: z.string().min(1),
        timeout: milliseconds,
        killEscalationDelay: milliseconds,
      })
      .partial()
      .strict(),
    spinner: z
      .object({
        interval: milliseconds,
      })
      .partial()
      .strict(),
    surface: z
      .object({
        loadingWidthRatio: ratio,
        resultWidthRatio: ratio,
        resultHeightRatio: ratio,
      })
      .partial()
      .strict(),
    keymap: z
      .object({
        close: key,
        export: key,
        showMeta: key,
      })
      .partial()
      .strict(),
    views: z
      .object({
        directory: z.string().min(1),
        openInEditor: z.boolean(),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

/**
 * Format a Zod validation error into a readable message.
 *
 * @param error - Zod validation error
 * @returns Message listing each failing field
 */
export function formatValidationError(error: z.ZodError): string {
  const issues = error.issues;

  if (issues.length === 0) {
    return 'Invalid configuration: Unknown validation error';
  }

  const fieldErrors = issues.map((issue) => {
    const path = issue.path.join('.');
    const pathDisplay = path || 'root';
    return `  - ${pathDisplay}: ${issue.message}`;
  });

  return 'Invalid configuration:\n' + fieldErrors.join('\n');
}

/**
 * Validate user configuration and merge with defaults.
 *
 * @param userConfig - User-provided configuration (parsed JSON or overrides)
 * @returns Validated and merged configuration
 * @throws Error if validation fails
 */
export function validateAndMerge(userConfig: unknown): IConfig {
  const result = UserConfigSchema.safeParse(userConfig);
  if (!result.success) {
    throw new Error(formatValidationError(result.error));
  }

  const config = mergeConfig(defaultConfig, result.data);

  const { close, export: exportKey, showMeta } = config.keymap;
  if (new Set([close, exportKey, showMeta]).size !== 3) {
    throw new Error(
      `Invalid keymap: close (${close}), export (${exportKey}) and showMeta (${showMeta}) must be different keys`
    );
  }

  return config;
}

/**
 * Merge overrides section by section over a base configuration.
 */
export function mergeConfig(base: IConfig, overrides: IUserConfig): IConfig {
  return {
    api: { ...base.api, ...overrides.api },
    credentials: { ...base.credentials, ...overrides.credentials },
    transport: { ...base.transport, ...overrides.transport },
    spinner: { ...base.spinner, ...overrides.spinner },
    surface: { ...base.surface, ...overrides.surface },
    keymap: { ...base.keymap, ...overrides.keymap },
    views: { ...base.views, ...overrides.views },
  };
}
