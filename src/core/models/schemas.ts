/**
 * Zod schemas for configuration validation
 *
 * Validates the raw (snake_case) shape of .mockwright/config.yaml after
 * environment overrides have been applied.
 */

import { z } from 'zod/v4';
import { DEFAULT_POLL_INTERVAL_MS } from './config.js';

/** Debug configuration schema */
export const DebugConfigSchema = z.object({
  enabled: z.boolean().optional().default(false),
  log_file: z.string().optional(),
});

export const MockwrightConfigSchema = z.object({
  /** Poll interval for eventual verification, in milliseconds */
  poll_interval_ms: z.number().int().positive().optional().default(DEFAULT_POLL_INTERVAL_MS),
  verbose: z.boolean().optional().default(false),
  debug: DebugConfigSchema.optional(),
});

export type RawMockwrightConfig = z.infer<typeof MockwrightConfigSchema>;
