/**
 * Configuration loading from environment variables
 *
 * Environment values are defaults only: command-line flags override them.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const BIN_STRATEGIES = ['sturges', 'sqrt', 'rice'] as const;

const positiveInt = z.coerce.number().int().positive();

const DisplayEnvSchema = z.object({
  ASCIIHIST_WIDTH: positiveInt.optional(),
  ASCIIHIST_BINS: positiveInt.optional(),
  ASCIIHIST_GLYPH: z.string().min(1).optional(),
  ASCIIHIST_BIN_STRATEGY: z.enum(BIN_STRATEGIES).optional(),
  COLUMNS: positiveInt.optional(),
  LINES: positiveInt.optional(),
});

export interface DisplayConfig {
  /** Maximum bar width; undefined means "fit the terminal". */
  width?: number;
  /** Fixed bin count; undefined means auto selection. */
  bins?: number;
  glyph: string;
  binStrategy: (typeof BIN_STRATEGIES)[number];
  /** Terminal size hints used when stdout is not a TTY. */
  columns?: number;
  rows?: number;
}

/**
 * Load display defaults from environment variables
 */
export function getDisplayConfig(env: NodeJS.ProcessEnv = process.env): DisplayConfig {
  // Blank variables are treated as unset
  const present = Object.fromEntries(
    Object.keys(DisplayEnvSchema.shape)
      .filter((key) => env[key] !== undefined && env[key] !== '')
      .map((key) => [key, env[key]])
  );

  const parsed = DisplayEnvSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? String(issue.path[0]) : undefined;
    throw new ConfigurationError(
      `Invalid environment variable ${key ?? ''}: ${issue?.message ?? 'invalid value'}`.trim(),
      key,
      { value: key ? env[key] : undefined }
    );
  }

  const values = parsed.data;
  return {
    width: values.ASCIIHIST_WIDTH,
    bins: values.ASCIIHIST_BINS,
    glyph: values.ASCIIHIST_GLYPH ?? '█',
    binStrategy: values.ASCIIHIST_BIN_STRATEGY ?? 'sturges',
    columns: values.COLUMNS,
    rows: values.LINES,
  };
}
