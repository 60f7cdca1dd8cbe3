/**
 * Histogram Command Definition
 *
 * Shared schema and types for the histogram command.
 * Imported by commands/histogram.ts (for CLI options) and handlers (for types).
 */

import { z } from 'zod';
import { BinStrategySchema, DEFAULT_MAX_LINES, InputModeSchema } from '@asciihist/core';

/**
 * Histogram command schema
 *
 * `bins` is only checked for being a number here: the engine rejects
 * non-positive or fractional counts with its own InvalidBinCountError.
 */
export const histogramSchema = z.object({
  file: z.coerce.string().optional(),
  bins: z.number().optional(),
  binStrategy: BinStrategySchema.optional(),
  width: z.number().int().positive().optional(),
  strict: z.boolean().default(false),
  extract: z.boolean().default(false),
  mode: InputModeSchema.default('numeric'),
  glyph: z.coerce.string().min(1).optional(),
  precision: z.number().int().min(0).max(12).default(2),
  maxLines: z.number().int().positive().default(DEFAULT_MAX_LINES),
  preserveNonzero: z.boolean().default(true),
  format: z.enum(['table', 'json']).default('table'),
  verbose: z.boolean().default(false),
});

/**
 * Histogram command arguments type
 */
export type HistogramArgs = z.infer<typeof histogramSchema>;

export type OutputFormat = HistogramArgs['format'];
