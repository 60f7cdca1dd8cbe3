/**
 * Option Schemas
 *
 * Zod schemas for the options the engine accepts. Parsing fills defaults so
 * the rest of the engine works with complete option objects.
 */

import { z } from 'zod';

export const BinStrategySchema = z.enum(['sturges', 'sqrt', 'rice']);
export type BinStrategy = z.infer<typeof BinStrategySchema>;

export const InputModeSchema = z.enum(['numeric', 'categorical', 'auto']);
export type InputMode = z.infer<typeof InputModeSchema>;

/** Lines read before input is cut off */
export const DEFAULT_MAX_LINES = 10_000_000;

/** Invalid lines retained for diagnostics */
export const MAX_RECORDED_INVALID = 10;

/**
 * ReadOptions
 *
 * How raw lines become samples.
 */
export const ReadOptionsSchema = z.object({
  strict: z.boolean().default(false),
  extract: z.boolean().default(false),
  maxLines: z.number().int().positive().default(DEFAULT_MAX_LINES),
});

export type ReadOptions = z.input<typeof ReadOptionsSchema>;
export type ResolvedReadOptions = z.output<typeof ReadOptionsSchema>;

/**
 * RenderOptions
 *
 * How a report becomes text.
 */
export const RenderOptionsSchema = z.object({
  width: z.number().int().nonnegative().default(60),
  glyph: z.string().min(1).default('█'),
  precision: z.number().int().min(0).max(12).default(2),
  preserveNonZero: z.boolean().default(true),
});

export type RenderOptions = z.input<typeof RenderOptionsSchema>;
export type ResolvedRenderOptions = z.output<typeof RenderOptionsSchema>;
