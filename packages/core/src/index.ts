/**
 * @asciihist/core - Histogram engine
 *
 * Sample parsing, statistics, binning, scaling and rendering. No I/O.
 */

export * from './errors.js';
export * from './schemas.js';
export type * from './types.js';

export * from './samples/parse-sample.js';
export * from './samples/collect-samples.js';

export * from './stats/accumulator.js';
export * from './stats/quartiles.js';

export * from './binning/bin-count.js';
export * from './binning/binner.js';

export * from './categories/category-counter.js';

export * from './render/scaler.js';
export * from './render/renderer.js';

export * from './report.js';
