/**
 * @asciihist/cli - Command-line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/argument-parser.js';
export * from './core/coerce.js';
export * from './core/command-context.js';
export * from './core/error-handler.js';
export * from './core/execute.js';
export * from './core/input-source.js';
export * from './core/output-formatter.js';
export * from './core/terminal.js';
export * from './command-defs/histogram.js';
export * from './commands/histogram.js';
export * from './handlers/histogram/render-histogram.js';
