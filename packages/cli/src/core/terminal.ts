/**
 * Terminal size probing
 */

import type { DisplayConfig } from '@asciihist/utils';

export interface TerminalSize {
  columns: number;
  rows: number;
}

export interface TerminalLike {
  isTTY?: boolean;
  columns?: number;
  rows?: number;
}

export const DEFAULT_TERMINAL_SIZE: TerminalSize = { columns: 80, rows: 24 };

/**
 * Size of the output terminal.
 *
 * A TTY reports its own size; otherwise COLUMNS/LINES from the environment,
 * then 80x24.
 */
export function getTerminalSize(
  output: TerminalLike,
  config: Pick<DisplayConfig, 'columns' | 'rows'>
): TerminalSize {
  const ttyColumns = output.isTTY && output.columns ? output.columns : undefined;
  const ttyRows = output.isTTY && output.rows ? output.rows : undefined;

  return {
    columns: ttyColumns ?? config.columns ?? DEFAULT_TERMINAL_SIZE.columns,
    rows: ttyRows ?? config.rows ?? DEFAULT_TERMINAL_SIZE.rows,
  };
}
