/**
 * Output Formatter - chart text or JSON
 */

import { renderReport, type RenderOptions, type Report } from '@asciihist/core';
import type { OutputFormat } from '../command-defs/histogram.js';

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Format a report in the requested output format
 */
export function formatOutput(
  report: Report,
  format: OutputFormat,
  renderOptions: RenderOptions
): string {
  if (format === 'json') {
    return formatJSON(report);
  }
  return renderReport(report, renderOptions);
}
