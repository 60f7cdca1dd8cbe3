/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@asciihist/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.infer<T> {
  const result = schema.safeParse(rawArgs);
  if (result.success) {
    return result.data;
  }

  const messages = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `  ${path}: ${issue.message}`;
  });

  throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
    issues: result.error.issues,
    formattedMessages: messages,
  });
}

/**
 * Normalize Commander options to a flat object.
 *
 * Keys are never renamed (Commander already produces camelCase). Only values
 * are normalized:
 * - undefined/null entries are dropped so schema defaults apply
 * - "true"/"false" become booleans
 * - pure numeric strings become numbers
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(options)) {
    if (value === undefined || value === null) {
      continue;
    }

    if (typeof value !== 'string') {
      normalized[key] = value;
      continue;
    }

    if (value === 'true') {
      normalized[key] = true;
    } else if (value === 'false') {
      normalized[key] = false;
    } else if (value.trim() !== '' && String(Number(value)) === value.trim()) {
      normalized[key] = Number(value);
    } else {
      normalized[key] = value;
    }
  }

  return normalized;
}
