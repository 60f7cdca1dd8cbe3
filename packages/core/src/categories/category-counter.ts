/**
 * Category Counter
 *
 * Frequency counts of distinct trimmed lines, for input that is mostly text.
 * Ordered by count ascending, ties broken by label.
 */

import { EmptyInputError } from '../errors.js';
import type { CategoryCount, CategoryReport } from '../types.js';

export function countCategories(lines: Iterable<string>): CategoryReport {
  const counts = new Map<string, number>();
  let total = 0;

  for (const line of lines) {
    const label = line.trim();
    if (label.length === 0) continue;
    counts.set(label, (counts.get(label) ?? 0) + 1);
    total++;
  }

  if (total === 0) {
    throw new EmptyInputError();
  }

  const categories: CategoryCount[] = Array.from(counts, ([label, count]) => ({ label, count })).sort(
    (a, b) => a.count - b.count || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0)
  );

  return { kind: 'categorical', total, categories, skipped: 0 };
}
