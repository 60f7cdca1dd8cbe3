/**
 * Scaler
 *
 * Maps counts to bar lengths bounded by a display width.
 */

export interface ScaleOptions {
  /**
   * Give every non-zero count at least one unit so it never looks like an
   * empty bin. Default true.
   */
  preserveNonZero?: boolean;
}

/**
 * Bar length per count: round(count * width / max(counts)).
 *
 * Never throws. All-zero counts, an empty list or a non-positive width give
 * all-zero lengths.
 */
export function scaleCounts(
  counts: readonly number[],
  width: number,
  options: ScaleOptions = {}
): number[] {
  const { preserveNonZero = true } = options;
  const maxCount = counts.reduce((max, count) => (count > max ? count : max), 0);

  if (maxCount <= 0 || !(width > 0)) {
    return counts.map(() => 0);
  }

  const scale = width / maxCount;
  return counts.map((count) => {
    const length = Math.max(0, Math.round(count * scale));
    if (preserveNonZero && count > 0 && length === 0) {
      return 1;
    }
    return length;
  });
}

/**
 * Columns left for bars after the label and count columns plus separators.
 * Never below 1.
 */
export function availableBarWidth(
  totalColumns: number,
  labelWidth: number,
  countWidth: number
): number {
  // label + " │" + bar + " " + count
  const reserved = labelWidth + 2 + 1 + countWidth;
  return Math.max(1, Math.floor(totalColumns - reserved));
}
