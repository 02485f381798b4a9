/**
 * Nearest-rank percentile:
 * index = clamp(round(p/100 × (len-1)), 0, len-1) over ascending values.
 * Returns 0 for an empty list.
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.round((p / 100) * (sorted.length - 1));
  const clamped = Math.max(0, Math.min(sorted.length - 1, index));
  return sorted[clamped] ?? 0;
}
