export const MIN_FONT = 11;
export const MAX_FONT = 48;

export interface FontRange {
  min: number;
  max: number;
}

export const DEFAULT_FONT_RANGE: FontRange = { min: MIN_FONT, max: MAX_FONT };

/**
 * Linear count-to-size mapping over the selected subset. Intermediate sizes
 * truncate toward `range.min`; a subset whose counts are all equal maps to
 * `range.min`.
 */
export function fontSize(
  count: number,
  minCount: number,
  maxCount: number,
  range: FontRange = DEFAULT_FONT_RANGE,
): number {
  if (maxCount === minCount) return range.min;
  const numerator = (range.max - range.min) * (count - minCount);
  const denominator = maxCount - minCount;
  return Math.trunc(numerator / denominator) + range.min;
}

export function fontClass(size: number): string {
  return `f${size}`;
}
