/**
 * Round to `digits` decimals, exact ties going to the even neighbour
 * (12.5 → 12, 6.25 → 6.2 at one decimal).
 */
export function roundHalfEven(value: number, digits = 0): number {
  const scale = 10 ** digits;
  const scaled = value * scale;
  const floor = Math.floor(scaled);
  const rounded = scaled - floor === 0.5 ? (floor % 2 === 0 ? floor : floor + 1) : Math.round(scaled);
  return rounded / scale;
}

/**
 * Percentage of `part` in `whole`, rounded to one decimal with ties to even.
 *
 * 0.0 when `whole` is 0. Clamped to [0, 100]. Every percentage in the
 * pipeline goes through here so rounding is identical across report kinds.
 */
export function percent(part: number, whole: number): number {
  if (whole === 0) return 0;
  const rounded = roundHalfEven((part / whole) * 100, 1);
  return Math.min(100, Math.max(0, rounded));
}

/** Render a percentage as one decimal, e.g. 70 → "70.0%". */
export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export const BAR_WIDTH = 20;

/** Fixed-width text progress bar, proportionally filled. */
export function progressBar(pct: number, width: number = BAR_WIDTH): string {
  const filled = Math.max(0, Math.min(width, roundHalfEven((pct / 100) * width)));
  return "█".repeat(filled) + "░".repeat(width - filled);
}
