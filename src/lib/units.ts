/**
 * Formatting and parsing helpers for reactor quantities.
 */

/**
 * Format a number with fixed precision and thousands separators.
 */
export function formatNumber(value: number, decimals: number = 3): string {
  return value.toLocaleString("en-US", {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });
}

/**
 * Format a fraction in [0,1] as a percentage, e.g. 0.7 -> "70.0%".
 */
export function formatPercent(fraction: number, decimals: number = 1): string {
  return `${(fraction * 100).toFixed(decimals)}%`;
}

/**
 * Format a label with its unit, e.g. "Input A (mol)".
 */
export function labelWithUnit(label: string, unit?: string): string {
  return unit ? `${label} (${unit})` : label;
}

/**
 * Parse a user-entered quantity. Blank or malformed text yields NaN so the
 * model rejects it instead of silently reading zero.
 */
export function parseQuantity(text: string): number {
  const trimmed = text.trim();
  if (trimmed === "") return NaN;
  return Number(trimmed);
}
