/**
 * Format a number with thousands separators and fixed decimals.
 * 120000 → "120,000", 1234.5 (1 dp) → "1,234.5"
 */
export function formatCount(value: number, decimals = 0): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });
}

/**
 * Format a percentage already on the 0–100 scale.
 * 12.345 → "12%", 12.345 (1 dp) → "12.3%", +5 with sign → "+5.0%"
 */
export function formatPct(value: number, decimals = 0, signed = false): string {
  const body = value.toFixed(decimals);
  return `${signed && value >= 0 ? '+' : ''}${body}%`;
}
