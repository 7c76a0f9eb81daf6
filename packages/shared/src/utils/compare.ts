/**
 * Code-point string ordering. Unlike `localeCompare` it does not depend on
 * the host locale, so rankings that tie-break on names are stable everywhere.
 */
export function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
