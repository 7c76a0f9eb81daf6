export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export type MonthName = (typeof MONTH_NAMES)[number];

const MONTH_INDEX = new Map<string, number>(MONTH_NAMES.map((m, i) => [m.toLowerCase(), i]));

/** Zero-based month index for an English month name (full or 3-letter), or null. */
export function monthIndex(name: string): number | null {
  const key = name.trim().toLowerCase();
  const full = MONTH_INDEX.get(key);
  if (full !== undefined) return full;
  if (key.length === 3) {
    const idx = MONTH_NAMES.findIndex((m) => m.toLowerCase().startsWith(key));
    return idx >= 0 ? idx : null;
  }
  return null;
}

/** Month name `offset` months after the zero-based `baseIndex`, wrapping past December. */
export function monthNameAfter(baseIndex: number, offset: number): MonthName {
  const idx = (((baseIndex + offset) % 12) + 12) % 12;
  return MONTH_NAMES[idx] ?? 'January';
}
