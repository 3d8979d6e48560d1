const WEEK_ENDING_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

export function stripThousands(value: string): string {
  return value.replace(/,/g, "");
}

/**
 * Parse a whole number token. Returns null for anything that is not plain digits
 * (e.g. an empty string left after stripping ",,,") or too large to be exact.
 */
export function parseWholeNumber(value: string): number | null {
  const t = value.trim();
  if (!/^\d+$/.test(t)) return null;
  const n = Number.parseInt(t, 10);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Parse "M/D/YYYY" or "MM/DD/YYYY" into a Date at local midnight.
 * Rejects out-of-range months and days that roll over (e.g. 2/30/2024).
 */
export function parseWeekEnding(value: string): Date | null {
  const m = value.trim().match(WEEK_ENDING_RE);
  if (!m) return null;
  const month = Number.parseInt(m[1], 10);
  const day = Number.parseInt(m[2], 10);
  const year = Number.parseInt(m[3], 10);
  if (month < 1 || month > 12 || day < 1) return null;
  const d = new Date(year, month - 1, day);
  // new Date(y, m, d) maps 0-99 to 1900-1999
  d.setFullYear(year);
  if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) return null;
  return d;
}
