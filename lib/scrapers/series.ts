import type { SeriesMatch, SeriesName, WeeklySeries } from "./types";

/** Label-anchored patterns; group 1 is the token kept for each series. */
export const SERIES_PATTERNS: Record<SeriesName, RegExp> = {
  weeks: /Week Ending:\s*(\d{1,2}\/\d{1,2}\/\d{4})/g,
  shows: /Number of Shows:\s*(\d+)/g,
  gross: /Gross Gross:\s*\$?([\d,]+)/g,
  attendance: /Total Attendance:\s*([\d,]+)/g,
};

function findAll(text: string, pattern: RegExp): SeriesMatch[] {
  const out: SeriesMatch[] = [];
  for (const m of text.matchAll(pattern)) {
    const value = m[1];
    if (value === undefined || m.index === undefined) continue;
    out.push({ value, index: m.index });
  }
  return out;
}

/**
 * Run the four searches independently. The series are not guaranteed to be the same length.
 */
export function findSeries(text: string): WeeklySeries {
  return {
    weeks: findAll(text, SERIES_PATTERNS.weeks),
    shows: findAll(text, SERIES_PATTERNS.shows),
    gross: findAll(text, SERIES_PATTERNS.gross),
    attendance: findAll(text, SERIES_PATTERNS.attendance),
  };
}

export function seriesCounts(series: WeeklySeries): Record<SeriesName, number> {
  return {
    weeks: series.weeks.length,
    shows: series.shows.length,
    gross: series.gross.length,
    attendance: series.attendance.length,
  };
}

export function isEmptySeries(series: WeeklySeries): boolean {
  const c = seriesCounts(series);
  return c.weeks === 0 && c.shows === 0 && c.gross === 0 && c.attendance === 0;
}
