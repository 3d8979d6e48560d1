import { parseWeekEnding, parseWholeNumber, stripThousands } from "@/lib/normalize/normalizeFigures";
import { seriesCounts } from "./series";
import type {
  ExtractionMismatch,
  FieldParseError,
  PairingMode,
  SeriesMatch,
  StageError,
  WeeklyRecord,
  WeeklySeries,
} from "./types";

/** The four raw tokens chosen for one record, before any parsing. */
export interface RowTokens {
  position: number;
  week: string;
  shows: string;
  gross: string;
  attendance: string;
}

interface ParsedRow {
  position: number;
  week: string;
  grossTotal: number;
  totalAttendance: number;
  numberOfShows: number;
}

export interface AssemblyOutcome {
  records: WeeklyRecord[];
  /** Non-fatal problems, in the order they were found. */
  errors: StageError[];
  /** False when a week_ending failed to parse and the batch was left in page order. */
  sorted: boolean;
}

export interface AssembleOptions {
  pairing?: PairingMode;
  now?: Date;
}

function mismatch(series: WeeklySeries): ExtractionMismatch | null {
  const counts = seriesCounts(series);
  const { weeks, shows, gross, attendance } = counts;
  if (weeks === shows && shows === gross && gross === attendance) return null;
  return { kind: "ExtractionMismatch", counts };
}

/**
 * Zip the i-th token of each series. Anything past the shortest series is dropped.
 * Pairing is by index only, so a page that lists the fields in a different order
 * per week produces wrong pairings.
 */
export function pairPositional(series: WeeklySeries): RowTokens[] {
  const n = Math.min(series.weeks.length, series.shows.length, series.gross.length, series.attendance.length);
  const rows: RowTokens[] = [];
  for (let i = 0; i < n; i++) {
    rows.push({
      position: i,
      week: series.weeks[i].value,
      shows: series.shows[i].value,
      gross: series.gross[i].value,
      attendance: series.attendance[i].value,
    });
  }
  return rows;
}

function firstWithin(matches: SeriesMatch[], start: number, end: number): SeriesMatch | undefined {
  return matches.find((m) => m.index >= start && m.index < end);
}

/**
 * Treat each "Week Ending" match as the start of a block that runs to the next one,
 * and take the first shows/gross/attendance match inside it.
 */
export function pairByProximity(series: WeeklySeries): { rows: RowTokens[]; errors: FieldParseError[] } {
  const rows: RowTokens[] = [];
  const errors: FieldParseError[] = [];
  series.weeks.forEach((week, k) => {
    const start = week.index;
    const end = series.weeks[k + 1]?.index ?? Number.POSITIVE_INFINITY;
    const shows = firstWithin(series.shows, start, end);
    const gross = firstWithin(series.gross, start, end);
    const attendance = firstWithin(series.attendance, start, end);
    if (!shows || !gross || !attendance) {
      errors.push({ kind: "FieldParseError", index: k, field: "missing", raw: week.value });
      return;
    }
    rows.push({ position: k, week: week.value, shows: shows.value, gross: gross.value, attendance: attendance.value });
  });
  return { rows, errors };
}

function parseRow(tokens: RowTokens): ParsedRow | FieldParseError {
  const grossTotal = parseWholeNumber(stripThousands(tokens.gross));
  if (grossTotal === null) {
    return { kind: "FieldParseError", index: tokens.position, field: "gross_total", raw: tokens.gross };
  }
  const totalAttendance = parseWholeNumber(stripThousands(tokens.attendance));
  if (totalAttendance === null) {
    return { kind: "FieldParseError", index: tokens.position, field: "total_attendance", raw: tokens.attendance };
  }
  const numberOfShows = parseWholeNumber(tokens.shows);
  if (numberOfShows === null) {
    return { kind: "FieldParseError", index: tokens.position, field: "number_of_shows", raw: tokens.shows };
  }
  return { position: tokens.position, week: tokens.week, grossTotal, totalAttendance, numberOfShows };
}

/**
 * Build records from the four series.
 *
 * A position is kept only if all three numeric tokens parse; otherwise that one
 * position is dropped. Week-ending dates are parsed last: if every date parses the
 * records are sorted newest first (stable), otherwise dates stay as the page text
 * and the order is left as found.
 */
export function assembleRecords(series: WeeklySeries, options: AssembleOptions = {}): AssemblyOutcome {
  const pairing = options.pairing ?? "positional";
  const scrapedAt = options.now ?? new Date();
  const errors: StageError[] = [];

  const m = mismatch(series);
  if (m) errors.push(m);

  let tokens: RowTokens[];
  if (pairing === "proximity") {
    const paired = pairByProximity(series);
    tokens = paired.rows;
    errors.push(...paired.errors);
  } else {
    tokens = pairPositional(series);
  }

  const rows: ParsedRow[] = [];
  for (const t of tokens) {
    const parsed = parseRow(t);
    if ("kind" in parsed) {
      errors.push(parsed);
      continue;
    }
    rows.push(parsed);
  }

  const dated: { row: ParsedRow; date: Date }[] = [];
  const dateErrors: FieldParseError[] = [];
  for (const row of rows) {
    const date = parseWeekEnding(row.week);
    if (date) dated.push({ row, date });
    else dateErrors.push({ kind: "FieldParseError", index: row.position, field: "week_ending", raw: row.week });
  }

  const toRecord = (row: ParsedRow, weekEnding: Date | string): WeeklyRecord => ({
    weekEnding,
    grossTotal: row.grossTotal,
    totalAttendance: row.totalAttendance,
    numberOfShows: row.numberOfShows,
    scrapedAt,
  });

  if (dateErrors.length > 0) {
    errors.push(...dateErrors);
    return { records: rows.map((row) => toRecord(row, row.week)), errors, sorted: false };
  }

  dated.sort((a, b) => b.date.getTime() - a.date.getTime());
  return { records: dated.map(({ row, date }) => toRecord(row, date)), errors, sorted: true };
}
