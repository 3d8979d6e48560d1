/**
 * One week of figures as assembled from the grosses page.
 * weekEnding is a local-midnight Date, or the raw "M/D/YYYY" text when any date in the
 * batch failed to parse (the batch is then left unsorted).
 */
export interface WeeklyRecord {
  weekEnding: Date | string;
  grossTotal: number;
  totalAttendance: number;
  numberOfShows: number;
  scrapedAt: Date;
}

/** A captured token and its character offset in the page text. */
export interface SeriesMatch {
  value: string;
  index: number;
}

export interface WeeklySeries {
  weeks: SeriesMatch[];
  shows: SeriesMatch[];
  gross: SeriesMatch[];
  attendance: SeriesMatch[];
}

export type SeriesName = keyof WeeklySeries;

export type PairingMode = "positional" | "proximity";

export type RecordField = "week_ending" | "gross_total" | "total_attendance" | "number_of_shows";

export interface TransportError {
  kind: "TransportError";
  url: string;
  message: string;
  status?: number;
}

export interface ExtractionMismatch {
  kind: "ExtractionMismatch";
  counts: Record<SeriesName, number>;
}

export interface FieldParseError {
  kind: "FieldParseError";
  index: number;
  field: RecordField | "missing";
  raw: string;
}

export interface WriteError {
  kind: "WriteError";
  path: string;
  message: string;
}

export type StageError = TransportError | ExtractionMismatch | FieldParseError | WriteError;

export type Result<T, E extends StageError = StageError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends StageError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeStageError(error: StageError): string {
  switch (error.kind) {
    case "TransportError":
      return error.status != null
        ? `TransportError: HTTP ${error.status} from ${error.url}`
        : `TransportError: ${error.message} (${error.url})`;
    case "ExtractionMismatch": {
      const c = error.counts;
      return `ExtractionMismatch: Weeks: ${c.weeks}, Shows: ${c.shows}, Gross: ${c.gross}, Attendance: ${c.attendance}`;
    }
    case "FieldParseError":
      return error.field === "missing"
        ? `FieldParseError: block ${error.index} is missing a field near "${error.raw}"`
        : `FieldParseError: ${error.field} at index ${error.index}: "${error.raw}"`;
    case "WriteError":
      return `WriteError: ${error.path}: ${error.message}`;
  }
}

/**
 * A single-page source: fetch returns the page body, parse turns it into records.
 */
export interface Scraper {
  id: string;
  name: string;
  url: string;
  fetch(): Promise<Result<string, TransportError>>;
  parse(html: string): WeeklyRecord[];
}
