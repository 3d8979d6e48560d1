import { getDebugCapturePath, getFetchTimeoutMs, getGrossesUrl, getPairingMode } from "@/lib/config";
import { assembleRecords } from "../assemble";
import { captureDiagnostic, DIAGNOSTIC_CAPTURE_CHARS, type DiagnosticWriter } from "../debugCapture";
import { fetchPage } from "../fetchHtml";
import { pageText } from "../pageText";
import { findSeries, isEmptySeries, seriesCounts } from "../series";
import {
  describeStageError,
  type PairingMode,
  type Scraper,
  type SeriesName,
  type StageError,
  type WeeklyRecord,
} from "../types";

export interface ExtractOptions {
  pairing?: PairingMode;
  now?: Date;
  debugCapturePath?: string;
  writeDiagnostic?: DiagnosticWriter;
}

export interface ExtractionResult {
  records: WeeklyRecord[];
  errors: StageError[];
  counts: Record<SeriesName, number>;
  sorted: boolean;
  diagnosticCaptured: boolean;
}

/**
 * Extract weekly records from already-flattened page text.
 */
export function extractFromText(text: string, options: ExtractOptions = {}): ExtractionResult {
  const pairing = options.pairing ?? "positional";
  const series = findSeries(text);
  const counts = seriesCounts(series);
  console.log(
    `[extract] Found ${counts.weeks} weeks, ${counts.shows} shows, ${counts.gross} gross, ${counts.attendance} attendance`
  );

  if (isEmptySeries(series)) {
    console.log("[extract] No data found with current patterns. The page structure may have changed.");
    const path = options.debugCapturePath ?? getDebugCapturePath();
    const write = options.writeDiagnostic ?? captureDiagnostic;
    const diagnosticCaptured = write(text, path);
    if (diagnosticCaptured) {
      console.log(`[extract] First ${DIAGNOSTIC_CAPTURE_CHARS} characters of page text saved to ${path} for inspection`);
    }
    return { records: [], errors: [], counts, sorted: false, diagnosticCaptured };
  }

  const min = Math.min(counts.weeks, counts.shows, counts.gross, counts.attendance);
  const outcome = assembleRecords(series, { pairing, now: options.now });

  for (const err of outcome.errors) {
    if (err.kind === "ExtractionMismatch") {
      console.warn(`[extract] Warning: ${describeStageError(err)}`);
      if (pairing === "positional") console.warn(`[extract] Using the first ${min} positions of each series.`);
    } else if (err.kind === "FieldParseError" && err.field === "week_ending") {
      console.warn(`[extract] Warning: could not convert dates (${describeStageError(err)})`);
    } else {
      console.warn(`[extract] Skipping record: ${describeStageError(err)}`);
    }
  }

  if (min === 0) {
    console.log("[extract] No matching data found for all required fields.");
    return { records: [], errors: outcome.errors, counts, sorted: false, diagnosticCaptured: false };
  }
  if (!outcome.sorted && outcome.records.length > 0) {
    console.warn("[extract] Dates left as found; records are in page order.");
  }

  return { records: outcome.records, errors: outcome.errors, counts, sorted: outcome.sorted, diagnosticCaptured: false };
}

/**
 * Extract weekly records from raw page HTML.
 */
export function extractWeeklyRecords(html: string, options: ExtractOptions = {}): ExtractionResult {
  return extractFromText(pageText(html), options);
}

export interface WeeklyGrossesScraperOptions extends ExtractOptions {
  url?: string;
  timeoutMs?: number;
}

export function createWeeklyGrossesScraper(options: WeeklyGrossesScraperOptions = {}): Scraper {
  const url = options.url ?? getGrossesUrl();
  return {
    id: "weekly-grosses",
    name: "Broadway weekly grosses",
    url,

    async fetch() {
      return fetchPage(url, options.timeoutMs ?? getFetchTimeoutMs());
    },

    parse(html: string): WeeklyRecord[] {
      const pairing = options.pairing ?? getPairingMode();
      return extractWeeklyRecords(html, { ...options, pairing }).records;
    },
  };
}
