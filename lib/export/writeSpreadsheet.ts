import { writeFileSync } from "node:fs";
import * as XLSX from "xlsx";
import { describeStageError, fail, ok, type Result, type WeeklyRecord, type WriteError } from "@/lib/scrapers/types";

export const SHEET_NAME = "Weekly Shows";

export const COLUMNS = ["week_ending", "gross_total", "total_attendance", "number_of_shows", "scraped_at"] as const;

/** Character widths, same order as COLUMNS. */
export const COLUMN_WIDTHS = [15, 15, 18, 15, 20] as const;

export const CURRENCY_FORMAT = '"$"#,##0';
export const THOUSANDS_FORMAT = "#,##0";
export const DATE_FORMAT = "yyyy-mm-dd";
export const TIMESTAMP_FORMAT = "yyyy-mm-dd hh:mm:ss";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** weekly_show_data_YYYYMMDD_HHMMSS.xlsx in local time. */
export function defaultSpreadsheetName(now = new Date()): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `weekly_show_data_${date}_${time}.xlsx`;
}

const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Excel serial from the local calendar fields of a Date. Whole days for dates,
 * fractional for timestamps; no timezone offsets enter the arithmetic.
 */
export function excelSerial(value: Date, withTime = false): number {
  const utc = withTime
    ? Date.UTC(
        value.getFullYear(),
        value.getMonth(),
        value.getDate(),
        value.getHours(),
        value.getMinutes(),
        value.getSeconds()
      )
    : Date.UTC(value.getFullYear(), value.getMonth(), value.getDate());
  return (utc - EXCEL_EPOCH_MS) / DAY_MS;
}

function setFormat(ws: XLSX.WorkSheet, r: number, c: number, format: string): void {
  const cell = ws[XLSX.utils.encode_cell({ r, c })];
  // String week_ending cells (unparsed dates) keep their text as-is.
  if (cell && cell.t === "n") cell.z = format;
}

/**
 * Header row plus one row per record, in the order given.
 */
export function buildWorksheet(records: WeeklyRecord[]): XLSX.WorkSheet {
  const rows: (string | number)[][] = [
    [...COLUMNS],
    ...records.map((r) => [
      typeof r.weekEnding === "string" ? r.weekEnding : excelSerial(r.weekEnding),
      r.grossTotal,
      r.totalAttendance,
      r.numberOfShows,
      excelSerial(r.scrapedAt, true),
    ]),
  ];
  const ws = XLSX.utils.aoa_to_sheet(rows);

  for (let r = 1; r <= records.length; r++) {
    setFormat(ws, r, 0, DATE_FORMAT);
    setFormat(ws, r, 1, CURRENCY_FORMAT);
    setFormat(ws, r, 2, THOUSANDS_FORMAT);
    setFormat(ws, r, 4, TIMESTAMP_FORMAT);
  }
  ws["!cols"] = COLUMN_WIDTHS.map((wch) => ({ wch }));
  return ws;
}

/**
 * Write the records to a single-sheet workbook. Never throws: any failure comes
 * back as a WriteError.
 */
export function writeSpreadsheet(
  records: WeeklyRecord[],
  filename?: string,
  now = new Date()
): Result<string, WriteError> {
  const path = filename ?? defaultSpreadsheetName(now);
  try {
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(wb, buildWorksheet(records), SHEET_NAME);
    const buf: Buffer = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
    writeFileSync(path, buf);
    console.log(`[write] Data saved to ${path}`);
    return ok(path);
  } catch (e) {
    const error: WriteError = {
      kind: "WriteError",
      path,
      message: e instanceof Error ? e.message : String(e),
    };
    console.error(`[write] Error saving spreadsheet: ${describeStageError(error)}`);
    return fail(error);
  }
}
