import type { WeeklyRecord } from "@/lib/scrapers/types";
import { COLUMNS } from "./writeSpreadsheet";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatWeekEnding(value: Date | string): string {
  if (typeof value === "string") return value;
  return `${value.getFullYear()}-${pad2(value.getMonth() + 1)}-${pad2(value.getDate())}`;
}

export function formatTimestamp(value: Date): string {
  const time = `${pad2(value.getHours())}:${pad2(value.getMinutes())}:${pad2(value.getSeconds())}`;
  return `${formatWeekEnding(value)} ${time}`;
}

/**
 * Plain-text table of the first `limit` records, numbers right-aligned.
 */
export function formatPreview(records: WeeklyRecord[], limit = 5): string {
  const body = records
    .slice(0, limit)
    .map((r) => [
      formatWeekEnding(r.weekEnding),
      String(r.grossTotal),
      String(r.totalAttendance),
      String(r.numberOfShows),
      formatTimestamp(r.scrapedAt),
    ]);
  const header: string[] = [...COLUMNS];
  const widths = header.map((h, i) => Math.max(h.length, ...body.map((row) => row[i].length)));
  const line = (cells: string[]) =>
    cells.map((c, i) => (i === 0 || i === 4 ? c.padEnd(widths[i]) : c.padStart(widths[i]))).join("  ").trimEnd();
  return [line(header), ...body.map(line)].join("\n");
}
