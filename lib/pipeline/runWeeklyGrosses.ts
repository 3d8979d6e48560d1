import { formatPreview } from "@/lib/export/preview";
import { writeSpreadsheet } from "@/lib/export/writeSpreadsheet";
import { createWeeklyGrossesScraper } from "@/lib/scrapers/sources/weeklyGrosses";
import { describeStageError, type Scraper, type StageError, type WeeklyRecord } from "@/lib/scrapers/types";

export type RunStatus = "written" | "empty" | "transport_failed" | "write_failed" | "dry_run";

export interface RunSummary {
  status: RunStatus;
  records: WeeklyRecord[];
  outputPath?: string;
  error?: StageError;
}

export interface RunOptions {
  scraper?: Scraper;
  outputPath?: string;
  dryRun?: boolean;
  previewLimit?: number;
}

/**
 * Fetch → extract → write, once. Every failure ends the run with a summary rather
 * than an exception.
 */
export async function runWeeklyGrosses(options: RunOptions = {}): Promise<RunSummary> {
  const scraper = options.scraper ?? createWeeklyGrossesScraper();
  console.log(
    `[scrape] ${scraper.id}: Starting web scraping of ${scraper.name} (${scraper.url})${options.dryRun ? " (DRY RUN)" : ""}...`
  );

  const page = await scraper.fetch();
  if (!page.ok) {
    console.error(`[scrape] ${scraper.id} failed: ${describeStageError(page.error)}`);
    return { status: "transport_failed", records: [], error: page.error };
  }

  const records = scraper.parse(page.value);
  if (records.length === 0) {
    console.log("[scrape] No data was scraped. Please check the URL and data format.");
    return { status: "empty", records };
  }

  console.log(`[scrape] ${scraper.id}: Successfully scraped ${records.length} records`);
  console.log("\nPreview of scraped data:");
  console.log(formatPreview(records, options.previewLimit));

  if (options.dryRun) {
    console.log("\n[scrape] DRY RUN: spreadsheet not written");
    return { status: "dry_run", records };
  }

  const written = writeSpreadsheet(records, options.outputPath);
  if (!written.ok) {
    console.error("\n[scrape] Failed to save data to spreadsheet");
    return { status: "write_failed", records, error: written.error };
  }
  console.log(`\n[scrape] Data successfully saved to ${written.value}`);
  return { status: "written", records, outputPath: written.value };
}

export function exitCodeFor(summary: RunSummary): number {
  return summary.status === "written" || summary.status === "dry_run" ? 0 : 1;
}
