/**
 * Weekly grosses scraper
 *
 * Fetches the weekly grosses page once, extracts Week Ending / Number of Shows /
 * Gross Gross / Total Attendance figures, and writes them to an .xlsx file.
 *
 * Usage:
 *   npm run scrape                          # weekly_show_data_<timestamp>.xlsx
 *   npm run scrape -- grosses.xlsx          # explicit output file
 *   npm run scrape -- --dry-run             # preview without writing
 *
 * Environment: GROSSES_URL, FETCH_TIMEOUT_MS, GROSSES_PAIRING, DEBUG_CAPTURE_PATH
 */

import { exitCodeFor, runWeeklyGrosses } from "@/lib/pipeline/runWeeklyGrosses";

const args = process.argv.slice(2);
const dryRun = args.includes("--dry-run");
const outputPath = args.find((a) => !a.startsWith("--"));

runWeeklyGrosses({ outputPath, dryRun })
  .then((summary) => {
    process.exitCode = exitCodeFor(summary);
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  });
