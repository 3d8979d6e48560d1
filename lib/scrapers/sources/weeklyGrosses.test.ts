import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createWeeklyGrossesScraper, extractFromText, extractWeeklyRecords } from "./weeklyGrosses";

const NOW = new Date(2024, 4, 13, 8, 30, 0);

const ONE_WEEK_HTML = `
<div class="grosses">
  <p>Week Ending: 05/12/2024</p>
  <p>Number of Shows: 8</p>
  <p>Gross Gross: $1,234,567</p>
  <p>Total Attendance: 45,678</p>
</div>`;

const THREE_WEEKS_HTML = ["01/01/2024", "03/01/2024", "02/01/2024"]
  .map(
    (week, i) => `<section>
      <h3>Week Ending: ${week}</h3>
      <ul>
        <li>Number of Shows: ${i + 6}</li>
        <li>Gross Gross: $${i + 1},000,000</li>
        <li>Total Attendance: ${i + 1}0,000</li>
      </ul>
    </section>`
  )
  .join("\n");

describe("weekly grosses extraction", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("turns one labelled week into one record", () => {
    const writeDiagnostic = vi.fn(() => true);
    const result = extractWeeklyRecords(ONE_WEEK_HTML, { now: NOW, writeDiagnostic });

    expect(result.records).toHaveLength(1);
    const [record] = result.records;
    expect(record.weekEnding).toBeInstanceOf(Date);
    expect(record.weekEnding).toEqual(new Date(2024, 4, 12));
    expect(record.grossTotal).toBe(1234567);
    expect(record.totalAttendance).toBe(45678);
    expect(record.numberOfShows).toBe(8);
    expect(record.scrapedAt).toBe(NOW);
    expect(writeDiagnostic).not.toHaveBeenCalled();
    expect(vi.mocked(console.log)).toHaveBeenCalledWith("[extract] Found 1 weeks, 1 shows, 1 gross, 1 attendance");
  });

  it("returns records newest first", () => {
    const result = extractWeeklyRecords(THREE_WEEKS_HTML, { now: NOW });
    expect(result.sorted).toBe(true);
    expect(result.records.map((r) => r.grossTotal)).toEqual([2000000, 3000000, 1000000]);
    expect(result.records.map((r) => r.totalAttendance)).toEqual([20000, 30000, 10000]);
    expect(result.records.map((r) => r.numberOfShows)).toEqual([7, 8, 6]);
  });

  it("is repeatable apart from scrapedAt", () => {
    const first = extractWeeklyRecords(THREE_WEEKS_HTML, { now: new Date(2024, 0, 1) });
    const second = extractWeeklyRecords(THREE_WEEKS_HTML, { now: new Date(2024, 6, 1) });
    const strip = (r: (typeof first.records)[number]) => ({ ...r, scrapedAt: null });
    expect(first.records.map(strip)).toEqual(second.records.map(strip));
  });

  it("captures page text for inspection when nothing matches", () => {
    const writeDiagnostic = vi.fn(() => true);
    const result = extractWeeklyRecords("<p>Nothing to see</p>", {
      writeDiagnostic,
      debugCapturePath: "capture.txt",
    });

    expect(result.records).toEqual([]);
    expect(result.diagnosticCaptured).toBe(true);
    expect(writeDiagnostic).toHaveBeenCalledWith("Nothing to see", "capture.txt");
  });

  it("returns nothing without a capture when only some labels match", () => {
    const writeDiagnostic = vi.fn(() => true);
    const result = extractFromText("Week Ending: 05/12/2024 Number of Shows: 8", { writeDiagnostic });

    expect(result.records).toEqual([]);
    expect(result.counts).toEqual({ weeks: 1, shows: 1, gross: 0, attendance: 0 });
    expect(result.errors[0]?.kind).toBe("ExtractionMismatch");
    expect(writeDiagnostic).not.toHaveBeenCalled();
  });
});

describe("createWeeklyGrossesScraper", () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("fetches the configured url and parses the body", async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, text: async () => ONE_WEEK_HTML });
    const scraper = createWeeklyGrossesScraper({ url: "https://example.com/grosses", now: NOW });

    const page = await scraper.fetch();
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toBe("https://example.com/grosses");
    expect(page.ok).toBe(true);
    if (!page.ok) return;

    const records = scraper.parse(page.value);
    expect(records.map((r) => r.grossTotal)).toEqual([1234567]);
  });
});
