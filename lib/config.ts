import type { PairingMode } from "@/lib/scrapers/types";

export const DEFAULT_GROSSES_URL = "https://www.broadwayleague.com/research/grosses-broadway-nyc/";
export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;
export const DEFAULT_DEBUG_CAPTURE_PATH = "debug_html.txt";

export function getGrossesUrl(): string {
  const raw = process.env.GROSSES_URL?.trim();
  return raw || DEFAULT_GROSSES_URL;
}

export function getFetchTimeoutMs(): number {
  const raw = process.env.FETCH_TIMEOUT_MS?.trim();
  if (!raw) return DEFAULT_FETCH_TIMEOUT_MS;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) return DEFAULT_FETCH_TIMEOUT_MS;
  return n;
}

/**
 * How the four series are combined into records. "positional" zips by index;
 * "proximity" pairs each week with the figures that follow it before the next week.
 */
export function getPairingMode(): PairingMode {
  const raw = process.env.GROSSES_PAIRING?.trim().toLowerCase();
  return raw === "proximity" ? "proximity" : "positional";
}

export function getDebugCapturePath(): string {
  const raw = process.env.DEBUG_CAPTURE_PATH?.trim();
  return raw || DEFAULT_DEBUG_CAPTURE_PATH;
}
