import { DEFAULT_FETCH_TIMEOUT_MS } from "@/lib/config";
import { fail, ok, type Result, type TransportError } from "./types";

const UA =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export class HttpStatusError extends Error {
  constructor(
    public status: number,
    public url: string
  ) {
    super(`HTTP ${status}: ${url}`);
    this.name = "HttpStatusError";
  }
}

/**
 * Fetch HTML from a URL with a desktop browser user-agent.
 * Throws on network failure, timeout, or a non-2xx status.
 */
export async function fetchHtml(url: string, timeoutMs = DEFAULT_FETCH_TIMEOUT_MS): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, {
      signal: controller.signal,
      redirect: "follow",
      headers: { "User-Agent": UA },
    });
    if (!res.ok) {
      throw new HttpStatusError(res.status, url);
    }
    return await res.text();
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Single attempt, no retry. Failures come back as a TransportError instead of throwing.
 */
export async function fetchPage(
  url: string,
  timeoutMs = DEFAULT_FETCH_TIMEOUT_MS
): Promise<Result<string, TransportError>> {
  try {
    return ok(await fetchHtml(url, timeoutMs));
  } catch (e) {
    if (e instanceof HttpStatusError) {
      return fail({ kind: "TransportError", url, message: e.message, status: e.status });
    }
    const msg = e instanceof Error ? e.message : String(e);
    return fail({ kind: "TransportError", url, message: msg });
  }
}
