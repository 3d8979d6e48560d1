import { writeFileSync } from "node:fs";

export const DIAGNOSTIC_CAPTURE_CHARS = 5000;

export type DiagnosticWriter = (text: string, path: string) => boolean;

/**
 * Save the first slice of the flattened page text so a page with no matches can be
 * inspected offline. A failed write is reported and otherwise ignored.
 */
export const captureDiagnostic: DiagnosticWriter = (text, path) => {
  try {
    // Count code points so a surrogate pair is never split.
    writeFileSync(path, Array.from(text).slice(0, DIAGNOSTIC_CAPTURE_CHARS).join(""), "utf-8");
    return true;
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.warn(`[extract] Could not write diagnostic capture to ${path}: ${msg}`);
    return false;
  }
};
