import * as cheerio from "cheerio";

const NON_VISIBLE = "script, style, noscript, template";

/**
 * Flatten a page to its text nodes, in document order, with no separators added
 * between elements. Label patterns allow optional whitespace after the colon, so
 * `<td>Week Ending:</td><td>5/12/2024</td>` still matches as one run of text.
 */
export function pageText(html: string): string {
  const $ = cheerio.load(html);
  $(NON_VISIBLE).remove();
  return $.root().text();
}
