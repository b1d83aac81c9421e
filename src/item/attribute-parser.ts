import * as cheerio from "cheerio";

/** The item infobox on a wiki detail page */
const INFOBOX_SELECTOR = "div.infobox";

/**
 * Extract the label → value pairs from an item page's infobox.
 * Only rows with exactly two cells count; later duplicate labels overwrite earlier ones.
 * @returns the attribute map, or null when the page has no infobox (not an item page)
 */
export function parseAttributes(html: string): Record<string, string> | null {
  const $ = cheerio.load(html);
  const $infobox = $(INFOBOX_SELECTOR).first();
  if ($infobox.length === 0) return null;

  const attributes: Record<string, string> = {};
  $infobox.find("tr").each((_, tr) => {
    const tds = $(tr).find("td");
    if (tds.length !== 2) return;
    const key = tds.eq(0).text().trim();
    const value = tds.eq(1).text().trim();
    attributes[key] = value;
  });

  return attributes;
}
