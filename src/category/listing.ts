import * as cheerio from "cheerio";

/** Main content region of a MediaWiki page */
const CONTENT_SELECTOR = "#mw-content-text";

/** Hrefs pointing into these namespaces are never item pages */
export const EXCLUDED_NAMESPACES = [
  "Category:",
  "Special:",
  "File:",
  "Discussion:",
  "Help:",
  "User:",
  "Template:",
  "Project:",
] as const;

export interface ListingLink {
  url: string;
  text: string;
}

/**
 * Build the URL of a listing page, continuing after `cursor` when given.
 */
export function buildListingUrl(categoryUrl: string, cursor: string | null): string {
  if (!cursor) return categoryUrl;
  const separator = categoryUrl.includes("?") ? "&" : "?";
  return `${categoryUrl}${separator}pagefrom=${encodeURIComponent(cursor)}`;
}

/**
 * Resolve a site-relative href against the base URL.
 * Returns null for absolute, protocol-relative, fragment or empty hrefs.
 */
export function resolveSiteHref(href: string, baseUrl: string): string | null {
  if (!href.startsWith("/") || href.startsWith("//")) return null;
  return baseUrl.replace(/\/+$/, "") + href;
}

/**
 * Collect candidate item links, in document order, from a category listing page.
 * @returns the links, or null when the page has no content region
 */
export function extractListingLinks(html: string, baseUrl: string): ListingLink[] | null {
  const $ = cheerio.load(html);
  const $content = $(CONTENT_SELECTOR).first();
  if ($content.length === 0) return null;

  const links: ListingLink[] = [];
  $content.find("a[href]").each((_, el) => {
    const $el = $(el);
    const href = $el.attr("href") ?? "";
    if (EXCLUDED_NAMESPACES.some((ns) => href.includes(ns))) return;

    const url = resolveSiteHref(href, baseUrl);
    if (url) links.push({ url, text: $el.text().trim() });
  });
  return links;
}
