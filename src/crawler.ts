import { paginateCategory, CategoryPagination, ListingFetchError } from "./category/paginator";
import { PageFetcher } from "./core/transport";
import { getErrorMessage, getErrorStatus, HttpStatusError, isSuccessStatus } from "./core/utils";
import { parseAttributes } from "./item/attribute-parser";
import { classifyItem } from "./item/classifier";
import { DestinationResolver, ExportedFile, exportItems } from "./item/exporter";
import { ItemCrawlResult, ItemRecord } from "./item/types";
import { CategoryReport, FailedCategory, FailedItem } from "./types";

/** Wiki categories crawled by default: equipment slots first, then weapon groups */
export const ITEM_CATEGORIES = [
  "Arms",
  "Back",
  "Chest",
  "Ear",
  "Face",
  "Feet",
  "Fingers",
  "Hands",
  "Head",
  "Legs",
  "Neck",
  "Shoulders",
  "Waist",
  "Wrist",
  "Ammo",
  "Primary",
  "Range",
  "Secondary",
];

export interface CrawlOptions {
  fetcher: PageFetcher;
  baseUrl: string;
  resolveDestination: DestinationResolver;
  /** Politeness wait between listing pages */
  delay?: () => Promise<void>;
}

/** Outcomes already settled this run, keyed by detail URL */
export interface CrawlRun {
  items: Map<string, ItemRecord>;
  failed: Map<string, FailedItem>;
  skipped: Set<string>;
}

export function createCrawlRun(): CrawlRun {
  return { items: new Map(), failed: new Map(), skipped: new Set() };
}

export interface CategoryCrawlResult {
  report: CategoryReport;
  items: ItemRecord[];
  /** Failures first seen in this category */
  failures: FailedItem[];
  exported: ExportedFile[];
  /** Set when the listing itself could not be fetched */
  listingError: FailedCategory | null;
}

export interface CrawlReport {
  /** Distinct records across the run, keyed by detail URL */
  items: ItemRecord[];
  categories: CategoryReport[];
  /** Distinct item URLs attempted */
  totalUrls: number;
  skipped: number;
  failures: FailedItem[];
  failedCategories: FailedCategory[];
  /** Latest write of every bucket file touched during the run */
  exported: ExportedFile[];
}

export function categoryUrl(baseUrl: string, category: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/Category:${category}`;
}

/** True when the URL still points at a category listing rather than an item */
export function isCategoryUrl(url: string): boolean {
  return url.includes("Category:");
}

/**
 * Derive the item's display name from the last path segment of its URL.
 * "/Fine_Steel_Short_Sword" → "Fine Steel Short Sword"
 */
export function itemNameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  const segment = pathname.split("/").filter(Boolean).at(-1) ?? "";

  let decoded = segment;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    // malformed escape: keep the raw segment
  }
  return decoded.replace(/_/g, " ").trim();
}

/**
 * Fetch a detail page and turn it into a classified record.
 * Pages without an infobox are skipped, not failed.
 */
export async function crawlItem(url: string, fetcher: PageFetcher): Promise<ItemCrawlResult> {
  if (isCategoryUrl(url)) {
    return { outcome: "skipped", url, reason: "category page" };
  }

  try {
    const page = await fetcher.fetch(url);
    if (!isSuccessStatus(page.status)) {
      throw new HttpStatusError(url, page.status);
    }

    const attributes = parseAttributes(page.body);
    if (attributes === null) {
      return { outcome: "skipped", url, reason: "no infobox" };
    }
    if (Object.keys(attributes).length === 0) {
      return { outcome: "skipped", url, reason: "empty infobox" };
    }

    const item = classifyItem(itemNameFromUrl(url), attributes, url);
    return { outcome: "success", item };
  } catch (err) {
    return {
      outcome: "failed",
      url,
      status_code: getErrorStatus(err),
      error: getErrorMessage(err),
    };
  }
}

/**
 * Rewrite every bucket file `batch` touches with all run records routed to it.
 */
function exportTouchedBuckets(
  batch: readonly ItemRecord[],
  runItems: ReadonlyMap<string, ItemRecord>,
  resolveDestination: DestinationResolver
): ExportedFile[] {
  const touched = new Set(batch.map((item) => resolveDestination(item).filePath));
  const rows = [...runItems.values()].filter((item) =>
    touched.has(resolveDestination(item).filePath)
  );
  return exportItems(rows, resolveDestination);
}

function recordKey(item: ItemRecord): string {
  return item.url ?? item.name;
}

/**
 * Crawl one category: paginate its listing, scrape every item page, then export.
 * @param run - Outcomes already settled this run. URLs in it are not fetched again,
 *   and the bucket files this category touches are rewritten with every record routed to them
 */
export async function crawlCategory(
  category: string,
  options: CrawlOptions,
  run: CrawlRun = createCrawlRun()
): Promise<CategoryCrawlResult> {
  const url = categoryUrl(options.baseUrl, category);
  console.log(`\nCategory: ${category}`);
  console.log(`   Listing: ${url}`);

  let pagination: CategoryPagination;
  try {
    pagination = await paginateCategory(url, {
      fetcher: options.fetcher,
      baseUrl: options.baseUrl,
      delay: options.delay,
      onNewLink: (link) => console.log(`   Found: ${link.text || link.url}`),
    });
  } catch (err) {
    const message = getErrorMessage(err);
    console.error(`   x Listing failed: ${message}`);
    const found = err instanceof ListingFetchError ? err.discovered.length : 0;
    return {
      report: {
        category,
        url,
        pages_fetched: 0,
        urls_found: found,
        items: 0,
        skipped: 0,
        failed: 0,
        stop_reason: "listing-error",
      },
      items: [],
      failures: [],
      exported: [],
      listingError: { category, url, error_message: message },
    };
  }

  const urls = pagination.urls;
  const statusNote = pagination.status === undefined ? "" : ` (HTTP ${pagination.status})`;
  console.log(
    `   Found ${urls.length} URLs on ${pagination.pagesFetched} page(s), stopped: ${pagination.reason}${statusNote}`
  );

  const items: ItemRecord[] = [];
  const failures: FailedItem[] = [];
  let skipped = 0;
  let failed = 0;

  for (const [i, itemUrl] of urls.entries()) {
    const progress = `   [${i + 1}/${urls.length}]`;
    const known = run.items.get(itemUrl);
    if (known) {
      items.push(known);
      console.log(`${progress}  = ${itemUrl}`);
      continue;
    }
    if (run.skipped.has(itemUrl)) {
      skipped++;
      console.log(`${progress}  = ${itemUrl} (skipped earlier)`);
      continue;
    }
    if (run.failed.has(itemUrl)) {
      failed++;
      console.log(`${progress}  = ${itemUrl} (failed earlier)`);
      continue;
    }

    const result = await crawlItem(itemUrl, options.fetcher);
    switch (result.outcome) {
      case "success":
        items.push(result.item);
        run.items.set(recordKey(result.item), result.item);
        console.log(`${progress}  + ${result.item.name} (${result.item.archetype})`);
        break;
      case "skipped":
        skipped++;
        run.skipped.add(itemUrl);
        console.log(`${progress}  - ${itemUrl} (${result.reason})`);
        break;
      case "failed": {
        const failure: FailedItem = {
          url: itemUrl,
          category,
          status_code: result.status_code,
          error_message: result.error,
        };
        failed++;
        failures.push(failure);
        run.failed.set(itemUrl, failure);
        console.log(`${progress}  x ${itemUrl}: ${result.error}`);
        break;
      }
    }
  }

  const exported = exportTouchedBuckets(items, run.items, options.resolveDestination);
  for (const file of exported) {
    console.log(`   ${file.filePath} (${file.count} rows)`);
  }

  return {
    report: {
      category,
      url,
      pages_fetched: pagination.pagesFetched,
      urls_found: urls.length,
      items: items.length,
      skipped,
      failed,
      stop_reason: pagination.reason,
    },
    items,
    failures,
    exported,
    listingError: null,
  };
}

/**
 * Crawl each category in turn. A failing category never stops the ones after it.
 * Each distinct item URL is fetched at most once per run.
 */
export async function crawlCategories(
  categories: readonly string[],
  options: CrawlOptions
): Promise<CrawlReport> {
  const run = createCrawlRun();
  const exported = new Map<string, ExportedFile>();
  const reports: CategoryReport[] = [];
  const failedCategories: FailedCategory[] = [];

  for (const category of categories) {
    const result = await crawlCategory(category, options, run);
    reports.push(result.report);
    if (result.listingError) failedCategories.push(result.listingError);
    for (const file of result.exported) exported.set(file.filePath, file);
  }

  return {
    items: [...run.items.values()],
    categories: reports,
    totalUrls: run.items.size + run.skipped.size + run.failed.size,
    skipped: run.skipped.size,
    failures: [...run.failed.values()],
    failedCategories,
    exported: [...exported.values()],
  };
}

/**
 * Scrape an explicit list of item URLs and export them as a single batch.
 */
export async function crawlUrlList(
  urls: readonly string[],
  options: Pick<CrawlOptions, "fetcher" | "resolveDestination">
): Promise<CrawlReport> {
  const unique = [...new Set(urls)];
  const items: ItemRecord[] = [];
  const failures: FailedItem[] = [];
  let skipped = 0;

  for (const [i, url] of unique.entries()) {
    const progress = `   [${i + 1}/${unique.length}]`;
    const result = await crawlItem(url, options.fetcher);
    if (result.outcome === "success") {
      items.push(result.item);
      console.log(`${progress}  + ${result.item.name} (${result.item.archetype})`);
    } else if (result.outcome === "skipped") {
      skipped++;
      console.log(`${progress}  - ${url} (${result.reason})`);
    } else {
      failures.push({
        url,
        category: null,
        status_code: result.status_code,
        error_message: result.error,
      });
      console.log(`${progress}  x ${url}: ${result.error}`);
    }
  }

  const exported = exportItems(items, options.resolveDestination);
  return {
    items,
    categories: [],
    totalUrls: unique.length,
    skipped,
    failures,
    failedCategories: [],
    exported,
  };
}
