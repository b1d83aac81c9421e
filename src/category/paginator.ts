import { ListingLink, buildListingUrl, extractListingLinks } from "./listing";
import { FetchedPage, PageFetcher } from "../core/transport";
import { getErrorMessage, isSuccessStatus, randomDelay } from "../core/utils";

/**
 * Why pagination stopped:
 * - exhausted: a page contributed no new links
 * - no-cursor: new links were found but the last one had no display text
 * - http-error: a listing page answered with a non-2xx status
 * - no-content: a listing page had no content region
 */
export type PaginationStopReason = "exhausted" | "no-cursor" | "http-error" | "no-content";

export type PaginationState =
  | { phase: "fetch"; cursor: string | null; visited: ReadonlySet<string> }
  | { phase: "done"; reason: PaginationStopReason; visited: ReadonlySet<string> };

export interface CategoryPagination {
  categoryUrl: string;
  urls: string[];
  pagesFetched: number;
  reason: PaginationStopReason;
  /** Status of the listing page that ended the crawl, for http-error stops */
  status?: number;
}

export interface PaginateOptions {
  fetcher: PageFetcher;
  baseUrl: string;
  /** Politeness wait between listing fetches; defaults to 0.5–1s */
  delay?: () => Promise<void>;
  onNewLink?: (link: ListingLink) => void;
}

/** Transport failure while fetching a category listing page */
export class ListingFetchError extends Error {
  constructor(
    readonly url: string,
    readonly discovered: string[],
    cause: unknown
  ) {
    super(`Failed to fetch listing ${url}: ${getErrorMessage(cause)}`, { cause });
    this.name = "ListingFetchError";
  }
}

export const INITIAL_PAGINATION_STATE: PaginationState = {
  phase: "fetch",
  cursor: null,
  visited: new Set<string>(),
};

/**
 * Fold one listing page's links into the pagination state.
 * Stops when the page adds nothing new; a blank cursor also stops, even after new links.
 */
export function advancePagination(
  state: PaginationState,
  links: readonly ListingLink[]
): PaginationState {
  if (state.phase === "done") return state;

  const visited = new Set(state.visited);
  let lastNew: ListingLink | null = null;
  for (const link of links) {
    if (visited.has(link.url)) continue;
    visited.add(link.url);
    lastNew = link;
  }

  if (!lastNew) return { phase: "done", reason: "exhausted", visited };
  if (!lastNew.text) return { phase: "done", reason: "no-cursor", visited };
  return { phase: "fetch", cursor: lastNew.text, visited };
}

/**
 * Walk a category's listing pages, using the last new entry's title as the next cursor.
 * @param categoryUrl - First listing page, e.g. https://wiki.example.org/Category:Head
 * @returns every distinct item URL discovered, in discovery order
 */
export async function paginateCategory(
  categoryUrl: string,
  options: PaginateOptions
): Promise<CategoryPagination> {
  const delay = options.delay ?? randomDelay(500, 1000);
  let state: PaginationState = INITIAL_PAGINATION_STATE;
  let pagesFetched = 0;
  let status: number | undefined;

  while (state.phase === "fetch") {
    if (pagesFetched > 0) await delay();

    const url = buildListingUrl(categoryUrl, state.cursor);
    let page: FetchedPage;
    try {
      page = await options.fetcher.fetch(url);
    } catch (err) {
      throw new ListingFetchError(url, [...state.visited], err);
    }
    pagesFetched++;

    if (!isSuccessStatus(page.status)) {
      status = page.status;
      state = { phase: "done", reason: "http-error", visited: state.visited };
      continue;
    }

    const links = extractListingLinks(page.body, options.baseUrl);
    if (!links) {
      state = { phase: "done", reason: "no-content", visited: state.visited };
      continue;
    }

    if (options.onNewLink) {
      const seen = new Set(state.visited);
      for (const link of links) {
        if (seen.has(link.url)) continue;
        seen.add(link.url);
        options.onNewLink(link);
      }
    }
    state = advancePagination(state, links);
  }

  return {
    categoryUrl,
    urls: [...state.visited],
    pagesFetched,
    reason: state.reason,
    ...(status === undefined ? {} : { status }),
  };
}
