import type { FetchedPage, PageFetcher } from "../src/core/transport";

export interface FakePage {
  status?: number;
  body: string;
}

/**
 * In-memory PageFetcher: unknown URLs answer 404, URLs in `failing` reject.
 */
export function createFakeFetcher(
  pages: Record<string, FakePage>,
  failing: ReadonlySet<string> = new Set()
): { fetcher: PageFetcher; calls: string[] } {
  const calls: string[] = [];
  const fetcher: PageFetcher = {
    async fetch(url): Promise<FetchedPage> {
      calls.push(url);
      if (failing.has(url)) throw new Error(`connect ECONNREFUSED ${url}`);
      const page = pages[url];
      if (!page) return { url, status: 404, body: "Not Found", fromCache: false };
      return { url, status: page.status ?? 200, body: page.body, fromCache: false };
    },
  };
  return { fetcher, calls };
}

export function listingPage(links: Array<[href: string, text: string]>): string {
  const anchors = links.map(([href, text]) => `<li><a href="${href}">${text}</a></li>`).join("\n");
  return `<html><body><div id="mw-content-text"><ul>\n${anchors}\n</ul></div></body></html>`;
}

export function itemPage(rows: Array<[label: string, value: string]>): string {
  const trs = rows.map(([label, value]) => `<tr><td>${label}</td><td>${value}</td></tr>`).join("\n");
  return `<html><body><div class="infobox"><table>\n${trs}\n</table></div></body></html>`;
}
