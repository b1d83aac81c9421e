import { AxiosInstance } from "axios";
import { ResponseCache } from "./response-cache";
import { isSuccessStatus } from "./utils";

/** Raw result of a GET: status code and body, whatever the status */
export interface FetchedPage {
  url: string;
  status: number;
  body: string;
  fromCache: boolean;
}

/**
 * The HTTP capability the crawler depends on.
 * Resolves for every HTTP status; rejects only on transport errors.
 */
export interface PageFetcher {
  fetch(url: string): Promise<FetchedPage>;
}

/**
 * Wrap an axios instance as a PageFetcher, serving fresh 2xx pages from the cache when one is given.
 */
export function createPageFetcher(
  http: AxiosInstance,
  cache: ResponseCache | null = null
): PageFetcher {
  return {
    async fetch(url) {
      const cached = cache?.get(url);
      if (cached) {
        return { url, status: cached.status, body: cached.body, fromCache: true };
      }

      const response = await http.get<unknown>(url, { responseType: "text" });
      const body =
        typeof response.data === "string"
          ? response.data
          : JSON.stringify(response.data ?? "");

      if (cache && isSuccessStatus(response.status)) {
        cache.set(url, response.status, body);
      }
      return { url, status: response.status, body, fromCache: false };
    },
  };
}
