import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

/** One cached page, stored as a JSON file named after the SHA-1 of its URL */
export interface CachedResponse {
  url: string;
  status: number;
  body: string;
  stored_at: number;
}

export interface ResponseCache {
  get(url: string): CachedResponse | null;
  set(url: string, status: number, body: string): void;
}

export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

function cacheKey(url: string): string {
  return crypto.createHash("sha1").update(url).digest("hex");
}

function isCachedResponse(value: unknown): value is CachedResponse {
  if (typeof value !== "object" || value === null) return false;
  return (
    "url" in value &&
    typeof value.url === "string" &&
    "status" in value &&
    typeof value.status === "number" &&
    "body" in value &&
    typeof value.body === "string" &&
    "stored_at" in value &&
    typeof value.stored_at === "number"
  );
}

/**
 * File-backed response cache with a fixed freshness window.
 * Stale or unreadable entries are treated as misses and overwritten on the next set.
 * @param cacheDir - Directory holding the cache files (created on first write)
 * @param ttlMs - Freshness window in milliseconds
 * @param now - Clock, injectable for tests
 */
export function createResponseCache(
  cacheDir: string,
  ttlMs: number = DEFAULT_CACHE_TTL_MS,
  now: () => number = Date.now
): ResponseCache {
  const entryPath = (url: string) => path.join(cacheDir, `${cacheKey(url)}.json`);

  return {
    get(url) {
      const filePath = entryPath(url);
      if (!fs.existsSync(filePath)) return null;

      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
      } catch {
        return null; // torn write from an interrupted run
      }
      if (!isCachedResponse(parsed) || parsed.url !== url) return null;
      if (now() - parsed.stored_at > ttlMs) return null;
      return parsed;
    },

    set(url, status, body) {
      fs.mkdirSync(cacheDir, { recursive: true });
      const entry: CachedResponse = { url, status, body, stored_at: now() };
      fs.writeFileSync(entryPath(url), JSON.stringify(entry), "utf-8");
    },
  };
}
