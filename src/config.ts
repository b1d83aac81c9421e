import * as path from "path";
import { DEFAULT_CACHE_TTL_MS } from "./core/response-cache";
import { ITEM_CATEGORIES } from "./crawler";
import { CrawlConfig } from "./types";

const DEFAULT_CACHE_DIR = "./.cache";

export const DEFAULT_CONFIG: CrawlConfig = {
  baseUrl: "https://wiki.project1999.com",
  outputDir: "./output",
  categories: ITEM_CATEGORIES,
  inputFile: null,
  timeout: 15_000,
  delayMinMs: 500,
  delayMaxMs: 1000,
  cacheDir: DEFAULT_CACHE_DIR,
  cacheTtlMs: DEFAULT_CACHE_TTL_MS,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function parseNumber(key: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`--${key} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

/**
 * Parse CLI arguments into a CrawlConfig.
 * Supports --base-url, --output, --categories, --input, --column, --timeout,
 * --delay-min, --delay-max, --cache-dir, --cache-ttl (seconds) and --no-cache.
 */
export function parseArgs(argv: string[]): CrawlConfig {
  const opts: Record<string, string> = {};
  let noCache = false;

  for (const arg of argv) {
    if (arg === "--no-cache") { noCache = true; continue; }
    const eqIdx = arg.indexOf("=");
    if (arg.startsWith("--") && eqIdx !== -1) {
      opts[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
    } else {
      throw new ConfigError(`Unrecognized argument "${arg}"`);
    }
  }

  const categories = opts.categories
    ? opts.categories.split(",").map((c) => c.trim()).filter(Boolean)
    : DEFAULT_CONFIG.categories;
  if (categories.length === 0) {
    throw new ConfigError("--categories must name at least one category");
  }

  const config: CrawlConfig = {
    baseUrl: (opts["base-url"] ?? DEFAULT_CONFIG.baseUrl).replace(/\/+$/, ""),
    outputDir: path.resolve(opts.output ?? DEFAULT_CONFIG.outputDir),
    categories,
    inputFile: opts.input ? path.resolve(opts.input) : null,
    urlColumn: opts.column,
    timeout: opts.timeout ? parseNumber("timeout", opts.timeout) : DEFAULT_CONFIG.timeout,
    delayMinMs: opts["delay-min"]
      ? parseNumber("delay-min", opts["delay-min"])
      : DEFAULT_CONFIG.delayMinMs,
    delayMaxMs: opts["delay-max"]
      ? parseNumber("delay-max", opts["delay-max"])
      : DEFAULT_CONFIG.delayMaxMs,
    cacheDir: noCache ? null : path.resolve(opts["cache-dir"] ?? DEFAULT_CACHE_DIR),
    cacheTtlMs: opts["cache-ttl"]
      ? parseNumber("cache-ttl", opts["cache-ttl"]) * 1000
      : DEFAULT_CONFIG.cacheTtlMs,
  };

  if (config.delayMaxMs < config.delayMinMs) {
    throw new ConfigError("--delay-max must not be smaller than --delay-min");
  }
  return config;
}
