import * as https from "https";
import axios, { AxiosError, AxiosInstance } from "axios";

export const DEFAULT_USER_AGENT = "Wiki Item Crawler (Educational)";

export interface HttpClientOptions {
  timeout: number;
  userAgent?: string;
  /** Certificate validation is off by default: the target wiki serves a broken chain. */
  verifyTls?: boolean;
}

/**
 * Create a configured axios instance for wiki pages.
 * Non-2xx responses resolve instead of throwing so callers can branch on status.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const client = axios.create({
    timeout: options.timeout,
    headers: {
      Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
    },
    maxRedirects: 5,
    responseType: "text",
    validateStatus: () => true,
    httpsAgent: new https.Agent({
      rejectUnauthorized: options.verifyTls ?? false,
    }),
  });

  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  client.interceptors.request.use((config) => {
    config.headers["User-Agent"] = userAgent;
    return config;
  });

  return client;
}

/**
 * Sleep for the given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Build a delay function that waits a uniformly random interval in [minMs, maxMs].
 * @param random - Source of randomness in [0, 1)
 */
export function randomDelay(
  minMs: number,
  maxMs: number,
  random: () => number = Math.random
): () => Promise<void> {
  const span = Math.max(0, maxMs - minMs);
  return () => sleep(minMs + random() * span);
}

/** True for 2xx status codes */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/** A page answered with a non-2xx status */
export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number
  ) {
    super(`HTTP ${status}: ${url}`);
    this.name = "HttpStatusError";
  }
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED") return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Extract the HTTP status code from an error, if available.
 */
export function getErrorStatus(err: unknown): number | null {
  if (err instanceof AxiosError && err.response) {
    return err.response.status;
  }
  if (err instanceof HttpStatusError) return err.status;
  return null;
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}

/** Generate a compact timestamp like "20260224_143022" for output filenames. */
export function fileTimestamp(date: Date = new Date()): string {
  return date
    .toISOString()
    .replace(/[-:]/g, "")
    .replace("T", "_")
    .slice(0, 15);
}
