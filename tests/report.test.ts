/**
 * Tests for the run report files and CSV helpers
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { BOM, escapeCsv, parseCsv } from "../src/core/csv";
import { fileTimestamp, formatDuration, randomDelay } from "../src/core/utils";
import { exportFailures, exportSummary } from "../src/exporter";
import type { CrawlSummary } from "../src/types";

const NOW = new Date("2026-02-24T14:30:22.000Z");

describe("csv helpers", () => {
  it("quotes cells with separators, quotes or newlines", () => {
    expect(escapeCsv("plain")).toBe("plain");
    expect(escapeCsv("a,b")).toBe('"a,b"');
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsv(null)).toBe("");
  });

  it("parses quoted fields spanning lines", () => {
    expect(parseCsv(`${BOM}a,b\r\n"x, ""y""","1\n2"\n\n`)).toEqual([
      ["a", "b"],
      ['x, "y"', "1\n2"],
    ]);
  });
});

describe("formatting", () => {
  it("formats durations", () => {
    expect(formatDuration(42_000)).toBe("42s");
    expect(formatDuration(150_500)).toBe("2m 30s");
  });

  it("builds compact timestamps", () => {
    expect(fileTimestamp(NOW)).toBe("20260224_143022");
  });
});

describe("randomDelay", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("waits min + random * (max - min) milliseconds", async () => {
    vi.useFakeTimers();
    const done = vi.fn();

    const wait = randomDelay(500, 1000, () => 0.5)().then(done);
    await vi.advanceTimersByTimeAsync(749);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await wait;

    expect(done).toHaveBeenCalledTimes(1);
  });
});

describe("report exports", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), "crawl-report-"));
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  it("writes failed urls as csv", () => {
    const filePath = exportFailures(
      [
        {
          url: "https://wiki.test/Broken_Helm",
          category: "Head",
          status_code: 503,
          error_message: "HTTP 503: https://wiki.test/Broken_Helm",
        },
        { url: "https://wiki.test/Lost", category: null, status_code: null, error_message: "Request timed out" },
      ],
      outputDir,
      NOW
    );

    expect(filePath).toBe(join(outputDir, "failed_20260224_143022.csv"));
    expect(readFileSync(filePath, "utf-8")).toBe(
      `${BOM}url,category,status_code,error_message\n` +
        "https://wiki.test/Broken_Helm,Head,503,HTTP 503: https://wiki.test/Broken_Helm\n" +
        "https://wiki.test/Lost,,,Request timed out\n"
    );
  });

  it("writes the summary as json", () => {
    const summary: CrawlSummary = {
      base_url: "https://wiki.test",
      categories: [],
      total_urls: 3,
      total_items: 1,
      total_skipped: 1,
      total_errors: 1,
      failed_urls: ["https://wiki.test/Broken_Helm"],
      failed_categories: [],
      elapsed_time: "2s",
      output_files: [],
      crawled_at: NOW.toISOString(),
    };

    const filePath = exportSummary(summary, outputDir, NOW);

    expect(filePath).toBe(join(outputDir, "summary_20260224_143022.json"));
    expect(JSON.parse(readFileSync(filePath, "utf-8"))).toEqual(summary);
  });
});
