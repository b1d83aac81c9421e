#!/usr/bin/env node
import { parseArgs } from "./config";
import { readUrlsFromFile } from "./core/file-reader";
import { createResponseCache } from "./core/response-cache";
import { createPageFetcher } from "./core/transport";
import { createHttpClient, formatDuration, randomDelay } from "./core/utils";
import { crawlCategories, crawlUrlList, CrawlReport } from "./crawler";
import { exportFailures, exportSummary } from "./exporter";
import { createBucketResolver } from "./item/exporter";
import { CrawlSummary } from "./types";

async function main(): Promise<void> {
  const config = parseArgs(process.argv.slice(2));

  console.log("Wiki Item Crawler v1.0\n");
  console.log(`   Base URL: ${config.baseUrl}`);
  console.log(`   Output:   ${config.outputDir}`);
  console.log(`   Cache:    ${config.cacheDir ?? "disabled"}`);
  console.warn("   TLS certificate verification is disabled for wiki requests");

  const http = createHttpClient({ timeout: config.timeout });
  const cache = config.cacheDir ? createResponseCache(config.cacheDir, config.cacheTtlMs) : null;
  const fetcher = createPageFetcher(http, cache);
  const resolveDestination = createBucketResolver(config.outputDir);

  const startTime = Date.now();
  let report: CrawlReport;

  if (config.inputFile) {
    // ── URL list mode ───────────────────────────────────────────────
    console.log(`\nStep 1: Reading URLs from file: ${config.inputFile}...`);
    const urls = readUrlsFromFile(config.inputFile, config.urlColumn);
    console.log(`   Found ${urls.length} URLs`);
    console.log(`\nStep 2: Scraping ${urls.length} item pages...`);
    report = await crawlUrlList(urls, { fetcher, resolveDestination });
  } else {
    // ── Category mode ───────────────────────────────────────────────
    console.log(`\nStep 1: Crawling ${config.categories.length} categories...`);
    report = await crawlCategories(config.categories, {
      fetcher,
      baseUrl: config.baseUrl,
      resolveDestination,
      delay: randomDelay(config.delayMinMs, config.delayMaxMs),
    });
  }

  const elapsed = Date.now() - startTime;

  // ── Report ──────────────────────────────────────────────────────────
  console.log(`\nStep ${config.inputFile ? 3 : 2}: Writing report...`);
  const outputFiles = report.exported.map((f) => f.filePath);

  if (report.failures.length > 0) {
    const failedPath = exportFailures(report.failures, config.outputDir);
    outputFiles.push(failedPath);
    console.log(`   ${failedPath} (${report.failures.length} rows)`);
  }

  const summary: CrawlSummary = {
    base_url: config.baseUrl,
    categories: report.categories,
    total_urls: report.totalUrls,
    total_items: report.items.length,
    total_skipped: report.skipped,
    total_errors: report.failures.length,
    failed_urls: report.failures.map((f) => f.url),
    failed_categories: report.failedCategories,
    elapsed_time: formatDuration(elapsed),
    output_files: outputFiles,
    crawled_at: new Date().toISOString(),
  };
  const summaryPath = exportSummary(summary, config.outputDir);
  console.log(`   ${summaryPath}`);

  if (report.failures.length > 0) {
    console.log(`\n   Failed URLs (${report.failures.length}):`);
    for (const f of report.failures) {
      console.log(`     x ${f.url}: ${f.error_message}`);
    }
  }
  if (report.failedCategories.length > 0) {
    console.log(`\n   Failed categories (${report.failedCategories.length}):`);
    for (const c of report.failedCategories) {
      console.log(`     x ${c.category}: ${c.error_message}`);
    }
  }

  // ── Done ────────────────────────────────────────────────────────────
  console.log(`\nDone in ${formatDuration(elapsed)}`);
  console.log(`   Items:   ${report.items.length}`);
  console.log(`   Skipped: ${report.skipped}`);
  console.log(`   Errors:  ${report.failures.length}`);
  console.log(`   Files:   ${report.exported.length} bucket file(s) in ${config.outputDir}/`);
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`\nFatal error: ${msg}`);
  if (err instanceof Error && err.stack) console.error(err.stack);
  process.exit(1);
});
