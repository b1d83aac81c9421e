import * as fs from "fs";
import * as path from "path";
import { BOM, toCsvLine } from "./core/csv";
import { fileTimestamp } from "./core/utils";
import { CrawlSummary, FailedItem } from "./types";

/** Generate a filename with a timestamp suffix to avoid overwriting old runs. */
function timestampedPath(outputDir: string, base: string, ext: string, now?: Date): string {
  return path.join(outputDir, `${base}_${fileTimestamp(now)}${ext}`);
}

const FAILURE_COLUMNS: (keyof FailedItem & string)[] = [
  "url",
  "category",
  "status_code",
  "error_message",
];

/**
 * Export failed detail pages to failed_<ts>.csv inside the output directory.
 * @returns Path to the written file
 */
export function exportFailures(failures: FailedItem[], outputDir: string, now?: Date): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "failed", ".csv", now);
  const lines = [
    BOM + toCsvLine(FAILURE_COLUMNS),
    ...failures.map((f) => toCsvLine(FAILURE_COLUMNS.map((key) => f[key]))),
  ];
  fs.writeFileSync(filePath, lines.join("\n") + "\n", "utf-8");
  return filePath;
}

/**
 * Write crawl summary statistics to summary_<ts>.json.
 * @returns Path to the written file
 */
export function exportSummary(summary: CrawlSummary, outputDir: string, now?: Date): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "summary", ".json", now);
  fs.writeFileSync(filePath, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  return filePath;
}
