/** CLI configuration parsed from command-line arguments */
export interface CrawlConfig {
  baseUrl: string;
  outputDir: string;
  /** Category names without the "Category:" prefix */
  categories: string[];
  /** CSV/XLSX file of item URLs; replaces the category crawl when set */
  inputFile: string | null;
  urlColumn?: string;
  timeout: number;
  delayMinMs: number;
  delayMaxMs: number;
  /** null disables the response cache */
  cacheDir: string | null;
  cacheTtlMs: number;
}

/** A detail page that could not be fetched or turned into a record */
export interface FailedItem {
  url: string;
  category: string | null;
  status_code: number | null;
  error_message: string;
}

/** A category whose listing could not be fetched at all */
export interface FailedCategory {
  category: string;
  url: string;
  error_message: string;
}

export interface CategoryReport {
  category: string;
  url: string;
  pages_fetched: number;
  urls_found: number;
  items: number;
  skipped: number;
  failed: number;
  stop_reason: string;
}

/** Statistics written to summary.json after a crawl completes */
export interface CrawlSummary {
  base_url: string;
  categories: CategoryReport[];
  total_urls: number;
  total_items: number;
  total_skipped: number;
  total_errors: number;
  failed_urls: string[];
  failed_categories: FailedCategory[];
  elapsed_time: string;
  output_files: string[];
  crawled_at: string;
}
