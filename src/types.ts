import type { RateLimiter } from './rate-limiter';

export interface SizeChart {
  /** Column labels, in table order. Row values are keyed by these. */
  headers: string[];
  /** One mapping per body row. Cells may be missing (sparse rows). */
  rows: Record<string, string>[];
}

export interface Product {
  title: string;
  /** Absolute product page URL */
  url: string;
  sizeChart?: SizeChart;
}

export interface StoreResult {
  /** Store host, e.g. "westside.com" */
  storeName: string;
  products: Product[];
  errors: string[];
  /** ISO-8601 timestamp, set once the store is done */
  extractionDate: string;
}

export interface ExtractionConfig {
  maxProductsPerStore: number;
  /** Seconds between two requests to the same store */
  rateLimitDelay: number;
  /** Request timeout in seconds */
  timeout: number;
  /** Number of stores processed at the same time */
  concurrentRequests: number;
  /** Attempts per request, including the first one */
  maxRetries: number;
  userAgent: string;
  headless: boolean;
  geminiApiKey?: string;
  geminiModel: string;
}

export interface KeyValuePair {
  key: string;
  value: string;
}

/** Answer of the vision model for one image. */
export interface ImageExtraction {
  sizeChart: {
    headers: string[];
    rows: { columns: KeyValuePair[] }[];
  } | null;
  confidence: number;
  hasSizeChart: boolean;
}

export interface HttpFetcher {
  fetchText(url: string): Promise<string>;
  fetchJSON(url: string): Promise<unknown>;
  fetchBinary(url: string): Promise<{ data: Buffer; contentType: string }>;
}

export interface PageRenderer {
  /** Returns the markup once the page (and `waitSelector`, if given) has loaded. */
  renderHTML(url: string, waitSelector?: string): Promise<string>;
  close(): Promise<void>;
}

export interface ImageTableExtractor {
  extractTable(image: string): Promise<ImageExtraction | null>;
}

/**
 * Per-store extraction strategy. Only `extractOneProduct` is required:
 * discovery falls back to the shared pipeline and `release` is called,
 * when present, after the store is done whatever the outcome.
 */
export interface StoreExtractor {
  extractOneProduct(url: string): Promise<Product | null>;
  discoverProducts?(maxCount: number): Promise<string[]>;
  release?(): Promise<void>;
}

/** Everything a strategy may use. One context per store, never shared. */
export interface ExtractionContext {
  storeUrl: string;
  config: ExtractionConfig;
  http: HttpFetcher;
  limiter: RateLimiter;
  createRenderer(): PageRenderer;
  createImageExtractor(): ImageTableExtractor | null;
}

export type StoreExtractorFactory = (context: ExtractionContext) => StoreExtractor;
