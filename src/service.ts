import { createPageRenderer } from './browser';
import { discoverProducts } from './discovery';
import { errorMessage } from './errors';
import { createHttpClient } from './http';
import { logger } from './logger';
import { mapWithConcurrency } from './pool';
import { createRateLimiter, RateLimiter } from './rate-limiter';
import { createStoreExtractor, ExtractorRegistry, DEFAULT_REGISTRY } from './sites';
import { ExtractionConfig, ExtractionContext, HttpFetcher, ImageTableExtractor, PageRenderer, Product, StoreResult } from './types';
import { createGeminiTableExtractor } from './vision';

/** Collaborator factories, swapped for fakes in tests. */
export interface ServiceDeps {
  registry: ExtractorRegistry;
  createHttp(config: ExtractionConfig, limiter: RateLimiter): HttpFetcher;
  createRenderer(config: ExtractionConfig, limiter: RateLimiter): PageRenderer;
  createImageExtractor(config: ExtractionConfig, http: HttpFetcher): ImageTableExtractor | null;
  createLimiter(config: ExtractionConfig): RateLimiter;
  now(): Date;
}

export const defaultDeps: ServiceDeps = {
  registry: DEFAULT_REGISTRY,
  createHttp: (config, limiter) =>
    createHttpClient({
      timeoutMs: config.timeout * 1000,
      maxRetries: config.maxRetries,
      userAgent: config.userAgent,
      limiter,
    }),
  createRenderer: (config, limiter) =>
    createPageRenderer({
      userAgent: config.userAgent,
      headless: config.headless,
      timeoutMs: config.timeout * 1000,
      limiter,
    }),
  createImageExtractor: (config, http) =>
    config.geminiApiKey
      ? createGeminiTableExtractor({
          apiKey: config.geminiApiKey,
          model: config.geminiModel,
          http,
          timeoutMs: config.timeout * 1000 * 2,
        })
      : null,
  createLimiter: (config) => createRateLimiter(config.rateLimitDelay * 1000),
  now: () => new Date(),
};

/** "shop.com/" and "http://shop.com" become absolute base URLs without trailing slash. */
export function normalizeStoreUrl(store: string): string {
  const trimmed = store.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function storeNameOf(storeUrl: string): string {
  try {
    return new URL(storeUrl).host;
  } catch {
    return storeUrl;
  }
}

/**
 * Runs discovery and extraction for one store. Product failures are recorded
 * in `errors` and never stop the store; the extractor is always released.
 */
export async function extractStore(
  store: string,
  config: ExtractionConfig,
  deps: ServiceDeps = defaultDeps,
): Promise<StoreResult> {
  const storeUrl = normalizeStoreUrl(store);
  logger.info(`Starting extraction for ${storeUrl}`);

  const limiter = deps.createLimiter(config);
  const http = deps.createHttp(config, limiter);
  const context: ExtractionContext = {
    storeUrl,
    config,
    http,
    limiter,
    createRenderer: () => deps.createRenderer(config, limiter),
    createImageExtractor: () => deps.createImageExtractor(config, http),
  };

  const products: Product[] = [];
  const errors: string[] = [];
  const extractor = createStoreExtractor(context, deps.registry);

  try {
    let productUrls: string[] = [];
    try {
      const max = config.maxProductsPerStore;
      productUrls = extractor.discoverProducts
        ? await extractor.discoverProducts(max)
        : await discoverProducts(storeUrl, max, http);
      logger.info(`Found ${productUrls.length} products for ${storeUrl}`);
    } catch (err) {
      const message = `Error getting product URLs: ${errorMessage(err)}`;
      logger.error(message, { store: storeUrl });
      errors.push(message);
    }

    for (const [i, url] of productUrls.entries()) {
      logger.debug(`Extracting ${i + 1}/${productUrls.length}: ${url}`);
      try {
        const product = await extractor.extractOneProduct(url);
        if (product?.sizeChart) products.push(product);
      } catch (err) {
        const message = `Error extracting ${url}: ${errorMessage(err)}`;
        logger.error(message);
        errors.push(message);
      }
    }
  } finally {
    try {
      await extractor.release?.();
    } catch (err) {
      const message = `Error releasing resources: ${errorMessage(err)}`;
      logger.error(message, { store: storeUrl });
      errors.push(message);
    }
  }

  logger.info(`Completed extraction for ${storeUrl}: ${products.length} products with size charts found`);

  return {
    storeName: storeNameOf(storeUrl),
    products,
    errors,
    extractionDate: deps.now().toISOString(),
  };
}

/**
 * Extracts several stores with at most `concurrentRequests` in flight.
 * A failing store yields an empty result carrying the error.
 */
export async function extractStores(
  stores: readonly string[],
  config: ExtractionConfig,
  deps: ServiceDeps = defaultDeps,
): Promise<StoreResult[]> {
  return mapWithConcurrency(stores, config.concurrentRequests, async (store) => {
    try {
      return await extractStore(store, config, deps);
    } catch (err) {
      logger.error(`Failed to extract ${store}`, { error: errorMessage(err) });
      return {
        storeName: storeNameOf(normalizeStoreUrl(store)),
        products: [],
        errors: [`Extraction failed: ${errorMessage(err)}`],
        extractionDate: deps.now().toISOString(),
      };
    }
  });
}
