import * as cheerio from 'cheerio';
import { z } from 'zod';
import { DiscoveryError, MalformedDataError, errorMessage } from './errors';
import { logger } from './logger';
import { HttpFetcher } from './types';

export const FEED_PAGE_SIZE = 250;
export const MAX_COLLECTIONS = 10;

const handleListSchema = z.object({
  products: z.array(z.object({ handle: z.string().nullish() }).passthrough()),
});

const collectionListSchema = z.object({
  collections: z.array(z.object({ handle: z.string().nullish() }).passthrough()),
});

function parseWith<T>(schema: z.ZodType<T>, data: unknown, source: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedDataError(`Unexpected response shape from ${source}`);
  }
  return parsed.data;
}

function productUrl(storeUrl: string, handle: string): string {
  return new URL(`/products/${handle}`, storeUrl).toString();
}

function handlesOf(items: { handle?: string | null }[]): string[] {
  return items.flatMap((item) => (item.handle ? [item.handle] : []));
}

/** Pages through /products.json. Pages after the first may fail without losing earlier ones. */
export async function discoverFromFeed(storeUrl: string, maxCount: number, http: HttpFetcher): Promise<string[]> {
  const urls: string[] = [];

  for (let page = 1; urls.length < maxCount; page++) {
    const source = new URL(`/products.json?page=${page}&limit=${FEED_PAGE_SIZE}`, storeUrl).toString();

    let items: { handle?: string | null }[];
    try {
      items = parseWith(handleListSchema, await http.fetchJSON(source), source).products;
    } catch (err) {
      if (page === 1) throw err;
      logger.warn(`Product feed page ${page} failed, keeping ${urls.length} URLs`, { error: errorMessage(err) });
      break;
    }

    if (items.length === 0) break;

    for (const handle of handlesOf(items)) {
      if (urls.length >= maxCount) break;
      urls.push(productUrl(storeUrl, handle));
    }

    if (items.length < FEED_PAGE_SIZE) break;
  }

  logger.debug(`Product feed returned ${urls.length} URLs`, { store: storeUrl });
  return urls;
}

/** Walks the first collections of the store and reads their product feeds. */
export async function discoverFromCollections(
  storeUrl: string,
  maxCount: number,
  http: HttpFetcher,
): Promise<string[]> {
  const indexUrl = new URL('/collections.json', storeUrl).toString();
  const collections = handlesOf(parseWith(collectionListSchema, await http.fetchJSON(indexUrl), indexUrl).collections);
  logger.info(`Found ${collections.length} collections`, { store: storeUrl });

  const urls: string[] = [];
  for (const handle of collections.slice(0, MAX_COLLECTIONS)) {
    const source = new URL(`/collections/${handle}/products.json`, storeUrl).toString();
    try {
      const { products } = parseWith(handleListSchema, await http.fetchJSON(source), source);
      urls.push(...handlesOf(products).map((h) => productUrl(storeUrl, h)));
    } catch (err) {
      logger.warn(`Failed to get products from collection ${handle}`, { error: errorMessage(err) });
      continue;
    }

    if (urls.length >= maxCount) break;
  }

  return urls;
}

function sitemapLocs(xml: string): string[] {
  const $ = cheerio.load(xml, { xml: true });
  return $('loc')
    .toArray()
    .map((loc) => $(loc).text().trim())
    .filter((loc) => loc.length > 0);
}

/** Reads /sitemap.xml and the product URLs of every nested sitemap. */
export async function discoverFromSitemap(storeUrl: string, http: HttpFetcher): Promise<string[]> {
  const rootUrl = new URL('/sitemap.xml', storeUrl).toString();
  const nested = sitemapLocs(await http.fetchText(rootUrl)).filter((loc) => loc.includes('.xml'));

  const urls: string[] = [];
  for (const sitemapUrl of nested) {
    try {
      const locs = sitemapLocs(await http.fetchText(sitemapUrl));
      urls.push(...locs.filter((loc) => loc.includes('/products/')));
    } catch (err) {
      logger.warn(`Failed to read sitemap ${sitemapUrl}`, { error: errorMessage(err) });
    }
  }

  return urls;
}

export function dedupeAndCap(urls: string[], maxCount: number): string[] {
  return [...new Set(urls)].slice(0, maxCount);
}

/**
 * Lists product page URLs for a store: product feed first, then collections,
 * then the sitemap. A later strategy only runs when the earlier ones found
 * nothing. Throws only when every strategy failed.
 */
export async function discoverProducts(storeUrl: string, maxCount: number, http: HttpFetcher): Promise<string[]> {
  const strategies: [string, () => Promise<string[]>][] = [
    ['product feed', () => discoverFromFeed(storeUrl, maxCount, http)],
    ['collections', () => discoverFromCollections(storeUrl, maxCount, http)],
    ['sitemap', () => discoverFromSitemap(storeUrl, http)],
  ];

  const failures: string[] = [];
  for (const [name, run] of strategies) {
    try {
      const urls = await run();
      if (urls.length > 0) {
        logger.info(`Found ${urls.length} products via ${name}`, { store: storeUrl });
        return dedupeAndCap(urls, maxCount);
      }
    } catch (err) {
      logger.warn(`Product discovery via ${name} failed`, { store: storeUrl, error: errorMessage(err) });
      failures.push(`${name}: ${errorMessage(err)}`);
    }
  }

  if (failures.length === strategies.length) {
    throw new DiscoveryError(`All discovery strategies failed (${failures.join('; ')})`);
  }
  return [];
}
