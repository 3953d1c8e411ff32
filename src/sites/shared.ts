import type { CheerioAPI } from 'cheerio';
import { z } from 'zod';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import { cleanText } from '../parser/text';
import { HttpFetcher, Product, SizeChart } from '../types';

const productJsonSchema = z.object({
  product: z.object({ title: z.string().nullish() }).passthrough(),
});

export interface ProductJson {
  title: string | null;
  /** The whole `product` object, for charts stored in product data */
  raw: Record<string, unknown>;
}

/** Reads `<product-url>.json`, the storefront's machine-readable view of one product. */
export async function fetchProductJson(http: HttpFetcher, productUrl: string): Promise<ProductJson | null> {
  try {
    const parsed = productJsonSchema.safeParse(await http.fetchJSON(`${productUrl.replace(/\/$/, '')}.json`));
    if (!parsed.success) return null;
    const title = cleanText(parsed.data.product.title);
    return { title: title || null, raw: parsed.data.product };
  } catch (err) {
    logger.debug(`No product JSON for ${productUrl}`, { error: errorMessage(err) });
    return null;
  }
}

export function titleFromHtml($: CheerioAPI): string | null {
  const title = cleanText($('meta[property="og:title"]').attr('content')) || cleanText($('h1').first().text());
  return title || null;
}

export function buildProduct(title: string, url: string, sizeChart: SizeChart | null): Product | null {
  if (!sizeChart) {
    logger.warn(`No size chart found for ${title}`);
    return null;
  }
  return { title, url, sizeChart: { headers: sizeChart.headers, rows: sizeChart.rows } };
}
