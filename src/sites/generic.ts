import * as cheerio from 'cheerio';
import { logger } from '../logger';
import { locateChart } from '../parser/chart-locator';
import { chartFromJson } from '../parser/json-chart';
import { ExtractionContext, Product, SizeChart, StoreExtractor } from '../types';
import { buildProduct, fetchProductJson, titleFromHtml } from './shared';

/**
 * Turns product page markup into a Product: the heuristic table locator
 * first, then a chart stored in the product's own JSON.
 */
export async function productFromHtml(
  context: ExtractionContext,
  url: string,
  html: string,
): Promise<Product | null> {
  const $ = cheerio.load(html);
  const productJson = await fetchProductJson(context.http, url);

  const title = productJson?.title ?? titleFromHtml($);
  if (!title) {
    logger.warn(`Could not extract title from ${url}`);
    return null;
  }

  const located = locateChart($);
  let chart: SizeChart | null = located;
  if (located) {
    logger.info(`Found size chart for ${title}`, { confidence: located.confidence.toFixed(2) });
  } else if (productJson) {
    chart = chartFromJson(productJson.raw);
  }

  return buildProduct(title, url, chart);
}

/** Default strategy: plain HTTP fetch of the product page. */
export function createGenericExtractor(context: ExtractionContext): StoreExtractor {
  return {
    async extractOneProduct(url: string): Promise<Product | null> {
      const html = await context.http.fetchText(url);
      return productFromHtml(context, url, html);
    },
  };
}
