import * as cheerio from 'cheerio';
import { ResourceError } from '../errors';
import { logger } from '../logger';
import { normalizeImageExtraction } from '../vision';
import { ExtractionContext, ImageTableExtractor, PageRenderer, Product, StoreExtractor } from '../types';
import { productFromHtml } from './generic';
import { buildProduct, fetchProductJson } from './shared';

interface ScopedRenderer {
  get(): PageRenderer;
  release(): Promise<void>;
}

/** The browser is only started when a product actually needs it. */
function scopedRenderer(context: ExtractionContext): ScopedRenderer {
  let renderer: PageRenderer | null = null;

  return {
    get(): PageRenderer {
      if (!renderer) renderer = context.createRenderer();
      return renderer;
    },
    async release(): Promise<void> {
      if (renderer) {
        const r = renderer;
        renderer = null;
        await r.close();
      }
    },
  };
}

/** For stores whose size chart table is injected by client-side scripts. */
export function createRenderedHtmlExtractor(context: ExtractionContext, waitSelector: string): StoreExtractor {
  const renderer = scopedRenderer(context);

  return {
    async extractOneProduct(url: string): Promise<Product | null> {
      const html = await renderer.get().renderHTML(url, waitSelector);
      return productFromHtml(context, url, html);
    },
    release: () => renderer.release(),
  };
}

export interface ImageChartOptions {
  waitSelector: string;
  /** Selects the <img> holding the size chart in the rendered page */
  imageSelector: string;
}

/** For stores that publish their size chart as a picture. */
export function createImageChartExtractor(context: ExtractionContext, options: ImageChartOptions): StoreExtractor {
  const imageExtractor: ImageTableExtractor | null = context.createImageExtractor();
  if (!imageExtractor) {
    throw new ResourceError('GEMINI_API_KEY is not set; image size charts cannot be read');
  }
  const renderer = scopedRenderer(context);

  return {
    async extractOneProduct(url: string): Promise<Product | null> {
      const productJson = await fetchProductJson(context.http, url);
      if (!productJson?.title) {
        logger.warn(`Could not extract title from ${url}`);
        return null;
      }

      const html = await renderer.get().renderHTML(url, options.waitSelector);
      const $ = cheerio.load(html);
      const src = $(options.imageSelector).first().attr('src');
      if (!src) {
        logger.warn(`No size chart image on ${url}`);
        return null;
      }

      const image = src.startsWith('data:') ? src : new URL(src, url).toString();
      const extraction = await imageExtractor.extractTable(image);
      return buildProduct(productJson.title, url, normalizeImageExtraction(extraction));
    },
    release: () => renderer.release(),
  };
}
