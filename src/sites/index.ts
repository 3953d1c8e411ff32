import { logger } from '../logger';
import { ExtractionContext, StoreExtractor, StoreExtractorFactory } from '../types';
import { freakinsExtractor } from './freakins';
import { createGenericExtractor } from './generic';
import { littleBoxIndiaExtractor } from './littleboxindia';
import { squahExtractor } from './squah';

export type ExtractorRegistry = Readonly<Partial<Record<string, StoreExtractorFactory>>>;

/** Keys are normalized domains (see normalizeDomain). */
export const DEFAULT_REGISTRY: ExtractorRegistry = {
  'westside.com': createGenericExtractor,
  'littleboxindia.com': littleBoxIndiaExtractor,
  'freakins.com': freakinsExtractor,
  'squah.com': squahExtractor,
};

/**
 * Reduces any store reference ("https://www.Shop.com/", "shop.com/products/x")
 * to its bare lower-case host without a leading "www.".
 */
export function normalizeDomain(store: string): string {
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(store.trim()) ? store.trim() : `https://${store.trim()}`;
  let host: string;
  try {
    host = new URL(withScheme).hostname;
  } catch {
    host = store.trim().split('/')[0];
  }
  return host.toLowerCase().replace(/\.+$/, '').replace(/^www\./, '');
}

export function createStoreExtractor(
  context: ExtractionContext,
  registry: ExtractorRegistry = DEFAULT_REGISTRY,
): StoreExtractor {
  const domain = normalizeDomain(context.storeUrl);
  const factory: StoreExtractorFactory | undefined = registry[domain];
  logger.info(`Using ${factory ? 'store-specific' : 'generic'} extractor for ${domain}`);
  return (factory ?? createGenericExtractor)(context);
}
