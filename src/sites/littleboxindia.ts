import { StoreExtractorFactory } from '../types';
import { createRenderedHtmlExtractor } from './rendered';

/** The size chart is a KiwiSizing widget rendered client-side into #KiwiSizingChart. */
export const littleBoxIndiaExtractor: StoreExtractorFactory = (context) =>
  createRenderedHtmlExtractor(context, '#KiwiSizingChart');
