import { StoreExtractorFactory } from '../types';
import { createImageChartExtractor } from './rendered';

/** Freakins shows the size chart as an image inside its newsletter-style modal. */
export const freakinsExtractor: StoreExtractorFactory = (context) =>
  createImageChartExtractor(context, {
    waitSelector: '.newsletter-modal',
    imageSelector: 'div.newsletter-modal img',
  });
