import { StoreExtractorFactory } from '../types';
import { createImageChartExtractor } from './rendered';

export const squahExtractor: StoreExtractorFactory = (context) =>
  createImageChartExtractor(context, {
    waitSelector: 'figure',
    imageSelector: 'figure img',
  });
