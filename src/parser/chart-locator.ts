import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { SizeChart } from '../types';
import { normalizeTable } from './table-normalizer';
import { scoreTables } from './table-scorer';

export interface LocatedChart extends SizeChart {
  confidence: number;
}

/**
 * Picks the best-scoring table of the document. Only the top candidate is
 * tried: when it normalizes to nothing the page has no chart.
 */
export function locateChart($: CheerioAPI): LocatedChart | null {
  const [best] = scoreTables($);
  if (!best) return null;

  const { headers, rows } = normalizeTable($, best.table);
  if (headers.length === 0 || rows.length === 0) return null;

  return { headers, rows, confidence: best.score };
}

export function locateChartInHtml(html: string): LocatedChart | null {
  return locateChart(cheerio.load(html));
}
