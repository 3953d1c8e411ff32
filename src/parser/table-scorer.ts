import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { normalizeTable } from './table-normalizer';

export const SIZE_KEYWORDS = [
  'size', 'chart', 'measurement', 'dimension', 'sizing',
  'fit', 'length', 'width', 'chest', 'waist', 'hip',
  'shoulder', 'sleeve', 'bust', 'inseam', 'size guide',
];

const SIZE_PATTERNS = [
  /\b(xs|s|m|l|xl|xxl|xxxl|small|medium|large)\b/gi,
  /\b\d{2,3}\s*(cm|inch|in|")\b/gi,
  /\b(chest|waist|hip|bust)\s*[:=]?\s*\d+/gi,
];

const CONTAINER_KEYWORDS = ['size', 'chart', 'sizing'];

const KEYWORD_WEIGHT = 0.1;
const PATTERN_WEIGHT = 0.2;
const PATTERN_SATURATION = 5;
const HEADER_KEYWORD_BONUS = 0.2;
const ROW_COUNT_BONUS = 0.1;
const MIN_ROWS = 2;
const MAX_ROWS = 20;
const CONTAINER_BONUS = 0.3;

export const CANDIDATE_THRESHOLD = 0.3;

export interface ScoredTable {
  table: Element;
  score: number;
}

function keywordScore(text: string): number {
  return SIZE_KEYWORDS.filter((kw) => text.includes(kw)).length * KEYWORD_WEIGHT;
}

function patternScore(text: string): number {
  let score = 0;
  for (const pattern of SIZE_PATTERNS) {
    const count = text.match(pattern)?.length ?? 0;
    if (count > 0) {
      score += PATTERN_WEIGHT * Math.min(count / PATTERN_SATURATION, 1);
    }
  }
  return score;
}

function structureScore($: CheerioAPI, table: Element): number {
  const { headers, rows } = normalizeTable($, table);
  if (headers.length === 0 || rows.length === 0) return 0;

  let score = 0;
  const headerText = headers.join(' ').toLowerCase();
  if (SIZE_KEYWORDS.some((kw) => headerText.includes(kw))) {
    score += HEADER_KEYWORD_BONUS;
  }
  if (rows.length >= MIN_ROWS && rows.length <= MAX_ROWS) {
    score += ROW_COUNT_BONUS;
  }
  return score;
}

/** First ancestor below <body> whose class or id mentions sizing wins; never cumulative. */
function containerScore($: CheerioAPI, table: Element): number {
  for (const ancestor of $(table).parents().toArray()) {
    if (ancestor.name === 'body') break;
    const marker = `${$(ancestor).attr('class') ?? ''} ${$(ancestor).attr('id') ?? ''}`.toLowerCase();
    if (CONTAINER_KEYWORDS.some((kw) => marker.includes(kw))) {
      return CONTAINER_BONUS;
    }
  }
  return 0;
}

export function scoreTable($: CheerioAPI, table: Element): number {
  const text = $(table).text().toLowerCase();
  return keywordScore(text) + patternScore(text) + structureScore($, table) + containerScore($, table);
}

/**
 * Scores every table of the document as a size-chart candidate and returns
 * those above the threshold, best first. Ties keep document order.
 */
export function scoreTables($: CheerioAPI): ScoredTable[] {
  return $('table')
    .toArray()
    .map((table) => ({ table, score: scoreTable($, table) }))
    .filter(({ score }) => score > CANDIDATE_THRESHOLD)
    .sort((a, b) => b.score - a.score);
}
