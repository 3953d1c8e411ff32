import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { SizeChart } from '../types';
import { cleanText } from './text';

// Some stores wrap the metric value of a cell in `<span class="default">`
// next to a hidden imperial one.
const DEFAULT_UNIT_SELECTOR = '.default';
const DEFAULT_UNIT_SUFFIX = ' CM';

function ownRows($: CheerioAPI, scope: Element, table: Element): Element[] {
  return $(scope)
    .find('tr')
    .toArray()
    .filter((tr) => $(tr).closest('table').get(0) === table);
}

function cellsOf($: CheerioAPI, row: Element): Element[] {
  return $(row).children('th, td').toArray();
}

function hasHeaderClass($: CheerioAPI, cell: Element): boolean {
  return ($(cell).attr('class') ?? '').includes('header');
}

function extractHeaders($: CheerioAPI, table: Element): string[] {
  const thead = $(table).find('thead').get(0);
  if (thead) {
    const headerRow = ownRows($, thead, table)[0];
    if (headerRow) {
      const headers = cellsOf($, headerRow).map((cell) => cleanText($(cell).text()));
      if (headers.length > 0) return headers;
    }
  }

  const firstRow = ownRows($, table, table)[0];
  if (!firstRow) return [];

  const cells = cellsOf($, firstRow);
  if (cells.length === 0) return [];

  const allTh = cells.every((cell) => cell.name === 'th');
  const allHeaderClass = cells.every((cell) => hasHeaderClass($, cell));
  if (!allTh && !allHeaderClass) return [];

  return cells.map((cell) => cleanText($(cell).text()));
}

function cellValue($: CheerioAPI, cell: Element, column: number): string {
  const wrapped = $(cell).find(DEFAULT_UNIT_SELECTOR).first();
  if (wrapped.length === 0) {
    return cleanText($(cell).text());
  }

  const value = cleanText(wrapped.text());
  return column > 0 ? `${value}${DEFAULT_UNIT_SUFFIX}` : value;
}

/**
 * Reads a table into header-keyed rows. Cells are matched to headers by
 * position; cells past the last header are dropped. Without a usable header
 * row the result is empty.
 */
export function normalizeTable($: CheerioAPI, table: Element): SizeChart {
  const headers = extractHeaders($, table);
  const rows: Record<string, string>[] = [];

  const tbody = $(table).find('tbody').get(0);
  for (const tr of ownRows($, tbody ?? table, table)) {
    const cells = cellsOf($, tr);
    if (cells.length === 0) continue;

    if (headers.length > 0 && cells.length === headers.length) {
      const texts = cells.map((cell) => cleanText($(cell).text()));
      if (texts.every((text, i) => text === headers[i])) continue;
    }

    // fromEntries defines own keys, so a "__proto__" header stays a column
    const entries = cells
      .slice(0, headers.length)
      .map((cell, i): [string, string] => [headers[i], cellValue($, cell, i)]);
    if (entries.length > 0) rows.push(Object.fromEntries(entries));
  }

  return { headers, rows };
}
