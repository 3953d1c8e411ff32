import * as cheerio from 'cheerio';
import { CANDIDATE_THRESHOLD, scoreTable, scoreTables } from '../../../src/parser/table-scorer';
import { SIZE_TABLE_HTML } from '../../helpers/fakes';

function scoreOf(html: string): number {
  const $ = cheerio.load(html);
  const table = $('table').get(0);
  if (!table) throw new Error('fixture has no table');
  return scoreTable($, table);
}

const cellTable = (text: string) => `<table><tr><td>${text}</td></tr></table>`;

const ITEM_TABLE =
  '<table><tr><th>Item</th><th>Code</th></tr><tr><td>alpha</td><td>one</td></tr><tr><td>beta</td><td>two</td></tr></table>';

describe('scoreTable', () => {
  it('should score a single keyword at 0.1', () => {
    expect(scoreOf(cellTable('Choose your size today'))).toBeCloseTo(0.1);
  });

  it('should add measurement patterns proportionally to their count', () => {
    // chest + waist keywords, two "<part> <number>" matches
    expect(scoreOf(cellTable('chest 38 waist 32'))).toBeCloseTo(0.28);
  });

  it('should cap a pattern contribution at five matches', () => {
    expect(scoreOf(cellTable('xs s m l xl xxl'))).toBeCloseTo(0.2);
  });

  it('should never decrease when a keyword is added', () => {
    const before = scoreOf(cellTable('chest 38'));
    const after = scoreOf(cellTable('chest 38 sleeve'));

    expect(after).toBeGreaterThan(before);
  });

  it('should give the row-count bonus to a well-formed table', () => {
    expect(scoreOf(ITEM_TABLE)).toBeCloseTo(0.1);
  });

  it('should give the header keyword bonus once', () => {
    const html = ITEM_TABLE.replace('<th>Item</th>', '<th>Size</th>');

    expect(scoreOf(html)).toBeCloseTo(0.4);
  });

  it('should add the container bonus for a sizing ancestor', () => {
    expect(scoreOf(`<div class="product-size-guide">${ITEM_TABLE}</div>`)).toBeCloseTo(0.4);
    expect(scoreOf(`<section id="sizing-popup"><div>${ITEM_TABLE}</div></section>`)).toBeCloseTo(0.4);
  });

  it('should not accumulate the container bonus across ancestors', () => {
    expect(scoreOf(`<div class="chart"><div id="size">${ITEM_TABLE}</div></div>`)).toBeCloseTo(0.4);
  });
});

describe('scoreTables', () => {
  it('should exclude tables at or below the threshold', () => {
    const $ = cheerio.load(`${cellTable('Choose your size today')}${ITEM_TABLE}`);

    expect(scoreTables($)).toEqual([]);
  });

  it('should return candidates best first', () => {
    const $ = cheerio.load(`${ITEM_TABLE}<div class="size">${ITEM_TABLE}</div>${SIZE_TABLE_HTML}`);
    const tables = $('table').toArray();

    const scored = scoreTables($);

    expect(scored.map((s) => s.table)).toEqual([tables[2], tables[1]]);
    expect(scored[0].score).toBeCloseTo(0.9);
    expect(scored.every((s) => s.score > CANDIDATE_THRESHOLD)).toBe(true);
  });

  it('should keep document order for equal scores', () => {
    const $ = cheerio.load(`<div class="size">${ITEM_TABLE}</div><div class="size">${ITEM_TABLE}</div>`);
    const tables = $('table').toArray();

    expect(scoreTables($).map((s) => s.table)).toEqual(tables);
  });
});
