import * as cheerio from 'cheerio';
import { normalizeTable } from '../../../src/parser/table-normalizer';
import { SIZE_TABLE_HTML } from '../../helpers/fakes';

const NBSP = String.fromCharCode(0x00a0);
const ZWSP = String.fromCharCode(0x200b);

function normalizeFirst(html: string) {
  const $ = cheerio.load(html);
  const table = $('table').get(0);
  if (!table) throw new Error('fixture has no table');
  return normalizeTable($, table);
}

describe('normalizeTable', () => {
  it('should read headers from thead and rows from tbody', () => {
    expect(normalizeFirst(SIZE_TABLE_HTML)).toEqual({
      headers: ['Size', 'Chest', 'Waist'],
      rows: [
        { Size: 'S', Chest: '36', Waist: '30' },
        { Size: 'M', Chest: '38', Waist: '32' },
      ],
    });
  });

  it('should use a first row of th cells as headers and not repeat it as data', () => {
    const chart = normalizeFirst(`
      <table>
        <tr><th>Size</th><th>Length</th></tr>
        <tr><td>Small</td><td>25"</td></tr>
        <tr><td>Medium</td><td>27"</td></tr>
      </table>`);

    expect(chart).toEqual({
      headers: ['Size', 'Length'],
      rows: [
        { Size: 'Small', Length: '25"' },
        { Size: 'Medium', Length: '27"' },
      ],
    });
  });

  it('should accept a first row whose cells all carry a header class', () => {
    const chart = normalizeFirst(`
      <table>
        <tr><td class="size-header">Size</td><td class="header">Bust</td></tr>
        <tr><td>S</td><td>32</td></tr>
      </table>`);

    expect(chart).toEqual({ headers: ['Size', 'Bust'], rows: [{ Size: 'S', Bust: '32' }] });
  });

  it('should find no headers when the first row mixes th and td', () => {
    const chart = normalizeFirst(`
      <table>
        <tr><th>Size</th><td>Bust</td></tr>
        <tr><td>S</td><td>32</td></tr>
      </table>`);

    expect(chart).toEqual({ headers: [], rows: [] });
  });

  it('should return an empty chart for a table of plain td rows', () => {
    const chart = normalizeFirst('<table><tr><td>S</td><td>32</td></tr><tr><td>M</td><td>34</td></tr></table>');

    expect(chart).toEqual({ headers: [], rows: [] });
  });

  it('should skip a body row that restates the headers', () => {
    const chart = normalizeFirst(`
      <table>
        <thead><tr><th>Size</th><th>Hip</th></tr></thead>
        <tbody>
          <tr><td>Size</td><td>Hip</td></tr>
          <tr><td>L</td><td>42</td></tr>
        </tbody>
      </table>`);

    expect(chart.rows).toEqual([{ Size: 'L', Hip: '42' }]);
  });

  it('should drop cells past the last header and keep short rows sparse', () => {
    const chart = normalizeFirst(`
      <table>
        <thead><tr><th>Size</th><th>Chest</th><th>Waist</th></tr></thead>
        <tbody>
          <tr><td>L</td><td>40</td><td>34</td><td>extra</td></tr>
          <tr><td>XL</td><td>44</td></tr>
          <tr></tr>
        </tbody>
      </table>`);

    expect(chart.rows).toEqual([
      { Size: 'L', Chest: '40', Waist: '34' },
      { Size: 'XL', Chest: '44' },
    ]);
  });

  it('should prefer the default-unit span and suffix it outside the first column', () => {
    const chart = normalizeFirst(`
      <table>
        <tr><th>Size</th><th>Chest</th></tr>
        <tr>
          <td><span class="default">S</span><span class="alt">Small</span></td>
          <td><span class="default">90</span><span class="alt">35.4</span></td>
        </tr>
      </table>`);

    expect(chart.rows).toEqual([{ Size: 'S', Chest: '90 CM' }]);
  });

  it('should clean header and cell text', () => {
    const chart = normalizeFirst(`
      <table>
        <thead><tr><th>Size</th><th>  Chest${NBSP}(in)${ZWSP} </th></tr></thead>
        <tbody><tr><td> M </td><td>38${NBSP}</td></tr></tbody>
      </table>`);

    expect(chart).toEqual({ headers: ['Size', 'Chest (in)'], rows: [{ Size: 'M', 'Chest (in)': '38' }] });
  });

  it('should keep a column whose header reads __proto__', () => {
    const chart = normalizeFirst(`
      <table>
        <tr><th>Size</th><th>__proto__</th></tr>
        <tr><td>S</td><td>36</td></tr>
      </table>`);

    const [row] = chart.rows;
    expect(Object.keys(row)).toEqual(['Size', '__proto__']);
    expect(Object.getOwnPropertyDescriptor(row, '__proto__')?.value).toBe('36');
  });

  it('should ignore rows of nested tables', () => {
    const chart = normalizeFirst(`
      <table>
        <tr><th>Size</th><th>Notes</th></tr>
        <tr><td>S</td><td><table><tr><td>inner</td></tr></table></td></tr>
      </table>`);

    expect(chart).toEqual({ headers: ['Size', 'Notes'], rows: [{ Size: 'S', Notes: 'inner' }] });
  });
});
