import * as cheerio from 'cheerio';
import { createConfig } from './config';
import { errorMessage } from './errors';
import { createHttpClient } from './http';
import { createPageRenderer } from './browser';
import { normalizeTable } from './parser/table-normalizer';
import { scoreTable, CANDIDATE_THRESHOLD } from './parser/table-scorer';
import { cleanText } from './parser/text';

/**
 * Lists every table of a page with its size-chart score, to see why the
 * locator picked (or missed) a chart.
 * Usage: npm run debug -- <product-url> [--render]
 */
export function inspectDocument(html: string): string[] {
  const $ = cheerio.load(html);
  const tables = $('table').toArray();
  const lines = [`=== Tables found: ${tables.length} ===`];

  tables.forEach((table, i) => {
    const score = scoreTable($, table);
    const { headers, rows } = normalizeTable($, table);
    const marker = score > CANDIDATE_THRESHOLD ? 'candidate' : 'ignored';
    lines.push(`#${i + 1} score=${score.toFixed(2)} (${marker}) rows=${rows.length}`);
    lines.push(`   headers: ${headers.length > 0 ? headers.join(' | ') : '(none)'}`);
    lines.push(`   text: "${cleanText($(table).text()).substring(0, 120)}"`);
  });

  return lines;
}

async function debug(): Promise<void> {
  const url = process.argv[2];
  if (!url) {
    console.error('Usage: npm run debug -- <product-url> [--render]');
    process.exitCode = 1;
    return;
  }

  const config = createConfig();
  const timeoutMs = config.timeout * 1000;
  console.log(`\nInspecting: ${url}\n`);

  let html: string;
  if (process.argv.includes('--render')) {
    const renderer = createPageRenderer({ userAgent: config.userAgent, headless: config.headless, timeoutMs });
    try {
      html = await renderer.renderHTML(url);
    } finally {
      await renderer.close();
    }
  } else {
    const http = createHttpClient({ timeoutMs, maxRetries: config.maxRetries, userAgent: config.userAgent });
    html = await http.fetchText(url);
  }

  for (const line of inspectDocument(html)) {
    console.log(line);
  }
}

if (require.main === module) {
  debug().catch((err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
}
