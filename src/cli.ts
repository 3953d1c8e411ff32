import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { createConfig } from './config';
import { ConfigError, errorMessage } from './errors';
import { exportToExcel, saveResults } from './exporter';
import { logger, setDebugLogging } from './logger';
import { defaultDeps, extractStores, ServiceDeps } from './service';
import { StoreResult } from './types';

export const USAGE = `Usage: size-chart-extractor [stores...] [options]

Extract size charts from Shopify stores.

Options:
  -f, --file <path>        File containing store URLs (one per line, # for comments)
  -o, --output <path>      Output JSON file (default: output.json)
      --excel <path>       Also write an Excel workbook
      --max-products <n>   Maximum products per store (default: 100)
      --rate-limit <sec>   Seconds between requests (default: 1.0)
      --timeout <sec>      Request timeout in seconds (default: 30)
      --concurrent <n>     Maximum stores processed at once (default: 5)
      --debug              Enable debug logging
  -h, --help               Show this help

Examples:
  size-chart-extractor westside.com freakins.com
  size-chart-extractor westside.com --output results.json --max-products 50
  size-chart-extractor -f stores.txt --concurrent 3 --rate-limit 2.0`;

export interface CliOptions {
  stores: string[];
  file?: string;
  output: string;
  excel?: string;
  maxProducts?: number;
  rateLimit?: number;
  timeout?: number;
  concurrent?: number;
  debug: boolean;
  help: boolean;
}

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = Number(value);
  if (value.trim() === '' || Number.isNaN(num)) {
    throw new ConfigError(`--${flag} expects a number, got "${value}"`);
  }
  return num;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      file: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o', default: 'output.json' },
      excel: { type: 'string' },
      'max-products': { type: 'string' },
      'rate-limit': { type: 'string' },
      timeout: { type: 'string' },
      concurrent: { type: 'string' },
      debug: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  return {
    stores: positionals,
    file: values.file,
    output: values.output ?? 'output.json',
    excel: values.excel,
    maxProducts: toNumber('max-products', values['max-products']),
    rateLimit: toNumber('rate-limit', values['rate-limit']),
    timeout: toNumber('timeout', values.timeout),
    concurrent: toNumber('concurrent', values.concurrent),
    debug: values.debug ?? false,
    help: values.help ?? false,
  };
}

/** One store per line; blank lines and lines starting with # are skipped. */
export function parseStoreList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export async function loadStoresFromFile(filePath: string): Promise<string[]> {
  try {
    return parseStoreList(await readFile(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Error reading file ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}

export function formatSummary(results: StoreResult[]): string {
  const rows: [string, string, string][] = results.map((r) => [
    r.storeName,
    String(r.products.length),
    r.errors.length > 0 ? String(r.errors.length) : '-',
  ]);
  const totalProducts = results.reduce((sum, r) => sum + r.products.length, 0);
  const totalErrors = results.reduce((sum, r) => sum + r.errors.length, 0);
  rows.push(['Total', String(totalProducts), totalErrors > 0 ? String(totalErrors) : '-']);

  const header: [string, string, string] = ['Store', 'With Size Charts', 'Errors'];
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((row) => row[i].length)));
  const line = (cells: [string, string, string]) =>
    cells.map((cell, i) => (i === 0 ? cell.padEnd(widths[i]) : cell.padStart(widths[i]))).join('  ');

  return [
    'Extraction Results Summary',
    line(header),
    widths.map((w) => '-'.repeat(w)).join('  '),
    ...rows.slice(0, -1).map(line),
    widths.map((w) => '-'.repeat(w)).join('  '),
    line(rows[rows.length - 1]),
  ].join('\n');
}

/** Resolves the store list, runs the extraction and writes the output files. */
export async function run(options: CliOptions, deps: ServiceDeps = defaultDeps): Promise<StoreResult[]> {
  setDebugLogging(options.debug);

  const stores = [...options.stores];
  if (options.file) {
    stores.push(...(await loadStoresFromFile(options.file)));
  }
  const unique = [...new Set(stores)];
  if (unique.length === 0) {
    throw new ConfigError('No stores specified');
  }

  const config = createConfig({
    maxProductsPerStore: options.maxProducts,
    rateLimitDelay: options.rateLimit,
    timeout: options.timeout,
    concurrentRequests: options.concurrent,
  });

  logger.info(`Extracting size charts from ${unique.length} stores...`);
  const results = await extractStores(unique, config, deps);

  await saveResults(results, options.output);
  if (options.excel) {
    await exportToExcel(results, options.excel);
  }

  const totalProducts = results.reduce((sum, r) => sum + r.products.length, 0);
  const totalErrors = results.reduce((sum, r) => sum + r.errors.length, 0);
  logger.info(
    `Extraction complete: ${results.length} stores, ${totalProducts} products with size charts, ${totalErrors} errors`,
  );

  return results;
}
