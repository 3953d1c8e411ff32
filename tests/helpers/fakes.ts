import { HttpStatusError, MalformedDataError } from '../../src/errors';
import { DEFAULT_CONFIG } from '../../src/config';
import { RateLimiter } from '../../src/rate-limiter';
import {
  ExtractionConfig,
  ExtractionContext,
  HttpFetcher,
  ImageTableExtractor,
  PageRenderer,
} from '../../src/types';

/**
 * In-memory HttpFetcher. A route value that is an Error is thrown,
 * a missing route answers 404.
 */
export class FakeHttp implements HttpFetcher {
  readonly calls: string[] = [];

  constructor(private readonly routes: Record<string, unknown> = {}) {}

  set(url: string, value: unknown): this {
    this.routes[url] = value;
    return this;
  }

  private resolve(url: string): unknown {
    this.calls.push(url);
    if (!(url in this.routes)) throw new HttpStatusError(404, url);
    const value = this.routes[url];
    if (value instanceof Error) throw value;
    return value;
  }

  async fetchJSON(url: string): Promise<unknown> {
    return this.resolve(url);
  }

  async fetchText(url: string): Promise<string> {
    const value = this.resolve(url);
    if (typeof value !== 'string') throw new MalformedDataError(`Route ${url} is not text`);
    return value;
  }

  async fetchBinary(url: string): Promise<{ data: Buffer; contentType: string }> {
    const value = this.resolve(url);
    if (typeof value !== 'string') throw new MalformedDataError(`Route ${url} is not binary`);
    return { data: Buffer.from(value), contentType: 'image/png' };
  }
}

export const noWaitLimiter: RateLimiter = { acquire: async () => {} };

export function fakeRenderer(html: string): PageRenderer & {
  renderHTML: jest.Mock<Promise<string>, [string, string?]>;
  close: jest.Mock<Promise<void>, []>;
} {
  return {
    renderHTML: jest.fn<Promise<string>, [string, string?]>().mockResolvedValue(html),
    close: jest.fn<Promise<void>, []>().mockResolvedValue(undefined),
  };
}

export function fakeContext(overrides: Partial<ExtractionContext> = {}): ExtractionContext {
  const config: ExtractionConfig = { ...DEFAULT_CONFIG };
  return {
    storeUrl: 'https://shop.test',
    config,
    http: new FakeHttp(),
    limiter: noWaitLimiter,
    createRenderer: () => fakeRenderer('<html><body></body></html>'),
    createImageExtractor: (): ImageTableExtractor | null => null,
    ...overrides,
  };
}

/** Product feed item list with `count` generated handles. */
export function feedPage(prefix: string, count: number): { products: { handle: string; title: string }[] } {
  return {
    products: Array.from({ length: count }, (_, i) => ({ handle: `${prefix}-${i}`, title: `Product ${prefix} ${i}` })),
  };
}

export const SIZE_TABLE_HTML = `
<html><body>
<div class="product-size-chart">
  <table>
    <thead><tr><th>Size</th><th>Chest</th><th>Waist</th></tr></thead>
    <tbody>
      <tr><td>S</td><td>36</td><td>30</td></tr>
      <tr><td>M</td><td>38</td><td>32</td></tr>
    </tbody>
  </table>
</div>
</body></html>`;
