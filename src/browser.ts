import { chromium, Browser } from 'playwright';
import { ResourceError, errorMessage } from './errors';
import { logger } from './logger';
import { RateLimiter } from './rate-limiter';
import { PageRenderer } from './types';

export interface RendererOptions {
  userAgent: string;
  headless: boolean;
  /** Navigation timeout in milliseconds */
  timeoutMs: number;
  limiter?: RateLimiter;
  /** How long to wait for the optional selector */
  selectorTimeoutMs?: number;
  /** Extra delay after load for late scripts */
  settleMs?: number;
}

/**
 * Headless Chromium behind the PageRenderer interface. The browser is
 * launched on the first render and must be released with close().
 */
export function createPageRenderer(options: RendererOptions): PageRenderer {
  let browser: Browser | null = null;

  async function launchBrowser(): Promise<Browser> {
    if (!browser) {
      try {
        browser = await chromium.launch({
          headless: options.headless,
          args: ['--disable-blink-features=AutomationControlled', '--no-sandbox', '--disable-dev-shm-usage'],
        });
      } catch (err) {
        throw new ResourceError(`Could not start the browser: ${errorMessage(err)}`, { cause: err });
      }
    }
    return browser;
  }

  return {
    async renderHTML(url: string, waitSelector?: string): Promise<string> {
      const b = await launchBrowser();
      await options.limiter?.acquire();

      const context = await b.newContext({
        userAgent: options.userAgent,
        locale: 'en-US',
        viewport: { width: 1920, height: 1080 },
      });

      try {
        const page = await context.newPage();
        await page.addInitScript(() => {
          Object.defineProperty(navigator, 'webdriver', { get: () => false });
        });

        try {
          await page.goto(url, { waitUntil: 'load', timeout: options.timeoutMs });
        } catch (err) {
          throw new ResourceError(`Could not render ${url}: ${errorMessage(err)}`, { cause: err });
        }

        if (waitSelector) {
          try {
            await page.waitForSelector(waitSelector, {
              state: 'attached',
              timeout: options.selectorTimeoutMs ?? 10000,
            });
          } catch {
            logger.debug(`Element ${waitSelector} not found on ${url}, proceeding anyway`);
          }
        }

        await page.waitForTimeout(options.settleMs ?? 2000);
        return await page.content();
      } finally {
        await context.close();
      }
    },

    async close(): Promise<void> {
      if (browser) {
        const b = browser;
        browser = null;
        await b.close();
      }
    },
  };
}
