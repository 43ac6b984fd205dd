/**
 * Playwright page driver
 *
 * Owns one browser, context and page for the lifetime of a session.
 */

import { chromium, firefox, webkit } from 'playwright';
import type { Browser, BrowserContext, BrowserType, ElementHandle, Page } from 'playwright';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { PageDriver } from './driver.js';

export type PlaywrightNode = ElementHandle<SVGElement | HTMLElement>;

export type BrowserEngine = 'chromium' | 'firefox' | 'webkit';

/**
 * Browser configuration options
 */
export interface BrowserOptions {
  engine?: BrowserEngine;
  headless?: boolean;
  timeout?: number;
  userAgent?: string;
}

const ENGINES: Record<BrowserEngine, BrowserType> = { chromium, firefox, webkit };

function pickUserAgent(): string {
  const agents = config.browser.userAgents;
  return agents[Math.floor(Math.random() * agents.length)] ?? agents[0];
}

export class PlaywrightDriver implements PageDriver<PlaywrightNode> {
  private closed = false;

  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page
  ) {}

  /**
   * Launch a browser and open a single page
   */
  static async launch(options: BrowserOptions = {}): Promise<PlaywrightDriver> {
    const engine = options.engine ?? config.browser.engine;
    const headless = options.headless ?? config.browser.headless;

    logger.info({ engine, headless }, 'Launching browser');

    const browser = await ENGINES[engine].launch({
      headless,
      // Signals belong to the CLI, which stops the loop and saves before the browser goes away
      handleSIGINT: false,
      handleSIGTERM: false,
      handleSIGHUP: false,
      // Required for Docker/containerized environments
      args: engine === 'chromium' ? ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'] : [],
    });

    try {
      const context = await browser.newContext({
        userAgent: options.userAgent ?? pickUserAgent(),
        viewport: config.browser.viewport,
        locale: config.browser.locale,
        timezoneId: config.browser.timezoneId,
        javaScriptEnabled: true,
        extraHTTPHeaders: config.browser.headers,
      });

      context.setDefaultTimeout(options.timeout ?? config.browser.navigationTimeoutMs);

      const page = await context.newPage();

      // Block unnecessary resource types for faster loading
      await page.route('**/*', (route) => {
        const resourceType = route.request().resourceType();
        if (resourceType === 'media' || resourceType === 'font') {
          return route.abort();
        }
        return route.continue();
      });

      logger.info('Browser initialized successfully');
      return new PlaywrightDriver(browser, context, page);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async navigate(url: string, timeoutMs: number = config.browser.navigationTimeoutMs): Promise<number | null> {
    logger.debug({ url }, 'Navigating to URL');
    const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    const status = response?.status() ?? null;
    logger.debug({ url, status }, 'Navigation finished');
    return status;
  }

  querySelectorAll(selector: string): Promise<PlaywrightNode[]> {
    return this.page.$$(selector);
  }

  querySelector(node: PlaywrightNode, selector: string): Promise<PlaywrightNode | null> {
    return node.$(selector);
  }

  getAttribute(node: PlaywrightNode, name: string): Promise<string | null> {
    return node.getAttribute(name);
  }

  innerText(node: PlaywrightNode): Promise<string> {
    return node.innerText();
  }

  evaluateScript(script: string): Promise<unknown> {
    return this.page.evaluate<unknown>(script);
  }

  async release(nodes: readonly PlaywrightNode[]): Promise<void> {
    const results = await Promise.allSettled(nodes.map((node) => node.dispose()));
    const failed = results.filter((result) => result.status === 'rejected').length;
    if (failed > 0) {
      logger.debug({ failed }, 'Element handles were already detached');
    }
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: timeoutMs, state: 'attached' });
  }

  /**
   * Close page, context and browser. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      await this.page.close();
    } catch (error) {
      logger.warn({ error }, 'Error closing page');
    }

    try {
      await this.context.close();
    } catch (error) {
      logger.warn({ error }, 'Error closing context');
    }

    try {
      await this.browser.close();
      logger.info('Browser closed');
    } catch (error) {
      logger.warn({ error }, 'Error closing browser');
    }
  }
}
