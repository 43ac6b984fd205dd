/**
 * Application configuration
 */

import { join } from 'path';
import { env } from './env.js';
import { SELECTORS, USER_AGENTS, HTTP_HEADERS } from './site.js';

export const config = {
  app: {
    name: 'feed-harvester',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  target: {
    listUrl: env.MEDIUM_LIST_URL,
    siteOrigin: env.SITE_ORIGIN,
  },

  output: {
    dir: env.OUTPUT_DIR,
    checkpointFile: 'checkpoint.json',
    articlesPrefix: 'medium_articles',
    summaryPrefix: 'scraping_summary',
  },

  browser: {
    engine: env.BROWSER,
    headless: env.HEADLESS,
    navigationTimeoutMs: env.NAV_TIMEOUT_MS,
    pageLoadTimeoutMs: env.PAGE_LOAD_TIMEOUT_MS,
    settleRangeMs: [2000, 4000] as const,
    viewport: { width: 1920, height: 1080 },
    locale: 'en-US',
    timezoneId: 'America/New_York',
    userAgents: USER_AGENTS,
    headers: HTTP_HEADERS,
  },

  scroll: {
    maxNoGrowthScrolls: env.MAX_NO_GROWTH_SCROLLS,
    maxEmptyScrolls: env.MAX_EMPTY_SCROLLS,
    minAllKnownScrolls: env.MIN_ALL_KNOWN_SCROLLS,
    allKnownArticlesPerScroll: env.ALL_KNOWN_ARTICLES_PER_SCROLL,
    allKnownPadding: env.ALL_KNOWN_PADDING,
    maxScrollAttempts: env.MAX_SCROLL_ATTEMPTS,
    fastScrollDistance: env.FAST_SCROLL_DISTANCE_PX,
    delayRangeMs: [env.DELAY_MIN_SECONDS * 1000, env.DELAY_MAX_SECONDS * 1000] as const,
    fastScrollDelayRangeMs: [500, 1000] as const,
    postScrollWaitMs: 2000,
    settleWaitMs: 2000,
    loadingTimeoutMs: 5000,
    loadingPollMs: 250,
    saveInterval: env.SAVE_INTERVAL,
    snapshotIntervalMs: env.CHECKPOINT_INTERVAL_SECONDS * 1000,
  },

  extraction: {
    minTitleLength: env.MIN_TITLE_LENGTH,
    maxTitleLength: env.MAX_TITLE_LENGTH,
    maxSnippetLength: env.MAX_SNIPPET_LENGTH,
    titlePlaceholder: 'No title',
  },

  selectors: SELECTORS,

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE ?? join(env.OUTPUT_DIR, 'logs', 'scraper.log'),
    pretty: env.NODE_ENV !== 'production',
  },

  retry: {
    maxAttempts: env.NAV_MAX_ATTEMPTS,
    initialDelayMs: 5000,
    maxDelayMs: 60000,
    factor: 2,
    jitter: 0.2,
  },

  rateLimit: {
    navigation: {
      requestsPerHour: env.MAX_REQUESTS_PER_HOUR,
    },
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
export { SELECTORS, USER_AGENTS, HTTP_HEADERS } from './site.js';
export type { SelectorProfile } from './site.js';
