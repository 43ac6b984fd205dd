/**
 * Scraping Session
 *
 * Orchestrates one resumable run over the listing feed:
 * 1. Load the checkpoint (ledger + records) unless starting fresh
 * 2. Open the page driver and navigate to the list (rate limited)
 * 3. Run the scroll-extraction loop until a stop condition or interrupt
 * 4. Always persist checkpoint, progress snapshot and summary, then release
 *    the driver
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { withRetry, randomBetween, sleep } from './utils/retry.js';
import type { RetryOptions } from './utils/retry.js';
import { RateLimiter } from './utils/rate-limiter.js';
import {
  ArticleLedger,
  FieldExtractor,
  NavigationError,
  PlaywrightDriver,
  isNavigationError,
  isRetryableNavigation,
  runScrollLoop,
} from './scraper/index.js';
import type { PageDriver, ScrollLoopConfig, ScrollOutcome } from './scraper/index.js';
import { CheckpointManager, ProgressWriter } from './storage/index.js';
import { computeStats, formatSummary, writeSummary } from './report/summary.js';
import type { RetryConfig, SessionResult, StopReason } from './types/index.js';

/**
 * Session options
 */
export interface SessionOptions {
  listUrl?: string;
  outputDir?: string;
  resume?: boolean;
  headless?: boolean;
  signal?: AbortSignal;
  /** Defaults to launching Playwright */
  openDriver?: () => Promise<PageDriver<unknown>>;
  rateLimiter?: RateLimiter;
  /** Overrides for navigation retry, see NAV_MAX_ATTEMPTS */
  retry?: Partial<RetryConfig>;
  scroll?: Partial<ScrollLoopConfig>;
  wait?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * Open the list page and wait for the first articles to render
 */
async function openList(
  driver: PageDriver<unknown>,
  listUrl: string,
  rateLimiter: RateLimiter,
  retry: RetryOptions
): Promise<void> {
  await withRetry(async (attempt) => {
    logger.info({ url: listUrl, attempt }, 'Navigating to list');

    let status: number | null;
    try {
      status = await rateLimiter.execute(() => driver.navigate(listUrl, config.browser.navigationTimeoutMs));
    } catch (error) {
      throw new NavigationError(listUrl, null, `Navigation to ${listUrl} failed`, { cause: error });
    }

    if (status !== 200) {
      throw new NavigationError(listUrl, status);
    }

    try {
      await driver.waitForSelector(config.selectors.articleContainer, config.browser.pageLoadTimeoutMs);
    } catch (error) {
      throw new NavigationError(listUrl, status, 'Article list did not render', { cause: error });
    }
  }, retry);
}

/**
 * Run one scraping session
 */
export async function runSession(options: SessionOptions = {}): Promise<SessionResult> {
  const {
    listUrl = config.target.listUrl,
    outputDir = config.output.dir,
    resume = true,
    signal,
    wait = sleep,
    now = () => new Date(),
  } = options;

  const startedAt = now();
  const titlePlaceholder = config.extraction.titlePlaceholder;
  const checkpoints = new CheckpointManager(outputDir, config.output.checkpointFile, { titlePlaceholder, now });
  const progress = new ProgressWriter(outputDir, config.output.articlesPrefix, now);
  const rateLimiter = options.rateLimiter ?? RateLimiter.perHour(config.rateLimit.navigation.requestsPerHour);
  const openDriver =
    options.openDriver ?? ((): Promise<PageDriver<unknown>> => PlaywrightDriver.launch({ headless: options.headless }));

  logger.info(
    {
      listUrl,
      outputDir,
      resume,
      delayRangeMs: config.scroll.delayRangeMs,
      maxRequestsPerHour: config.rateLimit.navigation.requestsPerHour,
    },
    'Starting scraping session'
  );

  let ledger = new ArticleLedger({ titlePlaceholder });
  if (resume) {
    const loaded = await checkpoints.load();
    if (loaded) {
      ledger = loaded.ledger;
      const last = ledger.records[ledger.records.length - 1];
      logger.info(
        { existing: ledger.size, lastTitle: last?.title.slice(0, 60) },
        'Resuming from checkpoint'
      );
    }
  } else {
    logger.info('Resume disabled, ignoring any existing checkpoint');
  }

  const initialCount = ledger.size;
  const scrollConfig: ScrollLoopConfig = { ...config.scroll, ...options.scroll };

  let stopReason: StopReason = 'error';
  let outcome: ScrollOutcome | null = null;
  let summaryPath: string | null = null;
  let driver: PageDriver<unknown> | null = null;

  try {
    driver = await openDriver();

    if (signal?.aborted) {
      stopReason = 'interrupted';
    } else {
      await openList(driver, listUrl, rateLimiter, {
        ...config.retry,
        ...options.retry,
        shouldRetry: isRetryableNavigation,
        wait,
      });
      const [minSettle, maxSettle] = config.browser.settleRangeMs;
      await wait(randomBetween(minSettle, maxSettle));
      logger.info('Successfully navigated to list page');

      const extractor = new FieldExtractor(driver, config.selectors, {
        siteOrigin: config.target.siteOrigin,
        maxSnippetLength: config.extraction.maxSnippetLength,
        titlePlaceholder,
      });

      outcome = await runScrollLoop({
        driver,
        extractor,
        ledger,
        config: scrollConfig,
        selectors: config.selectors,
        titleBounds: config.extraction,
        signal,
        wait,
        persistence: {
          checkpoint: async () => {
            await checkpoints.save(ledger.records, ledger);
          },
          snapshot: async () => {
            await progress.write(ledger.records);
          },
        },
      });
      stopReason = outcome.stopReason;
    }
  } catch (error) {
    if (isNavigationError(error)) {
      logger.error({ url: error.url, status: error.status, error }, 'Failed to navigate to list');
      stopReason = 'navigation-failed';
    } else {
      logger.error({ error }, 'Scraping session failed');
      throw error;
    }
  } finally {
    // Runs on every exit path, interrupts and crashes included
    if (ledger.size > 0) {
      await checkpoints.save(ledger.records, ledger);
      await progress.write(ledger.records);
    } else {
      logger.warn('No articles captured, skipping final save');
    }

    const elapsedMs = now().getTime() - startedAt.getTime();
    const summary = formatSummary(computeStats(ledger.records), elapsedMs, {
      stopReason,
      possiblyIncomplete: outcome?.possiblyIncomplete ?? true,
    });
    logger.info(`\n${summary}`);
    summaryPath = await writeSummary(outputDir, config.output.summaryPrefix, summary, now());

    if (driver) {
      await driver.close();
    }
  }

  const newRecords = ledger.size - initialCount;
  const possiblyIncomplete = outcome?.possiblyIncomplete ?? true;
  const durationMs = now().getTime() - startedAt.getTime();

  if (newRecords > 0) {
    logger.info({ before: initialCount, after: ledger.size }, `Found ${newRecords} new articles in this session`);
  } else {
    logger.info('No new articles found in this session');
  }

  logger.info(
    { stopReason, possiblyIncomplete, total: ledger.size, outputDir, summaryPath, durationMs },
    'Session complete'
  );

  return {
    records: ledger.records,
    initialCount,
    newRecords,
    stopReason,
    possiblyIncomplete,
    durationMs,
    outputDir,
    summaryPath,
  };
}
