/**
 * Scroll-Extraction Loop
 *
 * Drives the infinite-scroll feed: snapshot rendered articles, extract the
 * unknown ones, merge them through the ledger, then decide whether to keep
 * scrolling. Three independent streak counters tell apart a real end of feed,
 * a stalled or broken page, and a long run of already-captured content.
 */

import { logger } from '../utils/logger.js';
import { randomBetween, sleep } from '../utils/retry.js';
import type { ArticleRecord, StopReason } from '../types/index.js';
import { PAGE_SCRIPTS } from './driver.js';
import type { PageDriver } from './driver.js';
import { isValidRecord } from './field-extractor.js';
import type { FieldExtractor, TitleBounds } from './field-extractor.js';
import type { ArticleLedger } from './ledger.js';

export interface ScrollLoopConfig {
  /** Iterations without DOM node growth before the feed counts as finished */
  maxNoGrowthScrolls: number;
  /** Iterations with nothing recognizable before giving up */
  maxEmptyScrolls: number;
  /** Floor for the all-known patience */
  minAllKnownScrolls: number;
  allKnownArticlesPerScroll: number;
  allKnownPadding: number;
  maxScrollAttempts: number;
  fastScrollDistance: number;
  delayRangeMs: readonly [number, number];
  /** Settle delay after a fast scroll, drawn from this range */
  fastScrollDelayRangeMs: readonly [number, number];
  postScrollWaitMs: number;
  settleWaitMs: number;
  loadingTimeoutMs: number;
  loadingPollMs: number;
  /** Write a progress snapshot each time the total crosses a multiple of this */
  saveInterval: number;
  /** Also snapshot when new records arrive and this long has passed since the last one */
  snapshotIntervalMs: number;
}

export interface ScrollProgressState {
  emptyStreak: number;
  allKnownStreak: number;
  noGrowthStreak: number;
  scrollAttempts: number;
  lastNodeCount: number;
}

/**
 * Classification counts for one snapshot of rendered nodes
 */
export interface IterationStats {
  nodes: number;
  added: number;
  known: number;
  failed: number;
}

export interface StopLimits {
  maxNoGrowthScrolls: number;
  maxEmptyScrolls: number;
  allKnownLimit: number;
  maxScrollAttempts: number;
}

/**
 * Persistence hooks. Implementations are expected to log their own failures.
 */
export interface ScrollPersistence {
  checkpoint(): Promise<void>;
  snapshot(): Promise<void>;
}

export interface ScrollLoopSelectors {
  articleContainer: string;
  loadingIndicators: readonly string[];
}

export interface ScrollLoopDeps<TNode> {
  driver: PageDriver<TNode>;
  extractor: FieldExtractor<TNode>;
  ledger: ArticleLedger;
  config: ScrollLoopConfig;
  selectors: ScrollLoopSelectors;
  titleBounds: TitleBounds;
  persistence?: ScrollPersistence;
  signal?: AbortSignal;
  wait?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export type LoopStopReason = Exclude<StopReason, 'navigation-failed' | 'error'>;

export interface ScrollOutcome {
  stopReason: LoopStopReason;
  possiblyIncomplete: boolean;
  iterations: number;
  scrollAttempts: number;
  newRecords: number;
  failed: number;
  allKnownLimit: number;
  state: ScrollProgressState;
}

const INCOMPLETE_REASONS: ReadonlySet<LoopStopReason> = new Set(['scroll-limit', 'max-attempts', 'interrupted']);

export function initialProgressState(): ScrollProgressState {
  return { emptyStreak: 0, allKnownStreak: 0, noGrowthStreak: 0, scrollAttempts: 0, lastNodeCount: 0 };
}

/**
 * Patience for scrolling through known content, scaled to how much was
 * already captured before this run.
 */
export function allKnownLimit(
  existingCount: number,
  config: Pick<ScrollLoopConfig, 'minAllKnownScrolls' | 'allKnownArticlesPerScroll' | 'allKnownPadding'>
): number {
  const estimated = Math.floor(existingCount / config.allKnownArticlesPerScroll) + config.allKnownPadding;
  return Math.max(config.minAllKnownScrolls, estimated);
}

/**
 * Fold one iteration's counts into the streak counters
 */
export function advanceProgress(state: ScrollProgressState, stats: IterationStats): ScrollProgressState {
  const next = { ...state };

  if (stats.nodes === state.lastNodeCount) {
    next.noGrowthStreak = state.noGrowthStreak + 1;
  } else {
    next.noGrowthStreak = 0;
    next.lastNodeCount = stats.nodes;
  }

  if (stats.added > 0) {
    next.emptyStreak = 0;
    next.allKnownStreak = 0;
  } else if (stats.known > 0) {
    next.allKnownStreak = state.allKnownStreak + 1;
    next.emptyStreak = 0;
  } else {
    next.emptyStreak = state.emptyStreak + 1;
    next.allKnownStreak = 0;
  }

  return next;
}

/**
 * Stop conditions in priority order; null means keep scrolling
 */
export function evaluateStop(state: ScrollProgressState, limits: StopLimits): LoopStopReason | null {
  if (state.noGrowthStreak >= limits.maxNoGrowthScrolls) {
    return 'end-of-feed';
  }
  if (state.emptyStreak >= limits.maxEmptyScrolls) {
    return 'no-content';
  }
  if (state.allKnownStreak >= limits.allKnownLimit) {
    return 'scroll-limit';
  }
  if (state.scrollAttempts >= limits.maxScrollAttempts) {
    return 'max-attempts';
  }
  return null;
}

export async function runScrollLoop<TNode>(deps: ScrollLoopDeps<TNode>): Promise<ScrollOutcome> {
  const { driver, extractor, ledger, config, selectors, titleBounds, persistence, signal } = deps;
  const wait = deps.wait ?? sleep;
  const random = deps.random ?? Math.random;
  const now = deps.now ?? Date.now;

  const limits: StopLimits = {
    maxNoGrowthScrolls: config.maxNoGrowthScrolls,
    maxEmptyScrolls: config.maxEmptyScrolls,
    allKnownLimit: allKnownLimit(ledger.size, config),
    maxScrollAttempts: config.maxScrollAttempts,
  };

  logger.info(
    { existing: ledger.size, allKnownLimit: limits.allKnownLimit, maxScrollAttempts: limits.maxScrollAttempts },
    'Starting infinite scroll extraction'
  );

  let state = initialProgressState();
  let iterations = 0;
  let newRecords = 0;
  let failed = 0;
  let snapshotBucket = Math.floor(ledger.size / config.saveInterval);
  let lastSnapshotAt = now();

  const finish = (stopReason: LoopStopReason): ScrollOutcome => {
    const outcome: ScrollOutcome = {
      stopReason,
      possiblyIncomplete: INCOMPLETE_REASONS.has(stopReason),
      iterations,
      scrollAttempts: state.scrollAttempts,
      newRecords,
      failed,
      allKnownLimit: limits.allKnownLimit,
      state,
    };
    logger.info({ ...outcome, state: undefined, total: ledger.size }, 'Scroll extraction finished');
    return outcome;
  };

  // Classify every rendered node and merge what is new
  const processSnapshot = async (nodes: TNode[]): Promise<IterationStats> => {
    const batch: ArticleRecord[] = [];
    let known = 0;
    let failedNodes = 0;

    try {
      for (const node of nodes) {
        let url: string | null = null;
        try {
          url = await extractor.probeUrl(node);
        } catch (error) {
          logger.debug({ error }, 'URL probe failed, running full extraction');
        }

        if (url !== null && ledger.known(url)) {
          known++;
          continue;
        }

        const result = await extractor.extract(node);
        if (!result.ok) {
          failedNodes++;
          continue;
        }
        if (!isValidRecord(result.record, titleBounds)) {
          logger.debug({ title: result.record.title.slice(0, 50), url: result.record.url }, 'Discarding invalid record');
          failedNodes++;
          continue;
        }
        batch.push(result.record);
      }
    } finally {
      await driver.release(nodes);
    }

    const added = ledger.merge(batch);
    for (const record of added) {
      logger.debug({ title: record.title.slice(0, 50), url: record.url }, 'Extracted new article');
    }

    // Records the merge rejected were already captured under URL or fingerprint
    known += batch.length - added.length;

    return { nodes: nodes.length, added: added.length, known, failed: failedNodes };
  };

  const persist = async (stats: IterationStats): Promise<void> => {
    if (!persistence || stats.added === 0) {
      return;
    }

    try {
      await persistence.checkpoint();
    } catch (error) {
      logger.error({ error }, 'Checkpoint hook failed');
    }

    const bucket = Math.floor(ledger.size / config.saveInterval);
    if (bucket > snapshotBucket || now() - lastSnapshotAt >= config.snapshotIntervalMs) {
      snapshotBucket = bucket;
      lastSnapshotAt = now();
      try {
        await persistence.snapshot();
      } catch (error) {
        logger.error({ error }, 'Progress snapshot hook failed');
      }
    }
  };

  const readNumber = async (script: string): Promise<number> => {
    const value = await driver.evaluateScript(script);
    return typeof value === 'number' ? value : 0;
  };

  const scrollToBottom = async (): Promise<void> => {
    try {
      const previousHeight = await readNumber(PAGE_SCRIPTS.scrollHeight);
      await driver.evaluateScript(PAGE_SCRIPTS.scrollToBottom);

      const [minDelay, maxDelay] = config.delayRangeMs;
      await wait(randomBetween(minDelay, maxDelay, random));

      const newHeight = await readNumber(PAGE_SCRIPTS.scrollHeight);
      if (newHeight === previousHeight) {
        logger.debug('No height change detected after scroll');
      } else {
        logger.debug({ previousHeight, newHeight }, 'Page height changed');
      }
    } catch (error) {
      logger.warn({ error }, 'Scroll action failed');
    }
  };

  const fastScroll = async (): Promise<void> => {
    try {
      const offset = await readNumber(PAGE_SCRIPTS.scrollOffset);
      await driver.evaluateScript(PAGE_SCRIPTS.scrollTo(offset + config.fastScrollDistance));
      const [minDelay, maxDelay] = config.fastScrollDelayRangeMs;
      await wait(randomBetween(minDelay, maxDelay, random));
    } catch (error) {
      logger.warn({ error }, 'Fast scroll action failed');
    }
  };

  const waitForLoadingComplete = async (): Promise<void> => {
    try {
      if (selectors.loadingIndicators.length > 0) {
        const indicatorSelector = selectors.loadingIndicators.join(', ');
        let waited = 0;
        while (waited < config.loadingTimeoutMs) {
          const indicators = await driver.querySelectorAll(indicatorSelector);
          await driver.release(indicators);
          if (indicators.length === 0) {
            break;
          }
          await wait(config.loadingPollMs);
          waited += config.loadingPollMs;
        }
        if (waited >= config.loadingTimeoutMs) {
          logger.debug({ waitedMs: waited }, 'Loading indicators still visible');
        }
      }

      const initialHeight = await readNumber(PAGE_SCRIPTS.scrollHeight);
      await wait(config.settleWaitMs);
      const finalHeight = await readNumber(PAGE_SCRIPTS.scrollHeight);

      if (finalHeight > initialHeight) {
        logger.debug({ initialHeight, finalHeight }, 'Content loaded');
      } else {
        logger.debug('No new content detected');
      }
    } catch (error) {
      logger.debug({ error }, 'Loading wait error');
    }
  };

  for (;;) {
    if (signal?.aborted) {
      logger.warn('Scroll extraction interrupted');
      return finish('interrupted');
    }

    const nodes = await driver.querySelectorAll(selectors.articleContainer);
    const stats = await processSnapshot(nodes);
    iterations++;
    newRecords += stats.added;
    failed += stats.failed;
    state = advanceProgress(state, stats);

    logger.info(
      {
        scroll: state.scrollAttempts + 1,
        elements: stats.nodes,
        new: stats.added,
        known: stats.known,
        failed: stats.failed,
        total: ledger.size,
        noGrowth: state.noGrowthStreak,
        allKnown: `${state.allKnownStreak}/${limits.allKnownLimit}`,
        empty: `${state.emptyStreak}/${limits.maxEmptyScrolls}`,
      },
      stats.added > 0 ? `Found ${stats.added} new articles` : 'No new articles in this pass'
    );

    await persist(stats);

    const stopReason = evaluateStop(state, limits);
    if (stopReason !== null) {
      if (stopReason === 'scroll-limit') {
        logger.warn(
          { allKnownLimit: limits.allKnownLimit },
          'Reached scroll limit while only seeing known articles; the feed may not be exhausted'
        );
      }
      return finish(stopReason);
    }

    if (signal?.aborted) {
      logger.warn('Scroll extraction interrupted');
      return finish('interrupted');
    }

    state = { ...state, scrollAttempts: state.scrollAttempts + 1 };

    // Move faster through stretches of already-captured content
    if (stats.known > 0 && stats.added === 0) {
      logger.debug('Fast-scrolling through known content');
      await fastScroll();
    } else {
      await scrollToBottom();
    }
    await wait(config.postScrollWaitMs);
    await waitForLoadingComplete();
  }
}
