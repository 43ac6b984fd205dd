import { describe, test, expect, vi } from 'vitest';
import { SELECTORS } from '../../config/site.js';
import { FieldExtractor } from '../field-extractor.js';
import { ArticleLedger } from '../ledger.js';
import {
  runScrollLoop,
  allKnownLimit,
  advanceProgress,
  evaluateStop,
  initialProgressState,
} from '../scroll-loop.js';
import type { ScrollLoopConfig, ScrollPersistence, StopLimits } from '../scroll-loop.js';
import type { ArticleRecord } from '../../types/index.js';
import { FakeDriver, articleNode, noWait } from './fake-driver.js';
import type { FakeDriverOptions, FakeNode } from './fake-driver.js';

const TEST_CONFIG: ScrollLoopConfig = {
  maxNoGrowthScrolls: 10,
  maxEmptyScrolls: 5,
  minAllKnownScrolls: 200,
  allKnownArticlesPerScroll: 15,
  allKnownPadding: 100,
  maxScrollAttempts: 5000,
  fastScrollDistance: 2000,
  delayRangeMs: [0, 0],
  fastScrollDelayRangeMs: [0, 0],
  postScrollWaitMs: 0,
  settleWaitMs: 0,
  loadingTimeoutMs: 0,
  loadingPollMs: 100,
  saveInterval: 50,
  snapshotIntervalMs: Number.POSITIVE_INFINITY,
};

function node(id: number): FakeNode {
  return articleNode({ url: `/p/${id}`, title: `Article number ${id}`, author: `Author ${id}` });
}

function nodes(from: number, to: number): FakeNode[] {
  const list: FakeNode[] = [];
  for (let id = from; id < to; id++) {
    list.push(node(id));
  }
  return list;
}

function seededRecord(id: number): ArticleRecord {
  return {
    title: `Article number ${id}`,
    snippet: '',
    author: `Author ${id}`,
    publication: '',
    date: '',
    claps: 0,
    responses: 0,
    url: `https://medium.com/p/${id}`,
    extracted_at: '2024-07-01T12:00:00.000Z',
  };
}

function setup(
  driverOptions: FakeDriverOptions,
  overrides: Partial<ScrollLoopConfig> = {},
  ledger = new ArticleLedger({ titlePlaceholder: 'No title' })
) {
  const driver = new FakeDriver(driverOptions);
  const extractor = new FieldExtractor(driver, SELECTORS, {
    siteOrigin: 'https://medium.com',
    maxSnippetLength: 1000,
    titlePlaceholder: 'No title',
  });
  const run = (
    extra: {
      persistence?: ScrollPersistence;
      signal?: AbortSignal;
      wait?: (ms: number) => Promise<void>;
      random?: () => number;
    } = {}
  ) =>
    runScrollLoop({
      driver,
      extractor,
      ledger,
      config: { ...TEST_CONFIG, ...overrides },
      selectors: SELECTORS,
      titleBounds: { minTitleLength: 5, maxTitleLength: 500 },
      wait: noWait,
      random: () => 0,
      ...extra,
    });
  return { driver, ledger, run };
}

describe('allKnownLimit', () => {
  test('never drops below the configured floor', () => {
    expect(allKnownLimit(0, TEST_CONFIG)).toBe(200);
    expect(allKnownLimit(1500, TEST_CONFIG)).toBe(200);
  });

  test('grows with the number of records captured before the run', () => {
    expect(allKnownLimit(4500, TEST_CONFIG)).toBe(400);
    expect(allKnownLimit(2614, TEST_CONFIG)).toBe(274);
  });
});

describe('advanceProgress', () => {
  test('counts no-growth only when the node count repeats', () => {
    let state = initialProgressState();
    state = advanceProgress(state, { nodes: 5, added: 5, known: 0, failed: 0 });
    expect(state.noGrowthStreak).toBe(0);
    expect(state.lastNodeCount).toBe(5);

    state = advanceProgress(state, { nodes: 5, added: 0, known: 5, failed: 0 });
    expect(state.noGrowthStreak).toBe(1);

    state = advanceProgress(state, { nodes: 8, added: 0, known: 8, failed: 0 });
    expect(state.noGrowthStreak).toBe(0);
    expect(state.lastNodeCount).toBe(8);
  });

  test('known content feeds the all-known streak and clears the empty one', () => {
    let state = initialProgressState();
    state = advanceProgress(state, { nodes: 3, added: 0, known: 0, failed: 3 });
    state = advanceProgress(state, { nodes: 4, added: 0, known: 0, failed: 4 });
    expect(state.emptyStreak).toBe(2);

    state = advanceProgress(state, { nodes: 5, added: 0, known: 5, failed: 0 });
    expect(state.emptyStreak).toBe(0);
    expect(state.allKnownStreak).toBe(1);

    state = advanceProgress(state, { nodes: 6, added: 0, known: 0, failed: 0 });
    expect(state.emptyStreak).toBe(1);
    expect(state.allKnownStreak).toBe(0);
  });

  test('new records reset both streaks', () => {
    const state = advanceProgress(
      { emptyStreak: 3, allKnownStreak: 7, noGrowthStreak: 2, scrollAttempts: 9, lastNodeCount: 4 },
      { nodes: 6, added: 1, known: 5, failed: 0 }
    );
    expect(state).toEqual({ emptyStreak: 0, allKnownStreak: 0, noGrowthStreak: 0, scrollAttempts: 9, lastNodeCount: 6 });
  });
});

describe('evaluateStop', () => {
  const limits: StopLimits = { maxNoGrowthScrolls: 10, maxEmptyScrolls: 5, allKnownLimit: 200, maxScrollAttempts: 5000 };

  test('checks conditions in priority order', () => {
    const everything = { emptyStreak: 5, allKnownStreak: 200, noGrowthStreak: 10, scrollAttempts: 5000, lastNodeCount: 0 };
    expect(evaluateStop(everything, limits)).toBe('end-of-feed');
    expect(evaluateStop({ ...everything, noGrowthStreak: 9 }, limits)).toBe('no-content');
    expect(evaluateStop({ ...everything, noGrowthStreak: 9, emptyStreak: 4 }, limits)).toBe('scroll-limit');
    expect(evaluateStop({ ...everything, noGrowthStreak: 9, emptyStreak: 4, allKnownStreak: 199 }, limits)).toBe(
      'max-attempts'
    );
  });

  test('returns null while every counter is under its limit', () => {
    expect(evaluateStop(initialProgressState(), limits)).toBeNull();
  });
});

describe('runScrollLoop', () => {
  test('stops with end-of-feed after 10 passes without DOM growth', async () => {
    const { driver, ledger, run } = setup({ frames: [nodes(0, 5)] });

    const outcome = await run();

    expect(outcome.stopReason).toBe('end-of-feed');
    expect(outcome.possiblyIncomplete).toBe(false);
    expect(outcome.iterations).toBe(11);
    expect(outcome.scrollAttempts).toBe(10);
    expect(outcome.newRecords).toBe(5);
    expect(outcome.state.noGrowthStreak).toBe(10);
    expect(ledger.size).toBe(5);
    // First scroll is normal, every all-known pass after it jumps ahead
    expect(driver.scrolls).toBe(10);
    expect(driver.fastScrolls).toBe(9);
  });

  test('stops with scroll-limit after exactly the dynamic number of all-known passes', async () => {
    const seeded = ArticleLedger.fromRecords(
      Array.from({ length: 30 }, (_, id) => seededRecord(id)),
      { titlePlaceholder: 'No title' }
    );
    // Each frame renders one more already-known article, so the DOM keeps growing
    const frames = Array.from({ length: 12 }, (_, i) => nodes(0, i + 1));
    const { run } = setup({ frames }, { minAllKnownScrolls: 3, allKnownPadding: 4 }, seeded);

    const outcome = await run();

    // max(3, floor(30 / 15) + 4) = 6
    expect(outcome.allKnownLimit).toBe(6);
    expect(outcome.stopReason).toBe('scroll-limit');
    expect(outcome.possiblyIncomplete).toBe(true);
    expect(outcome.iterations).toBe(6);
    expect(outcome.state.allKnownStreak).toBe(6);
    expect(outcome.state.noGrowthStreak).toBe(0);
    expect(outcome.newRecords).toBe(0);
  });

  test('keeps going through a run of repeats until new content shows up', async () => {
    const frames = [nodes(0, 3), nodes(0, 3), nodes(0, 3), nodes(0, 3), nodes(0, 3), nodes(0, 4)];
    const { ledger, run } = setup({ frames }, { minAllKnownScrolls: 20, allKnownPadding: 0 });

    const outcome = await run();

    expect(outcome.stopReason).toBe('end-of-feed');
    expect(outcome.newRecords).toBe(4);
    expect(outcome.iterations).toBe(16);
    expect(ledger.records.map((r) => r.url)).toEqual([
      'https://medium.com/p/0',
      'https://medium.com/p/1',
      'https://medium.com/p/2',
      'https://medium.com/p/3',
    ]);
  });

  test('stops with no-content when nothing recognizable renders', async () => {
    const unusable = [articleNode({ title: 'Missing link one' }), articleNode({ title: 'Missing link two' })];
    const { run } = setup({ frames: [unusable] });

    const outcome = await run();

    expect(outcome.stopReason).toBe('no-content');
    expect(outcome.iterations).toBe(5);
    expect(outcome.failed).toBe(10);
    expect(outcome.state.noGrowthStreak).toBe(4);
  });

  test('stops at the scroll attempt ceiling', async () => {
    const frames = Array.from({ length: 10 }, (_, i) => nodes(0, (i + 1) * 2));
    const { run } = setup({ frames }, { maxScrollAttempts: 3 });

    const outcome = await run();

    expect(outcome.stopReason).toBe('max-attempts');
    expect(outcome.iterations).toBe(4);
    expect(outcome.scrollAttempts).toBe(3);
    expect(outcome.newRecords).toBe(8);
  });

  test('skips extraction for nodes whose URL is already known', async () => {
    const seeded = ArticleLedger.fromRecords([seededRecord(0)], { titlePlaceholder: 'No title' });
    const { run } = setup({ frames: [nodes(0, 2)] }, { maxNoGrowthScrolls: 1 }, seeded);
    const extractSpy = vi.spyOn(FieldExtractor.prototype, 'extract');

    const outcome = await run();

    // Pass 1 extracts only /p/1; pass 2 sees both as known and stops
    expect(extractSpy).toHaveBeenCalledTimes(1);
    expect(outcome.newRecords).toBe(1);
    extractSpy.mockRestore();
  });

  test('counts a fingerprint duplicate under a new URL as known', async () => {
    const seeded = ArticleLedger.fromRecords([seededRecord(7)], { titlePlaceholder: 'No title' });
    const twin = articleNode({ url: '/p/7-copy', title: 'Article number 7', author: 'Author 7' });
    const { run } = setup({ frames: [[twin]] }, { maxNoGrowthScrolls: 2 }, seeded);

    const outcome = await run();

    expect(outcome.newRecords).toBe(0);
    expect(outcome.iterations).toBe(3);
    expect(outcome.state.allKnownStreak).toBe(3);
    expect(outcome.state.emptyStreak).toBe(0);
  });

  test('fast scroll jumps by the configured distance', async () => {
    const { driver, run } = setup({ frames: [nodes(0, 2)] }, { maxNoGrowthScrolls: 2 });

    await run();

    // Scroll 1 is to the bottom; scroll 2 starts at offset 1000 and jumps 2000
    expect(driver.scripts).toContain('window.scrollTo(0, 3000)');
    expect(driver.fastScrolls).toBe(1);
  });

  test('settles for a random delay within range after a fast scroll', async () => {
    const wait = vi.fn(async (_ms: number) => {});
    const { driver, run } = setup({ frames: [nodes(0, 2)] }, { maxNoGrowthScrolls: 2, fastScrollDelayRangeMs: [400, 800] });

    await run({ wait, random: () => 0.5 });

    expect(driver.fastScrolls).toBe(1);
    expect(wait.mock.calls.filter(([ms]) => ms === 600)).toHaveLength(1);
  });

  test('releases every node handle it reads', async () => {
    const seeded = ArticleLedger.fromRecords([seededRecord(0)], { titlePlaceholder: 'No title' });
    const { driver, run } = setup(
      { frames: [nodes(0, 3), nodes(0, 4)], loadingPasses: 1 },
      { maxNoGrowthScrolls: 1, loadingTimeoutMs: 1000 },
      seeded
    );

    await run();

    expect(driver.handedOut).toBeGreaterThan(0);
    expect(driver.released).toBe(driver.handedOut);
  });

  test('checkpoints on new records and snapshots on each save interval', async () => {
    const frames = [nodes(0, 2), nodes(0, 4), nodes(0, 6)];
    const persistence = { checkpoint: vi.fn(async () => {}), snapshot: vi.fn(async () => {}) };
    const { run } = setup({ frames }, { saveInterval: 3 });

    const outcome = await run({ persistence });

    expect(outcome.newRecords).toBe(6);
    expect(persistence.checkpoint).toHaveBeenCalledTimes(3);
    expect(persistence.snapshot).toHaveBeenCalledTimes(2);
  });

  test('keeps scrolling when a checkpoint hook throws', async () => {
    const persistence = {
      checkpoint: vi.fn(async () => {
        throw new Error('disk full');
      }),
      snapshot: vi.fn(async () => {}),
    };
    const { run } = setup({ frames: [nodes(0, 2), nodes(0, 4)] }, { maxNoGrowthScrolls: 1 });

    const outcome = await run({ persistence });

    expect(outcome.stopReason).toBe('end-of-feed');
    expect(outcome.newRecords).toBe(4);
    expect(persistence.checkpoint).toHaveBeenCalledTimes(2);
  });

  test('returns interrupted once the signal aborts', async () => {
    const controller = new AbortController();
    const frames = [nodes(0, 2), nodes(0, 4), nodes(0, 6)];
    const { ledger, run } = setup({ frames, onScroll: () => controller.abort() });

    const outcome = await run({ signal: controller.signal });

    expect(outcome.stopReason).toBe('interrupted');
    expect(outcome.possiblyIncomplete).toBe(true);
    expect(outcome.iterations).toBe(1);
    expect(ledger.size).toBe(2);
  });

  test('polls loading indicators until they clear', async () => {
    const wait = vi.fn(async (_ms: number) => {});
    const { run } = setup(
      { frames: [nodes(0, 1)], loadingPasses: 2 },
      { maxNoGrowthScrolls: 1, loadingTimeoutMs: 1000, loadingPollMs: 100 }
    );

    await run({ wait });

    expect(wait.mock.calls.filter(([ms]) => ms === 100)).toHaveLength(2);
  });
});
