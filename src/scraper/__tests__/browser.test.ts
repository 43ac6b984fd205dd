import { describe, test, expect, vi, beforeEach } from 'vitest';

const browserState = vi.hoisted(() => {
  const launches: Array<Record<string, unknown>> = [];
  const counts = { pageClosed: 0, contextClosed: 0, browserClosed: 0, disposed: 0 };
  const handles = [
    {
      dispose: async () => {
        counts.disposed++;
      },
    },
    {
      dispose: async () => {
        counts.disposed++;
        throw new Error('Target closed');
      },
    },
  ];
  const page = {
    $$: async () => handles,
    route: async () => {},
    close: async () => {
      counts.pageClosed++;
    },
  };
  const context = {
    setDefaultTimeout: () => {},
    newPage: async () => page,
    close: async () => {
      counts.contextClosed++;
    },
  };
  const browser = {
    newContext: async () => context,
    close: async () => {
      counts.browserClosed++;
    },
  };
  return { launches, counts, browser };
});

vi.mock('playwright', () => {
  const engine = {
    launch: async (options: Record<string, unknown>) => {
      browserState.launches.push(options);
      return browserState.browser;
    },
  };
  return { chromium: engine, firefox: engine, webkit: engine };
});

import { PlaywrightDriver } from '../browser.js';

beforeEach(() => {
  browserState.launches.length = 0;
  browserState.counts.pageClosed = 0;
  browserState.counts.contextClosed = 0;
  browserState.counts.browserClosed = 0;
  browserState.counts.disposed = 0;
});

describe('PlaywrightDriver.launch', () => {
  test('leaves SIGINT, SIGTERM and SIGHUP to the application', async () => {
    await PlaywrightDriver.launch({ engine: 'firefox', headless: true });

    expect(browserState.launches).toHaveLength(1);
    expect(browserState.launches[0]).toMatchObject({
      headless: true,
      handleSIGINT: false,
      handleSIGTERM: false,
      handleSIGHUP: false,
      args: [],
    });
  });

  test('passes container flags to chromium only', async () => {
    await PlaywrightDriver.launch({ engine: 'chromium', headless: true });

    expect(browserState.launches[0]?.['args']).toEqual([
      '--no-sandbox',
      '--disable-setuid-sandbox',
      '--disable-dev-shm-usage',
    ]);
  });
});

describe('PlaywrightDriver.close', () => {
  test('closes page, context and browser once', async () => {
    const driver = await PlaywrightDriver.launch({ engine: 'webkit', headless: true });

    await driver.close();
    await driver.close();

    expect(browserState.counts).toMatchObject({ pageClosed: 1, contextClosed: 1, browserClosed: 1 });
  });
});

describe('PlaywrightDriver.release', () => {
  test('disposes every handle even when one is already detached', async () => {
    const driver = await PlaywrightDriver.launch({ engine: 'firefox', headless: true });
    const nodes = await driver.querySelectorAll('article');

    await expect(driver.release(nodes)).resolves.toBeUndefined();
    expect(browserState.counts.disposed).toBe(2);
  });
});
