#!/usr/bin/env node
/**
 * Feed Harvester
 *
 * Extracts every article from an infinitely scrolling reading list and keeps
 * a resumable checkpoint next to timestamped JSON/CSV snapshots.
 *
 * Usage:
 *   node dist/index.js                      - Scrape MEDIUM_LIST_URL, resuming from checkpoint
 *   node dist/index.js --url=<list url>     - Scrape another list
 *   node dist/index.js --fresh              - Ignore the existing checkpoint
 *   node dist/index.js --headless           - Force headless browser
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { runSession } from './session.js';

// Parse command line arguments
const args = process.argv.slice(2);
const urlArg = args.find((a) => a.startsWith('--url='));
const listUrl = urlArg ? urlArg.slice('--url='.length) : config.target.listUrl;
const resume = !args.includes('--fresh');
const headless = args.includes('--headless') ? true : undefined;

function printUsage(): void {
  logger.info('Usage: feed-harvester [--url=<list url>] [--fresh] [--headless]');
}

async function main(): Promise<void> {
  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    return;
  }

  logger.info('');
  logger.info('╔═══════════════════════════════════════════════════╗');
  logger.info('║               Feed Harvester                      ║');
  logger.info('╚═══════════════════════════════════════════════════╝');
  logger.info('');
  logger.info({ env: config.app.env, listUrl, resume }, 'Starting application');

  const controller = new AbortController();
  let interrupts = 0;

  // First signal stops the scroll loop and lets the session save; a second one forces exit
  const interrupt = (signal: NodeJS.Signals): void => {
    interrupts++;
    if (interrupts > 1) {
      logger.fatal({ signal }, 'Forced exit before final save completed');
      process.exit(130);
    }
    logger.warn({ signal }, 'Interrupt received, finishing current pass and saving progress...');
    controller.abort();
  };

  process.on('SIGINT', interrupt);
  process.on('SIGTERM', interrupt);

  const result = await runSession({ listUrl, resume, headless, signal: controller.signal });

  logger.info('');
  logger.info('Session Summary:');
  logger.info(`  ✓ Total:      ${result.records.length} articles`);
  logger.info(`  ✓ New:        ${result.newRecords} articles`);
  logger.info(`  ✓ Stopped:    ${result.stopReason}${result.possiblyIncomplete ? ' (may be incomplete)' : ''}`);
  logger.info(`  📁 Output:    ${result.outputDir}`);
  if (result.summaryPath) {
    logger.info(`  📄 Summary:   ${result.summaryPath}`);
  }
  logger.info(`  ⏱ Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);

  if (result.stopReason === 'interrupted') {
    logger.info('Progress has been saved and can be resumed');
  }

  if (result.stopReason === 'navigation-failed') {
    logger.error('Could not open the list; resume later from the saved checkpoint');
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exitCode = 1;
});
