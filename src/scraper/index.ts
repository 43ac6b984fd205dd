/**
 * Scraper Module
 *
 * Exports the page driver, field extraction, the article ledger and the
 * scroll-extraction loop
 */

// Page driver
export { PAGE_SCRIPTS, type PageDriver } from './driver.js';
export { PlaywrightDriver, type PlaywrightNode, type BrowserEngine, type BrowserOptions } from './browser.js';
export { NavigationError, isNavigationError, isRetryableNavigation } from './errors.js';

// Extraction
export {
  FieldExtractor,
  isValidRecord,
  type ExtractionResult,
  type ExtractionFailure,
  type FieldExtractorOptions,
  type TitleBounds,
} from './field-extractor.js';

// Deduplication
export { ArticleLedger, type LedgerOptions } from './ledger.js';

// Scroll loop
export {
  runScrollLoop,
  allKnownLimit,
  advanceProgress,
  evaluateStop,
  initialProgressState,
  type ScrollLoopConfig,
  type ScrollLoopDeps,
  type ScrollOutcome,
  type ScrollPersistence,
  type ScrollProgressState,
  type IterationStats,
  type StopLimits,
  type LoopStopReason,
} from './scroll-loop.js';
