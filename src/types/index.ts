/**
 * Core types for Feed Harvester
 */

/**
 * One article captured from the feed. Never mutated after creation.
 */
export interface ArticleRecord {
  readonly title: string;
  readonly snippet: string;
  readonly author: string;
  readonly publication: string;
  /** ISO-8601 where the source date could be parsed, raw text otherwise */
  readonly date: string;
  readonly claps: number;
  readonly responses: number;
  readonly url: string;
  readonly extracted_at: string;
}

/**
 * Column order shared by CSV snapshots and the checkpoint's record shape
 */
export const ARTICLE_COLUMNS = [
  'title',
  'snippet',
  'author',
  'publication',
  'date',
  'claps',
  'responses',
  'url',
  'extracted_at',
] as const satisfies ReadonlyArray<keyof ArticleRecord>;

/**
 * Why the scroll loop stopped
 */
export type StopReason =
  | 'end-of-feed'
  | 'no-content'
  | 'scroll-limit'
  | 'max-attempts'
  | 'interrupted'
  | 'navigation-failed'
  | 'error';

export interface SessionResult {
  records: readonly ArticleRecord[];
  initialCount: number;
  newRecords: number;
  stopReason: StopReason;
  possiblyIncomplete: boolean;
  durationMs: number;
  outputDir: string;
  summaryPath: string | null;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
