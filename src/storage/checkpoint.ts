/**
 * Checkpoint Manager
 *
 * One JSON artifact holding the ledger's URL set and the full ordered record
 * list, replaced atomically on every save. A missing or unreadable
 * checkpoint is treated as a fresh start.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { ArticleLedger } from '../scraper/ledger.js';
import type { LedgerOptions } from '../scraper/ledger.js';
import type { ArticleRecord } from '../types/index.js';
import { writeFileAtomic } from './files.js';

const count = z.number().int().nonnegative();

export const articleRecordSchema = z.object({
  title: z.string(),
  snippet: z.string(),
  author: z.string(),
  publication: z.string(),
  date: z.string(),
  claps: count,
  responses: count,
  url: z.string(),
  extracted_at: z.string(),
});

export const checkpointSchema = z.object({
  timestamp: z.string(),
  total_articles: count,
  scraped_urls: z.array(z.string()),
  articles: z.array(articleRecordSchema),
});

export type CheckpointFile = z.infer<typeof checkpointSchema>;

export interface LoadedCheckpoint {
  timestamp: string;
  records: readonly ArticleRecord[];
  ledger: ArticleLedger;
}

export interface CheckpointManagerOptions extends LedgerOptions {
  now?: () => Date;
}

export class CheckpointManager {
  readonly path: string;
  private readonly now: () => Date;

  constructor(
    outputDir: string,
    fileName: string,
    private readonly options: CheckpointManagerOptions = {}
  ) {
    this.path = join(outputDir, fileName);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Persist records and ledger as one artifact. Failures are logged, never
   * thrown.
   * @returns whether the checkpoint was written
   */
  async save(records: readonly ArticleRecord[], ledger: ArticleLedger): Promise<boolean> {
    const payload: CheckpointFile = {
      timestamp: this.now().toISOString(),
      total_articles: records.length,
      scraped_urls: [...ledger.urls],
      articles: [...records],
    };

    try {
      await writeFileAtomic(this.path, JSON.stringify(payload, null, 2));
      logger.info({ articles: records.length, path: this.path }, 'Checkpoint saved');
      return true;
    } catch (error) {
      logger.error({ error, path: this.path }, 'Failed to save checkpoint');
      return false;
    }
  }

  async load(): Promise<LoadedCheckpoint | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.info({ path: this.path }, 'No checkpoint found, starting fresh');
      } else {
        logger.error({ error, path: this.path }, 'Failed to read checkpoint');
      }
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.error({ error, path: this.path }, 'Checkpoint is not valid JSON, starting fresh');
      return null;
    }

    const parsed = checkpointSchema.safeParse(json);
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues.slice(0, 5), path: this.path }, 'Checkpoint has an unexpected shape, starting fresh');
      return null;
    }

    const { timestamp, articles, scraped_urls } = parsed.data;
    const ledger = ArticleLedger.fromRecords(articles, { titlePlaceholder: this.options.titlePlaceholder });

    if (ledger.size !== articles.length) {
      logger.warn({ stored: articles.length, kept: ledger.size }, 'Dropped duplicate records from checkpoint');
    }

    // The URL list is rebuilt from the records so both stay in step
    const orphanUrls = scraped_urls.filter((url) => !ledger.known(url)).length;
    if (orphanUrls > 0) {
      logger.warn({ orphanUrls }, 'Checkpoint listed URLs without records; they will be extracted again');
    }

    logger.info({ articles: ledger.size, savedAt: timestamp }, 'Loaded checkpoint');
    return { timestamp, records: ledger.records, ledger };
  }
}
