/**
 * Progress snapshots
 *
 * Timestamped JSON and CSV copies of the record list for inspection while a
 * run is in progress. Never overwritten and never read back for resume.
 */

import { ARTICLE_COLUMNS } from '../types/index.js';
import type { ArticleRecord } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { toCsv } from './csv.js';
import { fileTimestamp, writeNewFile } from './files.js';

export interface ProgressFiles {
  json: string;
  csv: string;
}

export class ProgressWriter {
  constructor(
    private readonly outputDir: string,
    private readonly prefix: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Write both snapshot files. Failures are logged and yield null.
   */
  async write(records: readonly ArticleRecord[]): Promise<ProgressFiles | null> {
    if (records.length === 0) {
      return null;
    }

    const base = `${this.prefix}_${fileTimestamp(this.now())}`;
    logger.info({ articles: records.length }, 'Saving progress');

    try {
      const json = await writeNewFile(this.outputDir, base, '.json', JSON.stringify(records, null, 2));
      const csv = await writeNewFile(this.outputDir, base, '.csv', toCsv(records, ARTICLE_COLUMNS));
      logger.info({ json, csv }, 'Progress saved');
      return { json, csv };
    } catch (error) {
      logger.error({ error, dir: this.outputDir }, 'Failed to save progress snapshot');
      return null;
    }
  }
}
