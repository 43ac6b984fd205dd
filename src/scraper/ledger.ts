/**
 * Dedup/Merge Ledger
 *
 * Tracks every captured article by URL and content fingerprint, and owns the
 * ordered result list those identities refer to. Both only ever grow, and a
 * URL is in the ledger exactly when a record with that URL is in the list.
 */

import { articleFingerprint } from '../utils/parsers.js';
import type { ArticleRecord } from '../types/index.js';

export interface LedgerOptions {
  /** Records carrying this title get no fingerprint */
  titlePlaceholder?: string;
}

export class ArticleLedger {
  private readonly urlSet = new Set<string>();
  private readonly fingerprintSet = new Set<string>();
  private readonly list: ArticleRecord[] = [];
  private readonly titlePlaceholder: string | undefined;

  constructor(options: LedgerOptions = {}) {
    this.titlePlaceholder = options.titlePlaceholder;
  }

  /**
   * Rebuild a ledger from previously captured records (e.g. a checkpoint)
   */
  static fromRecords(records: readonly ArticleRecord[], options: LedgerOptions = {}): ArticleLedger {
    const ledger = new ArticleLedger(options);
    ledger.merge(records);
    return ledger;
  }

  get size(): number {
    return this.list.length;
  }

  get records(): readonly ArticleRecord[] {
    return this.list;
  }

  get urls(): ReadonlySet<string> {
    return this.urlSet;
  }

  known(url: string): boolean {
    return this.urlSet.has(url);
  }

  knownFingerprint(fingerprint: string): boolean {
    return this.fingerprintSet.has(fingerprint);
  }

  fingerprintOf(record: ArticleRecord): string | null {
    if (this.titlePlaceholder !== undefined && record.title === this.titlePlaceholder) {
      return null;
    }
    return articleFingerprint(record.title, record.author);
  }

  /**
   * Add a single record. Returns false when its URL or fingerprint is
   * already known, in which case nothing changes.
   */
  record(article: ArticleRecord): boolean {
    if (this.urlSet.has(article.url)) {
      return false;
    }

    const fingerprint = this.fingerprintOf(article);
    if (fingerprint !== null && this.fingerprintSet.has(fingerprint)) {
      return false;
    }

    this.urlSet.add(article.url);
    if (fingerprint !== null) {
      this.fingerprintSet.add(fingerprint);
    }
    this.list.push(article);
    return true;
  }

  /**
   * Append the unknown records of a batch, in batch order
   * @returns the records that were new
   */
  merge(batch: readonly ArticleRecord[]): ArticleRecord[] {
    return batch.filter((article) => this.record(article));
  }
}
