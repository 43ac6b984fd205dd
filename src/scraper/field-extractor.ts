/**
 * Field Extractor
 *
 * Turns one rendered article node into an ArticleRecord. Missing fields come
 * back empty; only an exception while reading the node fails the record.
 */

import type { SelectorProfile } from '../config/index.js';
import { logger } from '../utils/logger.js';
import {
  cleanText,
  isAbsoluteHttpUrl,
  normalizeUrl,
  parseClaps,
  parseNumber,
  parseSourceDate,
} from '../utils/parsers.js';
import type { ArticleRecord } from '../types/index.js';
import type { PageDriver } from './driver.js';

export interface ExtractionFailure {
  ok: false;
  error: string;
}

export type ExtractionResult = { ok: true; record: ArticleRecord } | ExtractionFailure;

export interface FieldExtractorOptions {
  siteOrigin: string;
  maxSnippetLength: number;
  titlePlaceholder: string;
  now?: () => Date;
}

export interface TitleBounds {
  minTitleLength: number;
  maxTitleLength: number;
}

export class FieldExtractor<TNode> {
  private readonly now: () => Date;

  constructor(
    private readonly driver: PageDriver<TNode>,
    private readonly selectors: SelectorProfile,
    private readonly options: FieldExtractorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Read only the article link. Returns null when the node has none, in which
   * case the caller has to run the full extraction to learn the URL.
   */
  async probeUrl(node: TNode): Promise<string | null> {
    const href = await this.withMatch(
      node,
      [this.selectors.linkContainer],
      (container) => this.driver.getAttribute(container, this.selectors.linkAttribute),
      null
    );
    return normalizeUrl(href, this.options.siteOrigin) || null;
  }

  async extract(node: TNode): Promise<ExtractionResult> {
    try {
      const titleText = await this.textOf(node, this.selectors.title);
      const title = cleanText(titleText) || this.options.titlePlaceholder;
      const snippet = cleanText(await this.textOf(node, this.selectors.snippet), this.options.maxSnippetLength);
      const author = await this.readAuthor(node);
      const publication = cleanText(await this.textOf(node, this.selectors.publication));
      const date = await this.readDate(node);

      const claps = parseClaps(await this.textOf(node, this.selectors.claps));
      const responses = parseNumber(await this.textOf(node, this.selectors.responses));

      const url = (await this.probeUrl(node)) ?? '';

      const record: ArticleRecord = Object.freeze({
        title,
        snippet,
        author,
        publication,
        date,
        claps,
        responses,
        url,
        extracted_at: this.now().toISOString(),
      });

      return { ok: true, record };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ error: message }, 'Failed to extract article data');
      return { ok: false, error: message };
    }
  }

  private async firstMatch(node: TNode, candidates: readonly string[]): Promise<TNode | null> {
    for (const selector of candidates) {
      const match = await this.driver.querySelector(node, selector);
      if (match) {
        return match;
      }
    }
    return null;
  }

  /**
   * Read the first matching descendant, then release its handle
   */
  private async withMatch<T>(
    node: TNode,
    candidates: readonly string[],
    read: (match: TNode) => Promise<T>,
    fallback: T
  ): Promise<T> {
    const match = await this.firstMatch(node, candidates);
    if (match === null) {
      return fallback;
    }
    try {
      return await read(match);
    } finally {
      await this.driver.release([match]);
    }
  }

  private textOf(node: TNode, candidates: readonly string[]): Promise<string> {
    return this.withMatch(node, candidates, async (match) => (await this.driver.innerText(match)).trim(), '');
  }

  private readAuthor(node: TNode): Promise<string> {
    return this.withMatch(
      node,
      this.selectors.author,
      async (link) => {
        const text = (await this.driver.innerText(link)).trim();
        const href = (await this.driver.getAttribute(link, 'href')) ?? '';

        // Non-profile links carry extra lines (follower counts, badges)
        const name = href.includes('@') ? text : (text.split('\n')[0] ?? '');
        return cleanText(name);
      },
      ''
    );
  }

  private readDate(node: TNode): Promise<string> {
    return this.withMatch(
      node,
      this.selectors.date,
      async (dateNode) => {
        const datetime = await this.driver.getAttribute(dateNode, 'datetime');
        const text = datetime || (await this.driver.innerText(dateNode));
        return parseSourceDate(text, this.now());
      },
      ''
    );
  }
}

/**
 * Records outside the title bounds or without an absolute URL are dropped
 * before they reach the ledger.
 */
export function isValidRecord(record: ArticleRecord, bounds: TitleBounds): boolean {
  const titleLength = record.title.trim().length;
  if (titleLength < bounds.minTitleLength || titleLength > bounds.maxTitleLength) {
    return false;
  }
  return isAbsoluteHttpUrl(record.url);
}
