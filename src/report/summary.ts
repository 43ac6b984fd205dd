/**
 * Run summary report
 */

import type { ArticleRecord, StopReason } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { formatDuration } from '../utils/parsers.js';
import { fileTimestamp, writeNewFile } from '../storage/files.js';

export interface RankedEntry {
  name: string;
  count: number;
}

export interface ScrapeStats {
  totalArticles: number;
  uniqueAuthors: number;
  uniquePublications: number;
  totalClaps: number;
  totalResponses: number;
  avgClaps: number;
  avgResponses: number;
  topAuthors: RankedEntry[];
  topPublications: RankedEntry[];
  topArticles: ArticleRecord[];
}

/**
 * How the run ended, reported alongside the stats
 */
export interface RunOutcome {
  stopReason: StopReason;
  possiblyIncomplete: boolean;
}

const TOP_N = 10;

function rank(values: readonly string[]): RankedEntry[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    if (value) {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
  }
  // Stable sort keeps first-seen order among ties
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, TOP_N);
}

export function computeStats(records: readonly ArticleRecord[]): ScrapeStats {
  const totalArticles = records.length;
  const totalClaps = records.reduce((sum, record) => sum + record.claps, 0);
  const totalResponses = records.reduce((sum, record) => sum + record.responses, 0);

  return {
    totalArticles,
    uniqueAuthors: new Set(records.map((r) => r.author).filter(Boolean)).size,
    uniquePublications: new Set(records.map((r) => r.publication).filter(Boolean)).size,
    totalClaps,
    totalResponses,
    avgClaps: totalArticles > 0 ? totalClaps / totalArticles : 0,
    avgResponses: totalArticles > 0 ? totalResponses / totalArticles : 0,
    topAuthors: rank(records.map((r) => r.author)),
    topPublications: rank(records.map((r) => r.publication)),
    topArticles: [...records].sort((a, b) => b.claps - a.claps).slice(0, TOP_N),
  };
}

const numberFormat = new Intl.NumberFormat('en-US');

function rankedLines(entries: readonly RankedEntry[]): string[] {
  return entries.map(({ name, count }) => `${name}: ${count} articles`);
}

export function formatSummary(stats: ScrapeStats, elapsedMs: number, outcome: RunOutcome): string {
  const hours = elapsedMs / 3_600_000;
  const perHour = hours > 0 ? stats.totalArticles / hours : 0;

  const lines = [
    '=== SCRAPING SUMMARY ===',
    `Total Articles Extracted: ${stats.totalArticles}`,
    `Unique Authors: ${stats.uniqueAuthors}`,
    `Unique Publications: ${stats.uniquePublications}`,
    `Total Claps: ${numberFormat.format(stats.totalClaps)}`,
    `Average Claps per Article: ${stats.avgClaps.toFixed(1)}`,
    `Total Responses: ${numberFormat.format(stats.totalResponses)}`,
    `Average Responses per Article: ${stats.avgResponses.toFixed(1)}`,
    `Execution Time: ${formatDuration(elapsedMs / 1000)}`,
    `Average Articles per Hour: ${perHour.toFixed(1)}`,
    `Stop Reason: ${outcome.stopReason}${outcome.possiblyIncomplete ? ' (possibly incomplete)' : ''}`,
    '',
    '=== TOP AUTHORS BY ARTICLE COUNT ===',
    ...rankedLines(stats.topAuthors),
    '',
    '=== TOP PUBLICATIONS BY ARTICLE COUNT ===',
    ...rankedLines(stats.topPublications),
    '',
    '=== TOP ARTICLES BY CLAPS ===',
    ...stats.topArticles.map((article) => {
      const title = article.title.length > 60 ? `${article.title.slice(0, 60)}...` : article.title;
      return `${numberFormat.format(article.claps)} claps - ${title}`;
    }),
  ];

  return lines.join('\n') + '\n';
}

/**
 * Write the summary report next to the other artifacts
 * @returns the file path, or null when writing failed
 */
export async function writeSummary(
  outputDir: string,
  prefix: string,
  text: string,
  now: Date = new Date()
): Promise<string | null> {
  try {
    return await writeNewFile(outputDir, `${prefix}_${fileTimestamp(now)}`, '.txt', text);
  } catch (error) {
    logger.error({ error, dir: outputDir }, 'Failed to write summary report');
    return null;
  }
}
