/**
 * Pure parsing helpers for feed text: counts, dates, URLs and free text
 */

import { createHash } from 'crypto';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parse a count such as "1.2K", "5M" or "1,234". Returns 0 on anything
 * unparseable.
 */
export function parseNumber(text: string | null | undefined): number {
  if (!text) {
    return 0;
  }

  const cleaned = text.toUpperCase().replace(/[^\d.KM]/g, '');
  if (!cleaned) {
    return 0;
  }

  let multiplier = 1;
  let numeric = cleaned;
  if (cleaned.includes('K')) {
    multiplier = 1_000;
    numeric = cleaned.replaceAll('K', '');
  } else if (cleaned.includes('M')) {
    multiplier = 1_000_000;
    numeric = cleaned.replaceAll('M', '');
  }

  if (!numeric) {
    return 0;
  }

  const value = Number(numeric);
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.trunc(value * multiplier));
}

/**
 * Parse the clap count out of the combined "date\nclaps\nresponses" block.
 *
 * Exactly three lines with an all-digit middle line: the middle line is the
 * clap count. Anything else falls back to the largest number >= 10 in the
 * text, or 0.
 */
export function parseClaps(text: string | null | undefined): number {
  if (!text) {
    return 0;
  }

  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const middle = lines[1];
  if (lines.length === 3 && middle !== undefined && /^\d+$/.test(middle)) {
    return parseInt(middle, 10);
  }

  const candidates = (text.match(/\d+/g) ?? [])
    .map((match) => parseInt(match, 10))
    .filter((value) => value >= 10);

  return candidates.length > 0 ? Math.max(...candidates) : 0;
}

const ELLIPSIS = '...';

/**
 * Collapse whitespace and optionally truncate at a word boundary. A truncated
 * result, ellipsis included, is never longer than `maxLength`.
 */
export function cleanText(text: string | null | undefined, maxLength?: number): string {
  if (!text) {
    return '';
  }

  const cleaned = text.split(/\s+/).filter(Boolean).join(' ');

  if (maxLength === undefined || cleaned.length <= maxLength) {
    return cleaned;
  }
  if (maxLength <= ELLIPSIS.length) {
    return cleaned.slice(0, maxLength);
  }

  const head = cleaned.slice(0, maxLength - ELLIPSIS.length);
  const lastSpace = head.lastIndexOf(' ');
  return (lastSpace > 0 ? head.slice(0, lastSpace) : head) + ELLIPSIS;
}

/**
 * Resolve a link value against the site origin.
 *
 * "//host/x" gets https, "/path" joins the origin, absolute http(s) URLs pass
 * through untouched and anything else resolves as a relative URL.
 */
export function normalizeUrl(value: string | null | undefined, baseUrl: string): string {
  if (!value) {
    return '';
  }

  const url = value.trim();
  if (!url) {
    return '';
  }

  if (url.startsWith('//')) {
    return `https:${url}`;
  }

  if (/^https?:\/\//i.test(url)) {
    return url;
  }

  try {
    return new URL(url, baseUrl).toString();
  } catch {
    return '';
  }
}

/**
 * True for absolute http(s) URLs with a host
 */
export function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.host.length > 0;
  } catch {
    return false;
  }
}

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const RELATIVE_PATTERNS: Array<[RegExp, number]> = [
  [/(\d+)\s*(?:mo|months?)\s+ago/, 30 * DAY_MS],
  [/(\d+)\s*(?:w|weeks?)\s+ago/, 7 * DAY_MS],
  [/(\d+)\s*(?:d|days?)\s+ago/, DAY_MS],
  [/(\d+)\s*(?:h|hrs?|hours?)\s+ago/, 60 * 60 * 1000],
  [/(\d+)\s*(?:m|mins?|minutes?)\s+ago/, 60 * 1000],
];

function monthIndex(name: string): number {
  const lower = name.toLowerCase();
  if (lower === 'sept') {
    return 8;
  }
  // Full name or its three-letter abbreviation only
  return MONTHS.findIndex((month) => month === lower || month.slice(0, 3) === lower);
}

function utcDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month, day));
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString();
}

/**
 * Parse the feed's date text into ISO-8601. Relative forms ("3 days ago",
 * "2d ago", "yesterday") resolve against `now`. Unrecognized text comes back
 * trimmed but otherwise untouched.
 */
export function parseSourceDate(text: string | null | undefined, now: Date = new Date()): string {
  if (!text) {
    return '';
  }

  const raw = text.trim();
  const lower = raw.toLowerCase();

  for (const [pattern, unitMs] of RELATIVE_PATTERNS) {
    const match = lower.match(pattern);
    if (match?.[1]) {
      return new Date(now.getTime() - parseInt(match[1], 10) * unitMs).toISOString();
    }
  }

  if (/\byesterday\b/.test(lower)) {
    return new Date(now.getTime() - DAY_MS).toISOString();
  }
  if (/\b(today|now)\b/.test(lower)) {
    return now.toISOString();
  }

  // 2024-06-24
  const isoDay = raw.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (isoDay) {
    const [, y, m, d] = isoDay;
    return utcDate(Number(y), Number(m) - 1, Number(d)) ?? raw;
  }

  // 2024-06-24T10:00:00.000Z, 2024-06-24T10:00:00+02:00
  if (/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/.test(raw)) {
    const parsed = new Date(raw);
    return Number.isNaN(parsed.getTime()) ? raw : parsed.toISOString();
  }

  // June 24, 2024 / Jun 24 2024 / Jun 24
  const monthDay = raw.match(/^([A-Za-z]+)\.?\s+(\d{1,2}),?(?:\s+(\d{4}))?$/);
  if (monthDay) {
    const [, name = '', day, year] = monthDay;
    const month = monthIndex(name);
    if (month !== -1) {
      if (year) {
        return utcDate(Number(year), month, Number(day)) ?? raw;
      }
      // Without a year the feed means the most recent such day, never a future one
      const thisYear = utcDate(now.getUTCFullYear(), month, Number(day));
      if (thisYear !== null && Date.parse(thisYear) > now.getTime()) {
        return utcDate(now.getUTCFullYear() - 1, month, Number(day)) ?? raw;
      }
      return thisYear ?? raw;
    }
    return raw;
  }

  if (/^\d{4}$/.test(raw)) {
    return utcDate(Number(raw), 0, 1) ?? raw;
  }

  return raw;
}

/**
 * Content fingerprint used to catch the same article under a different URL
 */
export function articleFingerprint(title: string, author: string): string {
  const normalize = (value: string): string => value.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
  return createHash('sha256')
    .update(`${normalize(title)}|${normalize(author)}`)
    .digest('hex')
    .slice(0, 16);
}

/**
 * Human-readable duration
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(1)} seconds`;
  }
  if (seconds < 3600) {
    return `${(seconds / 60).toFixed(1)} minutes`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
}
