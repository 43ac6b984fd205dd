/**
 * Site profile for the listing feed: selectors, loading indicators and
 * browser fingerprint values.
 *
 * Every field selector is a list of candidates tried in order; the first one
 * that matches inside an article node wins. Older markup variants stay at the
 * end of each list.
 */

export const SELECTORS = {
  articleContainer: 'article',

  title: ['h2', 'h3[data-testid="card-title"]', '[data-testid="post-preview-title"]', '.graf--title'],

  snippet: [
    'h3:not([data-testid="card-title"])',
    'p[data-testid="card-description"]',
    '.graf--p',
    '.postPreview-excerpt',
  ],

  author: ['a[href*="@"]', 'a[data-testid="authorName"]', '.postMetaInline-authorLockup a'],

  publication: [
    'a[href*="medium.com/"]:not([href*="@"])',
    '[data-testid="publication-name"]',
    '.postMetaInline-authorLockup .link',
  ],

  date: ['time', '[data-testid="storyPublishDate"]', '.postMetaInline time'],

  // The `.l` block renders "date\nclaps\nresponses" as one element
  claps: ['[data-testid="clapCount"]', '.l'],

  responses: ['[data-testid="responsesCount"]', '.pw-responses'],

  linkContainer: '[data-href]',
  linkAttribute: 'data-href',

  loadingIndicators: [
    '[data-testid="loading"]',
    '.loading',
    '.spinner',
    '[aria-label*="Loading"]',
    '.js-loadingIndicator',
  ],
} as const;

export type SelectorProfile = {
  readonly articleContainer: string;
  readonly title: readonly string[];
  readonly snippet: readonly string[];
  readonly author: readonly string[];
  readonly publication: readonly string[];
  readonly date: readonly string[];
  readonly claps: readonly string[];
  readonly responses: readonly string[];
  readonly linkContainer: string;
  readonly linkAttribute: string;
  readonly loadingIndicators: readonly string[];
};

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:121.0) Gecko/20100101 Firefox/121.0',
] as const;

export const HTTP_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  DNT: '1',
  'Upgrade-Insecure-Requests': '1',
  'Sec-Fetch-Dest': 'document',
  'Sec-Fetch-Mode': 'navigate',
  'Sec-Fetch-Site': 'none',
  'Cache-Control': 'max-age=0',
};
