/**
 * Scraper error types
 */

/**
 * The listing page could not be opened: non-200 status, timeout, or the
 * article container never rendered.
 */
export class NavigationError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, status: number | null, message?: string, options?: { cause?: unknown }) {
    super(message ?? `Failed to load ${url} (status: ${status ?? 'none'})`, options);
    this.name = 'NavigationError';
    this.url = url;
    this.status = status;
  }
}

export function isNavigationError(error: unknown): error is NavigationError {
  return error instanceof NavigationError;
}

/**
 * Worth another attempt: no response, a page that loaded without articles,
 * throttling or a server error. Other 4xx answers (a deleted or private list)
 * will not change on retry.
 */
export function isRetryableNavigation(error: unknown): boolean {
  if (!isNavigationError(error)) {
    return false;
  }
  const { status } = error;
  return status === null || status === 200 || status === 429 || status >= 500;
}
