/**
 * Page driver abstraction
 *
 * Everything the extraction engine needs from a browser, expressed over an
 * opaque node handle. The Playwright implementation lives in browser.ts;
 * tests use an in-memory driver.
 */

export interface PageDriver<TNode = unknown> {
  /**
   * Navigate to a URL
   * @returns HTTP status of the main document, or null when none was received
   */
  navigate(url: string, timeoutMs?: number): Promise<number | null>;

  querySelectorAll(selector: string): Promise<TNode[]>;

  /**
   * First descendant of `node` matching `selector`
   */
  querySelector(node: TNode, selector: string): Promise<TNode | null>;

  getAttribute(node: TNode, name: string): Promise<string | null>;

  innerText(node: TNode): Promise<string>;

  /**
   * Evaluate a script expression in the page and return its value
   */
  evaluateScript(script: string): Promise<unknown>;

  /**
   * Resolve once `selector` matches; reject after `timeoutMs`
   */
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;

  /**
   * Hand node handles back once they have been read. Handles from
   * `querySelectorAll` and `querySelector` stay alive in the page until
   * released.
   */
  release(nodes: readonly TNode[]): Promise<void>;

  close(): Promise<void>;
}

/**
 * Page scripts used by the scroll engine
 */
export const PAGE_SCRIPTS = {
  scrollHeight: 'document.body.scrollHeight',
  scrollOffset: 'window.pageYOffset',
  scrollToBottom: 'window.scrollTo(0, document.body.scrollHeight)',
  scrollTo: (y: number): string => `window.scrollTo(0, ${Math.round(y)})`,
} as const;
