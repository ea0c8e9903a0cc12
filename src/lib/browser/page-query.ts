/**
 * Page Query
 * Result-typed DOM accessors. A query that throws or outlives its timeout
 * is reported, never thrown.
 */

import { toError } from '../scraping/errors';
import type { BrowserPage, PageElement } from './browser.types';

export type QueryResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'absent' | 'timeout' }
  | { ok: false; reason: 'error'; error: Error };

/**
 * Run a DOM query with a timeout. null/undefined values count as absent.
 */
export async function runQuery<T>(
  query: () => Promise<T | null | undefined>,
  timeoutMs: number
): Promise<QueryResult<T>> {
  let timer: NodeJS.Timeout | undefined;

  const settled = query().then(
    (value): QueryResult<T> =>
      value === null || value === undefined ? { ok: false, reason: 'absent' } : { ok: true, value },
    (error: unknown): QueryResult<T> => ({ ok: false, reason: 'error', error: toError(error) })
  );

  const timeout = new Promise<QueryResult<T>>((resolve) => {
    timer = setTimeout(() => resolve({ ok: false, reason: 'timeout' }), timeoutMs);
  });

  try {
    return await Promise.race([settled, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Describe a failed query for logs
 */
export function describeFailure<T>(result: QueryResult<T>): string {
  if (result.ok) return 'ok';
  return result.reason === 'error' ? `error: ${result.error.message}` : result.reason;
}

/**
 * Rendered text of the first element matching the selector
 */
export async function queryText(
  page: BrowserPage,
  selector: string,
  timeoutMs: number
): Promise<QueryResult<string>> {
  return runQuery(async () => {
    const element = await page.querySelector(selector);
    return element ? element.innerText() : null;
  }, timeoutMs);
}

/**
 * All elements matching the selector
 */
export async function queryAll(
  page: BrowserPage,
  selector: string,
  timeoutMs: number
): Promise<QueryResult<PageElement[]>> {
  return runQuery(() => page.querySelectorAll(selector), timeoutMs);
}

export async function readAttribute(
  element: PageElement,
  name: string,
  timeoutMs: number
): Promise<QueryResult<string>> {
  return runQuery(() => element.getAttribute(name), timeoutMs);
}

export async function readText(element: PageElement, timeoutMs: number): Promise<QueryResult<string>> {
  return runQuery(() => element.innerText(), timeoutMs);
}

/**
 * Try strategies in order; the first one that yields a value wins
 */
export async function firstSuccessful<T>(
  strategies: ReadonlyArray<() => Promise<T | null>>
): Promise<T | null> {
  for (const strategy of strategies) {
    const value = await strategy();
    if (value !== null) {
      return value;
    }
  }
  return null;
}
