import { logger } from '../../config/logger.config';
import { TransientNetworkException } from '../../utils/exceptions';
import { PageInfo } from './pulselive.schemas';
import { QueryParams, RequestExecutor } from './pulselive-api-client';

export interface Page {
  items: unknown[];
  pageInfo?: PageInfo | null;
}

export interface PaginateOptions {
  pageSize: number;
  /** Stop once this many items have been collected; the result is truncated to it. */
  limit?: number;
  /** Pull the item array (and optional pageInfo) out of one response body. */
  extract: (body: unknown) => Page;
}

/**
 * A full page is the last one only when pageInfo is self-consistent and the
 * walk has already seen every entry it reports. Anything else falls back to
 * the short-page and empty-page signals.
 */
function isFinalPage(
  pageIndex: number,
  pageSize: number,
  yielded: number,
  pageInfo: PageInfo | null | undefined
): boolean {
  if (!pageInfo) return false;
  const { numPages, numEntries } = pageInfo;
  if (typeof numPages !== 'number' || typeof numEntries !== 'number') return false;
  if (numPages !== Math.ceil(numEntries / pageSize)) return false;
  return pageIndex >= numPages - 1 && yielded === numEntries;
}

/**
 * Walk a paginated endpoint lazily, yielding raw items in upstream order.
 *
 * Requests page 0, 1, 2... until a page is empty, a page is shorter than
 * `pageSize`, `limit` items have been yielded, or a full page completes a
 * consistent pageInfo count. Re-invoking starts a fresh walk from page 0.
 *
 * A transient failure rethrows with `pagesCompleted` in its context; nothing
 * already yielded should be treated as a complete result.
 */
export async function* walkPages(
  executor: RequestExecutor,
  path: string,
  params: QueryParams,
  options: PaginateOptions
): AsyncGenerator<unknown, void, undefined> {
  const { pageSize, limit, extract } = options;
  if (limit !== undefined && limit <= 0) return;

  let yielded = 0;

  for (let pageIndex = 0; ; pageIndex++) {
    let body: unknown;
    try {
      body = await executor.execute(path, { ...params, page: pageIndex, pageSize });
    } catch (error) {
      if (error instanceof TransientNetworkException) {
        throw TransientNetworkException.duringWalk(error, pageIndex);
      }
      throw error;
    }

    const { items, pageInfo } = extract(body);

    for (const item of items) {
      yield item;
      yielded++;
      if (limit !== undefined && yielded >= limit) return;
    }

    if (items.length < pageSize || isFinalPage(pageIndex, pageSize, yielded, pageInfo)) return;
  }
}

/**
 * Collect a full walk into memory. Either every page arrives or the call fails.
 */
export async function paginate(
  executor: RequestExecutor,
  path: string,
  params: QueryParams,
  options: PaginateOptions
): Promise<unknown[]> {
  const items: unknown[] = [];
  for await (const item of walkPages(executor, path, params, options)) {
    items.push(item);
  }

  logger.debug('Pagination walk complete', { path, items: items.length, pageSize: options.pageSize });
  return items;
}
