/**
 * Cursor-following traversal over any page-token listing call.
 */

import { BackendError, ValidationError } from "./errors.js";

export interface Page<T> {
  items: T[];
  /** Absent or empty on the last page. */
  nextPageToken?: string;
}

export type ListPage<T> = (pageSize: number, pageToken?: string) => Promise<Page<T>>;

export interface PaginateOptions {
  pageSize?: number;
  /** Called after each page arrives, with its 1-based index and item count. */
  onPage?: (pageIndex: number, itemCount: number) => void;
}

export const DEFAULT_PAGE_SIZE = 100;

/** Caller-supplied page size: absent, or a positive integer. */
export function checkPageSize(pageSize: number | undefined): void {
  if (pageSize !== undefined && (!Number.isInteger(pageSize) || pageSize <= 0)) {
    throw new ValidationError(`page_size must be a positive integer (got ${pageSize})`);
  }
}

/**
 * Lazy sequence of every item across all pages. Each iteration starts from
 * the first page; pages are fetched only as the consumer advances, so a
 * `break` stops further calls.
 */
export function paginate<T>(listPage: ListPage<T>, options: PaginateOptions = {}): AsyncIterable<T> {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;

  return {
    async *[Symbol.asyncIterator]() {
      let token: string | undefined;
      let pageIndex = 0;

      do {
        const page = await listPage(pageSize, token);
        pageIndex++;
        options.onPage?.(pageIndex, page.items.length);
        yield* page.items;

        const next = page.nextPageToken || undefined;
        if (next !== undefined && next === token) {
          throw new BackendError(`Listing returned the same page token twice: ${next}`);
        }
        token = next;
      } while (token);
    },
  };
}

export async function collectAll<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}
