/**
 * Lazy directory listers
 */

import type { DirEntry, Lister } from "../core/types.js";

/**
 * Entry as produced by a page fetch; the lister fills in `hasMore`
 */
export type ListedEntry = Omit<DirEntry, "hasMore">;

/**
 * One page of a paginated listing
 */
export interface ListPage {
  entries: ListedEntry[];

  /** Token for the next page (undefined if no more) */
  nextToken?: string;
}

export type PageFetcher = (token: string | undefined) => Promise<ListPage>;

/**
 * Lister over a paginated backend API
 *
 * A page is fetched only when the caller asks for an entry beyond the ones
 * already buffered, so a caller that stops after a few entries never causes
 * another request. Each iteration starts again from the first page.
 */
export class PageLister implements Lister {
  constructor(private readonly fetchPage: PageFetcher) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<DirEntry> {
    let token: string | undefined;

    do {
      const page = await this.fetchPage(token);
      token = page.nextToken;

      const lastIndex = page.entries.length - 1;
      for (const [index, entry] of page.entries.entries()) {
        yield {
          id: entry.id,
          metadata: entry.metadata,
          hasMore: index < lastIndex || token !== undefined,
        };
      }
    } while (token !== undefined);
  }
}

/**
 * Lister over entries that are already known
 */
export function staticLister(entries: ListedEntry[]): Lister {
  return new PageLister(async () => ({ entries }));
}

/**
 * Collect a lister into an array, stopping after `limit` entries
 */
export async function collectEntries(
  lister: Lister,
  limit = Number.POSITIVE_INFINITY,
): Promise<DirEntry[]> {
  const entries: DirEntry[] = [];
  if (limit <= 0) return entries;

  for await (const entry of lister) {
    entries.push(entry);
    if (entries.length >= limit) break;
  }
  return entries;
}
