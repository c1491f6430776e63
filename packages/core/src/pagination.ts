import { throwIfCancelled } from "./errors.js";
import type { EventPage } from "./types.js";

export type EventPageFetcher = (page: number) => Promise<EventPage>;

export interface PaginationOptions {
  startPage?: number;
  signal?: AbortSignal;
}

/**
 * A page is terminal when it is the reported last page, or when the reported
 * next page does not move forward. Providers have been seen to wrap back to
 * an earlier page instead of ending the feed.
 */
export function isTerminalPage(page: EventPage): boolean {
  const lastPage = page.lastPage ?? 0;
  const nextPage = page.nextPage ?? 0;
  return page.page === lastPage || nextPage <= page.page;
}

export async function* iterateEventPages(
  fetchPage: EventPageFetcher,
  options: PaginationOptions = {}
): AsyncGenerator<EventPage, void, undefined> {
  let current = options.startPage ?? 0;

  for (;;) {
    throwIfCancelled(options.signal);
    const page = await fetchPage(current);
    yield page;

    if (isTerminalPage(page) || page.nextPage === undefined) {
      return;
    }
    current = page.nextPage;
  }
}
