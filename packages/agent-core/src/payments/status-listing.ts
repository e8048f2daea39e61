import type { StatusEntry } from "./lifecycle.js";

export const STATUS_PAGE_SIZE = 100;

export interface ListedEntry extends StatusEntry {
  /** Service record id; the listing pages on it with `cursorId`. */
  id?: string;
}

export type ListingPage<T extends ListedEntry> = (cursorId: string | undefined) => Promise<T[]>;

/**
 * Reads the status listing page by page until every wanted identifier has
 * been seen or the listing runs out. Each page after the first starts at the
 * id of the previous page's last entry.
 */
export async function findListedEntries<T extends ListedEntry>(
  fetchPage: ListingPage<T>,
  wanted: ReadonlySet<string>
): Promise<Map<string, T>> {
  const found = new Map<string, T>();
  let cursorId: string | undefined;

  while (true) {
    const page = await fetchPage(cursorId);
    for (const entry of page) {
      if (wanted.has(entry.blockchainIdentifier)) {
        found.set(entry.blockchainIdentifier, entry);
      }
    }
    if (found.size === wanted.size || page.length < STATUS_PAGE_SIZE) {
      return found;
    }

    const next = page[page.length - 1]?.id;
    if (next === undefined || next === cursorId) {
      return found;
    }
    cursorId = next;
  }
}
