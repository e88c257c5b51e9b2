/**
 * Sidebar reload bookkeeping.
 *
 * Only the most recently requested saved search may fill the results panel;
 * a slower response for an earlier click is dropped when it arrives.
 */

import type { SavedSearchKey } from "@/types";

export function sameKey(a: SavedSearchKey | null, b: SavedSearchKey): boolean {
  return a !== null && a.engine === b.engine && a.keywords === b.keywords;
}

export interface PendingReload {
  /** Mark `key` as the reload whose response should be shown. */
  begin(key: SavedSearchKey): void;
  isCurrent(key: SavedSearchKey): boolean;
  /** Drop whatever is in flight, e.g. when a new search starts. */
  clear(): void;
}

export function createPendingReload(): PendingReload {
  let current: SavedSearchKey | null = null;
  return {
    begin(key) {
      current = key;
    },
    isCurrent(key) {
      return sameKey(current, key);
    },
    clear() {
      current = null;
    },
  };
}
