/**
 * Outcome values returned by the search pipeline and the API routes.
 *
 * These are plain data so the UI can render them without importing any
 * server-side module.
 */

import type { SearchEngine } from "./search";
import type { ScoredResult } from "./result";
import type { SavedSearchKey, SavedSearchRow } from "./saved-search";

/** A search that produced a ranked, non-empty result set. */
export interface SearchSucceeded {
  status: "ok";
  engine: SearchEngine;
  keywords: string;
  results: ScoredResult[];
  /** Candidates that could not be embedded and were left out. */
  dropped: number;
  /** False when the ranked set could not be written to history. */
  saved: boolean;
}

/** A search that ended without anything to show. */
export interface SearchFoundNothing {
  status: "no_results";
  engine: SearchEngine;
  keywords: string;
  reason: string;
}

export type SearchOutcome = SearchSucceeded | SearchFoundNothing;

export type ReloadOutcome =
  | { status: "ok"; key: SavedSearchKey; rows: SavedSearchRow[] }
  | { status: "not_found"; key: SavedSearchKey }
  | { status: "error"; key: SavedSearchKey; message: string };

export interface DeleteOutcome {
  status: "deleted" | "not_found";
  key: SavedSearchKey;
}
