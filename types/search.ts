/**
 * Search request types.
 *
 * A query starts as free text typed by the user and is turned into a boolean
 * keyword string before it reaches a search engine.
 */

/** The result providers a search can be dispatched to. */
export type SearchEngine = "arXiv" | "CSE";

/** All supported engines, in the order the UI offers them. */
export const SEARCH_ENGINES: SearchEngine[] = ["arXiv", "CSE"];

/** Maximum length of the free-text query accepted from the user. */
export const MAX_QUERY_LENGTH = 500;

/** A user query together with the keyword string derived from it. */
export interface Query {
  /** Free text as entered by the user. */
  text: string;
  /** Boolean search expression produced by the query formulator. */
  keywords: string;
}

/** Narrow an arbitrary value to a SearchEngine. */
export function isSearchEngine(value: unknown): value is SearchEngine {
  return SEARCH_ENGINES.some((engine) => engine === value);
}
