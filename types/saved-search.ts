/**
 * Saved search types: the on-disk projection of a ranked result set.
 */

import type { SearchEngine } from "./search";

/** Identity of a saved search. Saving the same key again overwrites it. */
export interface SavedSearchKey {
  engine: SearchEngine;
  keywords: string;
}

/** One persisted arXiv row, in file column order. */
export interface ArxivRow {
  engine: "arXiv";
  title: string;
  summary: string;
  published: string;
  pdfUrl: string;
  relatednessScore: number;
}

/** One persisted CSE row, in file column order. */
export interface CseRow {
  engine: "CSE";
  title: string;
  snippet: string;
  link: string;
  relatednessScore: number;
}

export type SavedSearchRow = ArxivRow | CseRow;

/** Saved search keywords grouped by engine, for the history sidebar. */
export type SavedSearchListing = Record<SearchEngine, SavedSearchKey[]>;

/** Saved keyword strings per engine, as the API returns them. */
export type SavedSearchHistory = Record<SearchEngine, string[]>;
