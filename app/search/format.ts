/**
 * Presentation helpers for the results list.
 *
 * A fresh search and a reloaded one carry slightly different records
 * (reloaded arXiv rows have no abstract-page URL), so both are mapped onto
 * one view shape before rendering.
 */

import type { SavedSearchRow, ScoredResult, SearchEngine } from "@/types";

export interface ResultView {
  title: string;
  bodyLabel: "Summary" | "Snippet";
  body: string;
  /** Publication date; arXiv only. */
  published?: string;
  url: string;
  score: number;
}

/** Relatedness as shown to the user: two decimals. */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

export function resultsHeading(engine: SearchEngine, keywords: string): string {
  return `${engine === "arXiv" ? "ArXiv" : "Google CSE"} Results: ${keywords}`;
}

/** arXiv results link to the PDF, Custom Search results to the page. */
export function toResultView(result: ScoredResult | SavedSearchRow): ResultView {
  if (result.engine === "arXiv") {
    return {
      title: result.title,
      bodyLabel: "Summary",
      body: result.summary,
      published: result.published,
      url: result.pdfUrl,
      score: result.relatednessScore,
    };
  }
  return {
    title: result.title,
    bodyLabel: "Snippet",
    body: result.snippet,
    url: result.link,
    score: result.relatednessScore,
  };
}
