/**
 * Candidate and scored result types.
 *
 * Candidates are raw metadata returned by a search engine. Scoring attaches a
 * relatedness score; nothing else about the candidate changes.
 */

/** A paper returned by the arXiv index. */
export interface ArxivCandidate {
  engine: "arXiv";
  title: string;
  /** Abstract text; this is what gets embedded. */
  summary: string;
  /** Publication date as `YYYY-MM-DD`. */
  published: string;
  /** Abstract page URL. */
  articleUrl: string;
  pdfUrl: string;
}

/** A page returned by Google Custom Search. */
export interface CseCandidate {
  engine: "CSE";
  title: string;
  /** Result snippet; this is what gets embedded. Empty when the API omits it. */
  snippet: string;
  link: string;
}

export type CandidateResult = ArxivCandidate | CseCandidate;

/** A candidate with its relatedness to the query attached. */
export type ScoredResult<C extends CandidateResult = CandidateResult> = C & {
  relatednessScore: number;
};

/**
 * The text a candidate is embedded from: the document body, never the title.
 */
export function candidateText(candidate: CandidateResult): string {
  return candidate.engine === "arXiv" ? candidate.summary : candidate.snippet;
}
