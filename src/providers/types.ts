/**
 * Search provider interface shared by every engine.
 */

import type { CandidateResult, SearchEngine } from "@/types";

/** A search engine client. */
export interface SearchProvider<C extends CandidateResult = CandidateResult> {
  readonly engine: SearchEngine;
  /**
   * Fetch candidates for a keyword string. Rejects with ProviderFailure on
   * any transport, status, credential or response-shape problem.
   */
  search(keywords: string): Promise<C[]>;
}

/** One provider per engine, as the pipeline consumes them. */
export type SearchProviders = { [E in SearchEngine]: SearchProvider };
