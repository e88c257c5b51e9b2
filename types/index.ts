export type { SearchEngine, Query } from "./search";
export { SEARCH_ENGINES, MAX_QUERY_LENGTH, isSearchEngine } from "./search";

export type { EmbeddingVector } from "./embedding";

export type {
  ArxivCandidate,
  CseCandidate,
  CandidateResult,
  ScoredResult,
} from "./result";
export { candidateText } from "./result";

export type {
  SavedSearchKey,
  ArxivRow,
  CseRow,
  SavedSearchRow,
  SavedSearchListing,
  SavedSearchHistory,
} from "./saved-search";

export type {
  SearchSucceeded,
  SearchFoundNothing,
  SearchOutcome,
  ReloadOutcome,
  DeleteOutcome,
} from "./outcome";
