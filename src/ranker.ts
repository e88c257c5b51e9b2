/**
 * Ranking module: embeds candidates, scores them against the query and
 * sorts them by relatedness.
 *
 * A candidate that cannot be embedded is dropped and counted; the batch as a
 * whole only fails when the query itself cannot be embedded.
 */

import {
  type CandidateResult,
  type EmbeddingVector,
  type ScoredResult,
  candidateText,
} from "@/types";
import type { EmbeddingProvider } from "./embeddings";
import { EMBEDDING_CONCURRENCY } from "./config";
import { EmbeddingFailure } from "./errors";
import { relatedness } from "./similarity";

/** Ranked results plus the number of candidates that could not be scored. */
export interface RankOutcome<C extends CandidateResult = CandidateResult> {
  results: ScoredResult<C>[];
  dropped: number;
}

export interface RankOptions {
  /** Maximum embedding requests in flight (defaults to EMBEDDING_CONCURRENCY). */
  concurrency?: number;
}

/**
 * Run `task` over every item with at most `limit` calls in flight.
 * Results are returned in input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workers = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}

/**
 * Sort scored results by relatedness, highest first.
 * Array.prototype.sort is stable, so ties keep their input order.
 */
export function sortByRelatedness<T extends { relatednessScore: number }>(
  results: T[],
): T[] {
  return [...results].sort((a, b) => b.relatednessScore - a.relatednessScore);
}

/**
 * Score every candidate against an already-computed query embedding.
 *
 * Candidates whose embedding fails (or cannot be compared with the query
 * vector) are dropped with a logged warning.
 */
export async function rankCandidates<C extends CandidateResult>(
  queryEmbedding: EmbeddingVector,
  candidates: readonly C[],
  provider: EmbeddingProvider,
  options: RankOptions = {},
): Promise<RankOutcome<C>> {
  const concurrency = options.concurrency ?? EMBEDDING_CONCURRENCY;

  const scored = await mapWithConcurrency(
    candidates,
    concurrency,
    async (candidate): Promise<ScoredResult<C> | null> => {
      try {
        const vector = await provider.embed(candidateText(candidate));
        return { ...candidate, relatednessScore: relatedness(queryEmbedding, vector) };
      } catch (error) {
        console.warn(
          JSON.stringify({
            event: "candidate_dropped",
            engine: candidate.engine,
            title: candidate.title,
            reason: error instanceof Error ? error.message : String(error),
          }),
        );
        return null;
      }
    },
  );

  const results = scored.filter((r): r is ScoredResult<C> => r !== null);

  return {
    results: sortByRelatedness(results),
    dropped: candidates.length - results.length,
  };
}

/**
 * Embed the query text, then rank the candidates against it.
 *
 * Rejects with EmbeddingFailure if the query cannot be embedded or embeds
 * to the zero vector; no candidate is embedded in that case.
 */
export async function rankByRelatedness<C extends CandidateResult>(
  queryText: string,
  candidates: readonly C[],
  provider: EmbeddingProvider,
  options: RankOptions = {},
): Promise<RankOutcome<C>> {
  let queryEmbedding: EmbeddingVector;
  try {
    queryEmbedding = await provider.embed(queryText);
  } catch (error) {
    if (error instanceof EmbeddingFailure) throw error;
    throw new EmbeddingFailure(
      `Query embedding failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
  if (queryEmbedding.every((x) => x === 0)) {
    throw new EmbeddingFailure("Query embedding has zero magnitude");
  }
  return rankCandidates(queryEmbedding, candidates, provider, options);
}
