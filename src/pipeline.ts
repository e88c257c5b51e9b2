/**
 * Search pipeline: formulate, search, rank, save.
 *
 * Every entry point takes its collaborators explicitly and returns a plain
 * outcome value; the API routes only translate those values into HTTP.
 *
 * Failure policy:
 * - FormulationFailure and a failed query embedding propagate.
 * - A ProviderFailure becomes a "no_results" outcome carrying the reason.
 * - A failed save is logged and reported as `saved: false`.
 */

import { z } from "zod";
import {
  MAX_QUERY_LENGTH,
  SEARCH_ENGINES,
  type CandidateResult,
  type DeleteOutcome,
  type Query,
  type ReloadOutcome,
  type SavedSearchHistory,
  type SavedSearchKey,
  type SavedSearchListing,
  type SearchEngine,
  type SearchOutcome,
} from "@/types";
import { EMBEDDING_CONCURRENCY } from "./config";
import { createEmbeddingProvider, type EmbeddingProvider } from "./embeddings";
import {
  InvalidRequestError,
  PersistenceFailure,
  ProviderFailure,
  SavedSearchNotFoundError,
} from "./errors";
import { createQueryFormulator, type QueryFormulator } from "./formulator";
import { createSearchProviders, type SearchProviders } from "./providers";
import { rankByRelatedness } from "./ranker";
import { createFileStore, type SavedSearchStore } from "./store";

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface PipelineDeps {
  formulator: QueryFormulator;
  providers: SearchProviders;
  embedder: EmbeddingProvider;
  store: SavedSearchStore;
  /** Candidate embeddings in flight at once. */
  concurrency: number;
}

/** Collaborators configured from the environment. */
export function createDefaultDeps(): PipelineDeps {
  return {
    formulator: createQueryFormulator(),
    providers: createSearchProviders(),
    embedder: createEmbeddingProvider(),
    store: createFileStore(),
    concurrency: EMBEDDING_CONCURRENCY,
  };
}

// ---------------------------------------------------------------------------
// Request validation
// ---------------------------------------------------------------------------

export interface SearchRequest {
  engine: SearchEngine;
  /** Free text as typed by the user. */
  text: string;
}

const engineSchema = z.enum(["arXiv", "CSE"], {
  errorMap: () => ({ message: `engine must be one of: ${SEARCH_ENGINES.join(", ")}` }),
});

const querySchema = z
  .string({
    required_error: "query is required",
    invalid_type_error: "query must be a string",
  })
  .max(MAX_QUERY_LENGTH, `query must be at most ${MAX_QUERY_LENGTH} characters`)
  .refine((text) => text.trim().length > 0, "query must not be empty");

const searchBodySchema = z.object({ engine: engineSchema, query: querySchema });

const savedSearchParamsSchema = z.object({
  engine: engineSchema,
  keywords: z
    .string({ required_error: "keywords is required" })
    .min(1, "keywords must not be empty"),
});

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "Invalid request";
}

/** Validate a `POST /api/search` body. Throws InvalidRequestError. */
export function parseSearchRequest(body: unknown): SearchRequest {
  const parsed = searchBodySchema.safeParse(body);
  if (!parsed.success) throw new InvalidRequestError(firstIssue(parsed.error));
  return { engine: parsed.data.engine, text: parsed.data.query };
}

/** Validate the `engine` and `keywords` query parameters. Throws InvalidRequestError. */
export function parseSavedSearchKey(params: URLSearchParams): SavedSearchKey {
  const parsed = savedSearchParamsSchema.safeParse({
    engine: params.get("engine") ?? undefined,
    keywords: params.get("keywords") ?? undefined,
  });
  if (!parsed.success) throw new InvalidRequestError(firstIssue(parsed.error));
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

/** Turn the user's free text into a keyword string. Rejects with FormulationFailure. */
export async function formulateQuery(
  text: string,
  engine: SearchEngine,
  formulator: QueryFormulator,
): Promise<Query> {
  const keywords = await formulator.formulate(text);
  console.log(
    JSON.stringify({
      event: "keywords_formulated",
      engine,
      model: formulator.model,
      keywords,
    }),
  );
  return { text, keywords };
}

/**
 * Run one search end to end.
 *
 * Rejects with FormulationFailure when no keywords can be produced and with
 * EmbeddingFailure when the keyword string itself cannot be embedded.
 */
export async function runSearch(
  request: SearchRequest,
  deps: PipelineDeps,
): Promise<SearchOutcome> {
  const { engine } = request;
  const text = querySchema.safeParse(request.text);
  if (!text.success) throw new InvalidRequestError(firstIssue(text.error));

  const { keywords } = await formulateQuery(text.data, engine, deps.formulator);

  let candidates: CandidateResult[];
  try {
    candidates = await deps.providers[engine].search(keywords);
  } catch (error) {
    if (!(error instanceof ProviderFailure)) throw error;
    console.warn(
      JSON.stringify({
        event: "provider_failed",
        engine,
        status: error.status,
        retryable: error.retryable,
        reason: error.message,
      }),
    );
    return { status: "no_results", engine, keywords, reason: error.message };
  }

  if (candidates.length === 0) {
    logCompleted(engine, keywords, 0, 0, 0, false);
    return {
      status: "no_results",
      engine,
      keywords,
      reason: `No search results found on ${engine}.`,
    };
  }

  const { results, dropped } = await rankByRelatedness(
    keywords,
    candidates,
    deps.embedder,
    { concurrency: deps.concurrency },
  );

  if (results.length === 0) {
    logCompleted(engine, keywords, candidates.length, 0, dropped, false);
    return {
      status: "no_results",
      engine,
      keywords,
      reason: `None of the ${candidates.length} results from ${engine} could be scored.`,
    };
  }

  let saved = true;
  try {
    await deps.store.save({ engine, keywords }, results);
  } catch (error) {
    if (!(error instanceof PersistenceFailure)) throw error;
    saved = false;
    console.warn(
      JSON.stringify({ event: "saved_search_failed", engine, keywords, reason: error.message }),
    );
  }

  logCompleted(engine, keywords, candidates.length, results.length, dropped, saved);
  return { status: "ok", engine, keywords, results, dropped, saved };
}

function logCompleted(
  engine: SearchEngine,
  keywords: string,
  candidates: number,
  ranked: number,
  dropped: number,
  saved: boolean,
): void {
  console.log(
    JSON.stringify({
      event: "search_completed",
      engine,
      keywords,
      candidates,
      ranked,
      dropped,
      saved,
    }),
  );
}

// ---------------------------------------------------------------------------
// History
// ---------------------------------------------------------------------------

/** Read a saved search back without recomputing anything. */
export async function reloadSavedSearch(
  key: SavedSearchKey,
  store: SavedSearchStore,
): Promise<ReloadOutcome> {
  try {
    return { status: "ok", key, rows: await store.load(key) };
  } catch (error) {
    if (error instanceof SavedSearchNotFoundError) return { status: "not_found", key };
    if (error instanceof PersistenceFailure) {
      return { status: "error", key, message: error.message };
    }
    throw error;
  }
}

export async function deleteSavedSearch(
  key: SavedSearchKey,
  store: SavedSearchStore,
): Promise<DeleteOutcome> {
  return { status: await store.delete(key), key };
}

/** Saved searches grouped by engine. */
export function listHistory(store: SavedSearchStore): Promise<SavedSearchListing> {
  return store.listAll();
}

/** Drop the engine from each key, leaving the keyword strings per engine. */
export function keywordsByEngine(listing: SavedSearchListing): SavedSearchHistory {
  return {
    arXiv: listing.arXiv.map((key) => key.keywords),
    CSE: listing.CSE.map((key) => key.keywords),
  };
}
