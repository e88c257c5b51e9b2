/**
 * Browser-side calls to the search API, with every response validated
 * before it reaches component state.
 */

import { z } from "zod";
import type {
  SavedSearchHistory,
  SavedSearchKey,
  SavedSearchRow,
  SearchEngine,
  SearchOutcome,
} from "@/types";

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const engineSchema = z.enum(["arXiv", "CSE"]);

const arxivRowSchema = z.object({
  engine: z.literal("arXiv"),
  title: z.string(),
  summary: z.string(),
  published: z.string(),
  pdfUrl: z.string(),
  relatednessScore: z.number(),
});

const cseRowSchema = z.object({
  engine: z.literal("CSE"),
  title: z.string(),
  snippet: z.string(),
  link: z.string(),
  relatednessScore: z.number(),
});

const rowSchema = z.discriminatedUnion("engine", [arxivRowSchema, cseRowSchema]);

const scoredResultSchema = z.discriminatedUnion("engine", [
  arxivRowSchema.extend({ articleUrl: z.string() }),
  cseRowSchema,
]);

const searchOutcomeSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("ok"),
    engine: engineSchema,
    keywords: z.string(),
    results: z.array(scoredResultSchema),
    dropped: z.number(),
    saved: z.boolean(),
  }),
  z.object({
    status: z.literal("no_results"),
    engine: engineSchema,
    keywords: z.string(),
    reason: z.string(),
  }),
]);

const historySchema = z.object({
  searches: z.object({ arXiv: z.array(z.string()), CSE: z.array(z.string()) }),
});

const reloadSchema = z.object({ rows: z.array(rowSchema) });

const deleteSchema = z.object({ status: z.enum(["deleted", "not_found"]) });

const errorSchema = z.object({ error: z.string() });

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function readJson(res: Response): Promise<unknown> {
  return res.json().catch(() => ({}));
}

function errorMessage(body: unknown, fallback: string): string {
  const parsed = errorSchema.safeParse(body);
  return parsed.success ? parsed.data.error : fallback;
}

function entryUrl(key: SavedSearchKey): string {
  const params = new URLSearchParams({ engine: key.engine, keywords: key.keywords });
  return `/api/saved-searches/entry?${params.toString()}`;
}

// ---------------------------------------------------------------------------
// Calls
// ---------------------------------------------------------------------------

export async function requestSearch(
  engine: SearchEngine,
  query: string,
): Promise<SearchOutcome> {
  const res = await fetch("/api/search", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ engine, query }),
  });
  const body = await readJson(res);
  if (!res.ok) throw new Error(errorMessage(body, `Search failed (${res.status})`));
  return searchOutcomeSchema.parse(body);
}

export async function fetchHistory(): Promise<SavedSearchHistory> {
  const res = await fetch("/api/saved-searches");
  const body = await readJson(res);
  if (!res.ok) throw new Error(errorMessage(body, `Could not list past searches (${res.status})`));
  return historySchema.parse(body).searches;
}

export async function fetchSavedSearch(key: SavedSearchKey): Promise<SavedSearchRow[]> {
  const res = await fetch(entryUrl(key));
  const body = await readJson(res);
  if (!res.ok) {
    throw new Error(errorMessage(body, `Error loading past search (${res.status})`));
  }
  return reloadSchema.parse(body).rows;
}

export async function removeSavedSearch(
  key: SavedSearchKey,
): Promise<"deleted" | "not_found"> {
  const res = await fetch(entryUrl(key), { method: "DELETE" });
  const body = await readJson(res);
  const parsed = deleteSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error(errorMessage(body, `Could not delete past search (${res.status})`));
  }
  return parsed.data.status;
}
