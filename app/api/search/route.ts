/**
 * POST /api/search
 *
 * Full pipeline: formulate keywords → query the engine → embed the keyword
 * string and every candidate → rank → save to history.
 *
 * Input:  { "engine": "arXiv" | "CSE", "query": "..." }
 * Output: a SearchOutcome ({ status: "ok", ... } or { status: "no_results", ... })
 *
 * A failure to formulate keywords or to embed the keyword string is a 502;
 * a failing search engine is reported as "no_results" with the reason.
 */

import { NextRequest, NextResponse } from "next/server";
import { EmbeddingFailure, FormulationFailure, InvalidRequestError } from "@/src/errors";
import { createDefaultDeps, parseSearchRequest, runSearch } from "@/src/pipeline";

export async function POST(request: NextRequest) {
  try {
    let body: unknown;
    try {
      body = await request.json();
    } catch {
      return NextResponse.json({ error: "Request body must be JSON" }, { status: 400 });
    }

    const searchRequest = parseSearchRequest(body);
    const outcome = await runSearch(searchRequest, createDefaultDeps());

    return NextResponse.json(outcome);
  } catch (error) {
    if (error instanceof InvalidRequestError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }
    if (error instanceof FormulationFailure) {
      return NextResponse.json(
        { error: `Could not generate search keywords: ${error.message}` },
        { status: 502 },
      );
    }
    if (error instanceof EmbeddingFailure) {
      return NextResponse.json(
        { error: `Could not embed the search keywords: ${error.message}` },
        { status: 502 },
      );
    }
    const message =
      error instanceof Error ? error.message : "Internal server error";
    return NextResponse.json({ error: message }, { status: 500 });
  }
}
