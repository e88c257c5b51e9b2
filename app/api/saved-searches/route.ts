/**
 * GET /api/saved-searches
 *
 * Lists past searches grouped by engine, for the history sidebar.
 *
 * Output: { "searches": { "arXiv": ["..."], "CSE": ["..."] } }
 */

import { NextResponse } from "next/server";
import { keywordsByEngine, listHistory } from "@/src/pipeline";
import { createFileStore } from "@/src/store";

export async function GET() {
  try {
    const listing = await listHistory(createFileStore());
    return NextResponse.json({ searches: keywordsByEngine(listing) });
  } catch (error) {
    const message =
      error instanceof Error ? error.message : "Internal server error";
    return NextResponse.json({ error: message }, { status: 500 });
  }
}
