/**
 * GET    /api/saved-searches/entry?engine=...&keywords=...
 * DELETE /api/saved-searches/entry?engine=...&keywords=...
 *
 * GET reloads a saved search exactly as it was written, highest score first.
 * Nothing is re-embedded.
 *
 * Output (GET):    { "engine": "...", "keywords": "...", "rows": [...] }
 * Output (DELETE): { "status": "deleted" } or 404 { "status": "not_found" }
 */

import { NextRequest, NextResponse } from "next/server";
import { InvalidRequestError } from "@/src/errors";
import { deleteSavedSearch, parseSavedSearchKey, reloadSavedSearch } from "@/src/pipeline";
import { createFileStore } from "@/src/store";

function errorResponse(error: unknown) {
  if (error instanceof InvalidRequestError) {
    return NextResponse.json({ error: error.message }, { status: 400 });
  }
  const message =
    error instanceof Error ? error.message : "Internal server error";
  return NextResponse.json({ error: message }, { status: 500 });
}

export async function GET(request: NextRequest) {
  try {
    const key = parseSavedSearchKey(request.nextUrl.searchParams);
    const outcome = await reloadSavedSearch(key, createFileStore());

    switch (outcome.status) {
      case "ok":
        return NextResponse.json({ ...key, rows: outcome.rows });
      case "not_found":
        return NextResponse.json(
          { error: `No saved ${key.engine} search for: ${key.keywords}` },
          { status: 404 },
        );
      case "error":
        return NextResponse.json({ error: outcome.message }, { status: 500 });
    }
  } catch (error) {
    return errorResponse(error);
  }
}

export async function DELETE(request: NextRequest) {
  try {
    const key = parseSavedSearchKey(request.nextUrl.searchParams);
    const { status } = await deleteSavedSearch(key, createFileStore());

    return NextResponse.json({ status }, { status: status === "deleted" ? 200 : 404 });
  } catch (error) {
    return errorResponse(error);
  }
}
