/**
 * Saved search persistence: one headerless CSV file per (engine, keywords).
 *
 * Layout: `<dataDir>/<engine dir>/<encoded keywords>.csv`. Column order is
 * fixed per engine and the score is always the last column:
 *
 *   arXiv: title, summary, published_date, pdf_url, relatedness_score
 *   CSE:   title, snippet, link, relatedness_score
 *
 * Saving a key again overwrites the whole file; concurrent saves to one key
 * are last-writer-wins.
 */

import { mkdir, readFile, readdir, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import {
  type SavedSearchKey,
  type SavedSearchListing,
  type SavedSearchRow,
  type ScoredResult,
  type SearchEngine,
} from "@/types";
import { getDataDir } from "./config";
import { PersistenceFailure, SavedSearchNotFoundError } from "./errors";
import { sortByRelatedness } from "./ranker";

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface SavedSearchStore {
  /** Write the ranked results for a key, replacing any previous file. */
  save(key: SavedSearchKey, results: readonly ScoredResult[]): Promise<void>;
  /** Read a saved search back, highest score first. Rejects with SavedSearchNotFoundError. */
  load(key: SavedSearchKey): Promise<SavedSearchRow[]>;
  /** Saved keys for one engine, sorted by keywords. */
  list(engine: SearchEngine): Promise<SavedSearchKey[]>;
  /** Saved keys for every engine. */
  listAll(): Promise<SavedSearchListing>;
  /** Remove a saved search. Deleting a missing key reports "not_found". */
  delete(key: SavedSearchKey): Promise<"deleted" | "not_found">;
}

// ---------------------------------------------------------------------------
// File naming
// ---------------------------------------------------------------------------

const ENGINE_DIRS: Record<SearchEngine, string> = {
  arXiv: "arxiv",
  CSE: "cse",
};

const FILE_EXTENSION = ".csv";

function percentEncode(c: string): string {
  return `%${c.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`;
}

/**
 * Encode a keyword string as a file name stem. Only `%`, `/`, `\`, NUL and
 * a leading `.` are percent-encoded; quotes, spaces and operators stay as
 * typed so the name stays close to the keyword length.
 */
export function encodeKeywords(keywords: string): string {
  return keywords.replace(/[%\/\\\0]/g, percentEncode).replace(/^\./, percentEncode);
}

/**
 * Inverse of encodeKeywords. Null for names this store did not write,
 * including names that decode but would be written differently.
 */
export function decodeKeywords(stem: string): string | null {
  let keywords: string;
  try {
    keywords = decodeURIComponent(stem);
  } catch {
    return null;
  }
  return encodeKeywords(keywords) === stem ? keywords : null;
}

// ---------------------------------------------------------------------------
// Row codec
// ---------------------------------------------------------------------------

/** Project a scored result onto its engine's column order. */
export function toCsvRecord(result: ScoredResult): (string | number)[] {
  if (result.engine === "arXiv") {
    return [result.title, result.summary, result.published, result.pdfUrl, result.relatednessScore];
  }
  return [result.title, result.snippet, result.link, result.relatednessScore];
}

function parseScore(cell: string, file: string): number {
  const score = Number(cell);
  if (cell.trim() === "" || Number.isNaN(score)) {
    throw new PersistenceFailure(`Invalid relatedness score "${cell}" in ${file}`);
  }
  return score;
}

/** Rebuild a typed row from one CSV record. */
export function fromCsvRecord(
  engine: SearchEngine,
  record: readonly string[],
  file: string = "saved search",
): SavedSearchRow {
  if (engine === "arXiv") {
    if (record.length !== 5) {
      throw new PersistenceFailure(`Expected 5 columns in ${file}, got ${record.length}`);
    }
    const [title, summary, published, pdfUrl, score] = record;
    return {
      engine,
      title,
      summary,
      published,
      pdfUrl,
      relatednessScore: parseScore(score, file),
    };
  }

  if (record.length !== 4) {
    throw new PersistenceFailure(`Expected 4 columns in ${file}, got ${record.length}`);
  }
  const [title, snippet, link, score] = record;
  return { engine, title, snippet, link, relatednessScore: parseScore(score, file) };
}

const recordsSchema = z.array(z.array(z.string()));

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// File-backed store
// ---------------------------------------------------------------------------

/** Create a store rooted at `dataDir` (defaults to the DATA_DIR directory). */
export function createFileStore(dataDir: string = getDataDir()): SavedSearchStore {
  const engineDir = (engine: SearchEngine) => path.join(dataDir, ENGINE_DIRS[engine]);
  const filePath = (key: SavedSearchKey) =>
    path.join(engineDir(key.engine), encodeKeywords(key.keywords) + FILE_EXTENSION);

  async function list(engine: SearchEngine): Promise<SavedSearchKey[]> {
    let names: string[];
    try {
      names = await readdir(engineDir(engine));
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new PersistenceFailure(`Cannot list saved searches: ${describe(error)}`, {
        cause: error,
      });
    }

    const keys: SavedSearchKey[] = [];
    for (const name of names) {
      if (!name.endsWith(FILE_EXTENSION)) continue;
      const keywords = decodeKeywords(name.slice(0, -FILE_EXTENSION.length));
      if (keywords !== null) keys.push({ engine, keywords });
    }
    return keys.sort((a, b) => a.keywords.localeCompare(b.keywords));
  }

  return {
    async save(key, results) {
      const file = filePath(key);
      for (const result of results) {
        if (result.engine !== key.engine) {
          throw new PersistenceFailure(
            `Cannot save a ${result.engine} result under a ${key.engine} search`,
          );
        }
      }

      try {
        await mkdir(path.dirname(file), { recursive: true });
        await writeFile(file, stringify(results.map(toCsvRecord)), "utf-8");
      } catch (error) {
        throw new PersistenceFailure(`Cannot write ${file}: ${describe(error)}`, {
          cause: error,
        });
      }

      console.log(
        JSON.stringify({
          event: "saved_search_written",
          engine: key.engine,
          keywords: key.keywords,
          rows: results.length,
        }),
      );
    },

    async load(key) {
      const file = filePath(key);
      let content: string;
      try {
        content = await readFile(file, "utf-8");
      } catch (error) {
        if (isNotFound(error)) throw new SavedSearchNotFoundError(key);
        throw new PersistenceFailure(`Cannot read ${file}: ${describe(error)}`, {
          cause: error,
        });
      }

      let records: string[][];
      try {
        records = recordsSchema.parse(parse(content, { relax_column_count: true }));
      } catch (error) {
        throw new PersistenceFailure(`Malformed CSV in ${file}: ${describe(error)}`, {
          cause: error,
        });
      }

      // Files are written in ranked order, but a hand-edited file may not be.
      return sortByRelatedness(
        records.map((record) => fromCsvRecord(key.engine, record, file)),
      );
    },

    list,

    async listAll() {
      const [arXiv, CSE] = await Promise.all([list("arXiv"), list("CSE")]);
      return { arXiv, CSE };
    },

    async delete(key) {
      try {
        await unlink(filePath(key));
      } catch (error) {
        if (isNotFound(error)) return "not_found";
        throw new PersistenceFailure(`Cannot delete saved search: ${describe(error)}`, {
          cause: error,
        });
      }

      console.log(
        JSON.stringify({
          event: "saved_search_deleted",
          engine: key.engine,
          keywords: key.keywords,
        }),
      );
      return "deleted";
    },
  };
}
