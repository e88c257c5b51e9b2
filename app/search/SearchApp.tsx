"use client";

import { useCallback, useRef, useState } from "react";
import {
  isSearchEngine,
  MAX_QUERY_LENGTH,
  SEARCH_ENGINES,
  type SavedSearchHistory,
  type SavedSearchKey,
  type SearchEngine,
} from "@/types";
import { fetchHistory, fetchSavedSearch, removeSavedSearch, requestSearch } from "./client";
import { formatScore, resultsHeading, toResultView, type ResultView } from "./format";
import { createPendingReload, sameKey } from "./pending";

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

interface ResultsPanel {
  heading: string;
  results: ResultView[];
  /** Shown instead of the list when there is nothing to render. */
  emptyMessage?: string;
}

function ResultsList({ panel }: { panel: ResultsPanel }) {
  return (
    <section>
      <h2>{panel.heading}</h2>
      {panel.results.length === 0 && panel.emptyMessage && <p>{panel.emptyMessage}</p>}
      {panel.results.map((result, i) => (
        <article key={`${i}-${result.url}`}>
          <h3>
            Result {i + 1}: {result.title}
          </h3>
          <p>
            {result.bodyLabel}: {result.body}
          </p>
          {result.published !== undefined && <p>Published: {result.published}</p>}
          <p>
            URL: <a href={result.url}>{result.url}</a>
          </p>
          <p>Relatedness Score: {formatScore(result.score)}</p>
          <hr />
        </article>
      ))}
    </section>
  );
}

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

interface Props {
  initialHistory: SavedSearchHistory;
}

export default function SearchApp({ initialHistory }: Props) {
  // Form state
  const [engine, setEngine] = useState<SearchEngine>("arXiv");
  const [query, setQuery] = useState("");
  const [searching, setSearching] = useState(false);

  // Output state
  const [panel, setPanel] = useState<ResultsPanel | null>(null);
  const [error, setError] = useState("");
  const [notice, setNotice] = useState("");

  // Sidebar state
  const [history, setHistory] = useState<SavedSearchHistory>(initialHistory);
  const [selected, setSelected] = useState<SavedSearchKey | null>(null);
  const pendingReload = useRef(createPendingReload());

  const refreshHistory = useCallback(async () => {
    try {
      setHistory(await fetchHistory());
    } catch (err) {
      setNotice(err instanceof Error ? err.message : String(err));
    }
  }, []);

  async function handleSubmit(e: React.FormEvent) {
    e.preventDefault();
    setError("");
    setNotice("");
    setSelected(null);
    pendingReload.current.clear();
    setSearching(true);

    try {
      const outcome = await requestSearch(engine, query);
      const heading = resultsHeading(outcome.engine, outcome.keywords);
      if (outcome.status === "ok") {
        setPanel({ heading, results: outcome.results.map(toResultView) });
        const notes: string[] = [];
        if (outcome.dropped > 0) {
          notes.push(`${outcome.dropped} result(s) could not be scored and were left out.`);
        }
        if (!outcome.saved) notes.push("These results could not be saved to history.");
        setNotice(notes.join(" "));
      } else {
        setPanel({ heading, results: [], emptyMessage: outcome.reason });
      }
      await refreshHistory();
    } catch (err) {
      setPanel(null);
      setError(err instanceof Error ? err.message : String(err));
    }

    setSearching(false);
  }

  async function handleToggle(key: SavedSearchKey) {
    setError("");
    setNotice("");
    if (sameKey(selected, key)) {
      pendingReload.current.clear();
      setSelected(null);
      setPanel(null);
      return;
    }

    setSelected(key);
    pendingReload.current.begin(key);
    try {
      const rows = await fetchSavedSearch(key);
      if (!pendingReload.current.isCurrent(key)) return;
      setPanel({
        heading: resultsHeading(key.engine, key.keywords),
        results: rows.map(toResultView),
      });
    } catch (err) {
      if (!pendingReload.current.isCurrent(key)) return;
      setPanel(null);
      setNotice(
        `Error loading past search: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  async function handleDelete(key: SavedSearchKey) {
    const label = `${key.engine}/${key.keywords}`;
    try {
      const status = await removeSavedSearch(key);
      setNotice(status === "deleted" ? `Deleted: ${label}` : `File not found: ${label}`);
      if (sameKey(selected, key)) {
        pendingReload.current.clear();
        setSelected(null);
        setPanel(null);
      }
    } catch (err) {
      setNotice(err instanceof Error ? err.message : String(err));
    }
    await refreshHistory();
  }

  return (
    <div style={{ display: "flex", minHeight: "100vh" }}>
      {/* Sidebar */}
      <aside style={{ width: 300, padding: 16, borderRight: "1px solid #e5e7eb" }}>
        <h2>Past Searches</h2>
        {SEARCH_ENGINES.map((source) => (
          <details key={source} open>
            <summary>{source}</summary>
            {history[source].length === 0 && <p>No saved searches.</p>}
            <ul style={{ listStyle: "none", padding: 0 }}>
              {history[source].map((keywords) => {
                const key = { engine: source, keywords };
                return (
                  <li key={keywords} style={{ display: "flex", gap: 8 }}>
                    <label style={{ flex: 1 }}>
                      <input
                        type="checkbox"
                        checked={sameKey(selected, key)}
                        onChange={() => handleToggle(key)}
                      />{" "}
                      {keywords}
                    </label>
                    <button
                      type="button"
                      aria-label={`Delete ${source} search ${keywords}`}
                      onClick={() => handleDelete(key)}
                    >
                      Delete
                    </button>
                  </li>
                );
              })}
            </ul>
          </details>
        ))}
      </aside>

      {/* Main */}
      <main style={{ flex: 1, padding: 16 }}>
        <h1>Relatedness Search</h1>
        <form onSubmit={handleSubmit}>
          <label htmlFor="engine">Select Search Engine:</label>{" "}
          <select
            id="engine"
            value={engine}
            onChange={(e) => {
              if (isSearchEngine(e.target.value)) setEngine(e.target.value);
            }}
          >
            {SEARCH_ENGINES.map((s) => (
              <option key={s} value={s}>
                {s}
              </option>
            ))}
          </select>
          <p>
            <label htmlFor="query">Enter text:</label>
          </p>
          <textarea
            id="query"
            value={query}
            maxLength={MAX_QUERY_LENGTH}
            rows={5}
            style={{ width: "100%" }}
            onChange={(e) => setQuery(e.target.value)}
          />
          <p>
            {query.length}/{MAX_QUERY_LENGTH}
          </p>
          <button type="submit" disabled={searching || !query.trim()}>
            {searching ? "Searching…" : "Search"}
          </button>
        </form>

        {error && <p role="alert">{error}</p>}
        {notice && <p role="status">{notice}</p>}
        {panel && <ResultsList panel={panel} />}
      </main>
    </div>
  );
}
