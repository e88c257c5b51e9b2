import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import {
  mapWithConcurrency,
  rankByRelatedness,
  rankCandidates,
  sortByRelatedness,
} from "./ranker";
import type { EmbeddingProvider } from "./embeddings";
import { EmbeddingFailure } from "./errors";
import type { CseCandidate } from "@/types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function candidate(snippet: string, title: string = `Title ${snippet}`): CseCandidate {
  return { engine: "CSE", title, snippet, link: `https://example.test/${snippet}` };
}

/**
 * A provider that looks vectors up by text and fails for anything it does
 * not know.
 */
function tableProvider(table: Record<string, number[]>): EmbeddingProvider {
  return {
    model: "table-model",
    async embed(text: string) {
      const vector = table[text];
      if (!vector) throw new EmbeddingFailure(`no vector for ${text}`);
      return vector;
    },
  };
}

let warnSpy: ReturnType<typeof vi.spyOn>;

beforeEach(() => {
  warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  warnSpy.mockRestore();
});

// ---------------------------------------------------------------------------
// rankCandidates
// ---------------------------------------------------------------------------

describe("rankCandidates", () => {
  it("scores A=[1,0] and B=[0,1] against [1,0] as 1 and 0, A first", async () => {
    const provider = tableProvider({ A: [1, 0], B: [0, 1] });
    const { results, dropped } = await rankCandidates(
      [1, 0],
      [candidate("B"), candidate("A")],
      provider,
    );

    expect(dropped).toBe(0);
    expect(results.map((r) => r.snippet)).toEqual(["A", "B"]);
    expect(results[0].relatednessScore).toBeCloseTo(1.0, 10);
    expect(results[1].relatednessScore).toBeCloseTo(0.0, 10);
  });

  it("returns a descending permutation of the input when all embeddings succeed", async () => {
    const provider = tableProvider({
      a: [0.2, 1],
      b: [1, 0.1],
      c: [1, 1],
      d: [-1, 0.5],
    });
    const input = [candidate("a"), candidate("b"), candidate("c"), candidate("d")];

    const { results, dropped } = await rankCandidates([1, 0], input, provider);

    expect(dropped).toBe(0);
    expect(results).toHaveLength(input.length);
    expect(results.map((r) => r.snippet).sort()).toEqual(["a", "b", "c", "d"]);
    expect(results.map((r) => r.snippet)).toEqual(["b", "c", "a", "d"]);
    for (let i = 1; i < results.length; i++) {
      expect(results[i - 1].relatednessScore).toBeGreaterThanOrEqual(
        results[i].relatednessScore,
      );
    }
  });

  it("drops exactly the candidates whose embedding fails", async () => {
    const provider = tableProvider({ ok1: [1, 0], ok2: [0.5, 0.5] });
    const input = [candidate("ok1"), candidate("bad1"), candidate("ok2"), candidate("bad2")];

    const { results, dropped } = await rankCandidates([1, 0], input, provider);

    expect(results).toHaveLength(2);
    expect(dropped).toBe(2);
    expect(results.map((r) => r.snippet)).toEqual(["ok1", "ok2"]);
    expect(warnSpy).toHaveBeenCalledTimes(2);
    expect(JSON.parse(warnSpy.mock.calls[0][0] as string)).toEqual({
      event: "candidate_dropped",
      engine: "CSE",
      title: "Title bad1",
      reason: "no vector for bad1",
    });
  });

  it("drops a candidate whose vector dimension differs from the query", async () => {
    const provider = tableProvider({ short: [1, 0], long: [1, 0, 0] });

    const { results, dropped } = await rankCandidates(
      [1, 0],
      [candidate("short"), candidate("long")],
      provider,
    );

    expect(results.map((r) => r.snippet)).toEqual(["short"]);
    expect(dropped).toBe(1);
  });

  it("returns an empty result for no candidates", async () => {
    const provider = tableProvider({});
    await expect(rankCandidates([1, 0], [], provider)).resolves.toEqual({
      results: [],
      dropped: 0,
    });
  });

  it("returns an empty result when every candidate fails", async () => {
    const provider = tableProvider({});
    const { results, dropped } = await rankCandidates(
      [1, 0],
      [candidate("x"), candidate("y")],
      provider,
    );
    expect(results).toEqual([]);
    expect(dropped).toBe(2);
  });

  it("embeds the snippet, never the title", async () => {
    const embed = vi.fn().mockResolvedValue([1, 0]);
    const provider: EmbeddingProvider = { model: "spy", embed };

    await rankCandidates([1, 0], [candidate("body text", "Heading")], provider);

    expect(embed).toHaveBeenCalledWith("body text");
    expect(embed).not.toHaveBeenCalledWith("Heading");
  });

  it("keeps input order for tied scores", async () => {
    const provider = tableProvider({ first: [1, 0], second: [2, 0], third: [3, 0] });
    const { results } = await rankCandidates(
      [1, 0],
      [candidate("first"), candidate("second"), candidate("third")],
      provider,
      { concurrency: 3 },
    );
    expect(results.map((r) => r.snippet)).toEqual(["first", "second", "third"]);
  });
});

// ---------------------------------------------------------------------------
// rankByRelatedness
// ---------------------------------------------------------------------------

describe("rankByRelatedness", () => {
  it("embeds the query and ranks against it", async () => {
    const provider = tableProvider({ query: [0, 1], A: [1, 0], B: [0, 1] });

    const { results } = await rankByRelatedness(
      "query",
      [candidate("A"), candidate("B")],
      provider,
    );

    expect(results.map((r) => r.snippet)).toEqual(["B", "A"]);
  });

  it("fails fast when the query cannot be embedded", async () => {
    const embed = vi.fn(async (text: string) => {
      if (text === "query") throw new EmbeddingFailure("service down");
      return [1, 0];
    });
    const provider: EmbeddingProvider = { model: "spy", embed };

    await expect(
      rankByRelatedness("query", [candidate("A")], provider),
    ).rejects.toBeInstanceOf(EmbeddingFailure);
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it("fails fast on an all-zero query embedding", async () => {
    const embed = vi.fn(async (text: string) => (text === "query" ? [0, 0] : [1, 0]));
    const provider: EmbeddingProvider = { model: "spy", embed };

    const ranking = rankByRelatedness("query", [candidate("A")], provider);

    await expect(ranking).rejects.toBeInstanceOf(EmbeddingFailure);
    await expect(ranking).rejects.toThrow("Query embedding has zero magnitude");
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it("wraps a non-EmbeddingFailure query error", async () => {
    const provider: EmbeddingProvider = {
      model: "broken",
      async embed() {
        throw new Error("socket hang up");
      },
    };

    await expect(rankByRelatedness("query", [], provider)).rejects.toThrow(
      "Query embedding failed: socket hang up",
    );
  });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe("mapWithConcurrency", () => {
  it("never exceeds the limit and preserves input order", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([5, 1, 4, 2, 3], 2, async (n) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, n));
      inFlight--;
      return n * 10;
    });

    expect(results).toEqual([50, 10, 40, 20, 30]);
    expect(peak).toBe(2);
  });

  it("treats a non-positive limit as one worker", async () => {
    const results = await mapWithConcurrency([1, 2], 0, async (n) => n + 1);
    expect(results).toEqual([2, 3]);
  });
});

describe("sortByRelatedness", () => {
  it("does not mutate its input", () => {
    const input = [{ relatednessScore: 0.1 }, { relatednessScore: 0.9 }];
    const sorted = sortByRelatedness(input);
    expect(sorted.map((r) => r.relatednessScore)).toEqual([0.9, 0.1]);
    expect(input.map((r) => r.relatednessScore)).toEqual([0.1, 0.9]);
  });
});
