import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import {
  createOllamaProvider,
  createOpenAIProvider,
  normalizeEmbeddingResponse,
} from "./embeddings";
import { EmbeddingFailure } from "./errors";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** A fake embedding vector for testing. */
const FAKE_VECTOR = [0.1, 0.2, 0.3, 0.4, 0.5];

/** Build a successful response carrying an arbitrary JSON body. */
function fakeJsonResponse(body: unknown) {
  return {
    ok: true,
    status: 200,
    json: async () => body,
    text: async () => JSON.stringify(body),
  } as unknown as Response;
}

/** Build a failed response. */
function fakeErrorResponse(status: number, body: string) {
  return {
    ok: false,
    status,
    json: async () => ({}),
    text: async () => body,
  } as unknown as Response;
}

// ---------------------------------------------------------------------------
// normalizeEmbeddingResponse
// ---------------------------------------------------------------------------

describe("normalizeEmbeddingResponse", () => {
  it("accepts a bare list", () => {
    expect(normalizeEmbeddingResponse(FAKE_VECTOR)).toEqual(FAKE_VECTOR);
  });

  it("accepts a single embedding mapping", () => {
    expect(normalizeEmbeddingResponse({ embedding: FAKE_VECTOR })).toEqual(FAKE_VECTOR);
  });

  it("takes the first vector of an embeddings batch", () => {
    expect(
      normalizeEmbeddingResponse({ model: "m", embeddings: [FAKE_VECTOR, [9, 9]] }),
    ).toEqual(FAKE_VECTOR);
  });

  it("unwraps the OpenAI data envelope", () => {
    expect(
      normalizeEmbeddingResponse({
        data: [{ embedding: FAKE_VECTOR, index: 0 }],
        model: "text-embedding-3-small",
      }),
    ).toEqual(FAKE_VECTOR);
  });

  it.each([
    ["an empty list", []],
    ["an empty data envelope", { data: [] }],
    ["non-numeric values", { embedding: ["a", "b"] }],
    ["null", null],
    ["an unrelated object", { error: "model not found" }],
  ])("rejects %s", (_label, body) => {
    expect(() => normalizeEmbeddingResponse(body)).toThrow(EmbeddingFailure);
  });
});

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

describe("createOllamaProvider", () => {
  let fetchSpy: MockInstance<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, "fetch");
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it("posts to /api/embed and returns the first vector", async () => {
    fetchSpy.mockResolvedValueOnce(
      fakeJsonResponse({ model: "snowflake-arctic-embed:latest", embeddings: [FAKE_VECTOR] }),
    );

    const provider = createOllamaProvider("http://ollama.test:11434/", "snowflake-arctic-embed:latest");
    const result = await provider.embed("graph neural networks");

    expect(result).toEqual(FAKE_VECTOR);
    expect(provider.model).toBe("snowflake-arctic-embed:latest");

    const [url, options] = fetchSpy.mock.calls[0] as [string, RequestInit];
    expect(url).toBe("http://ollama.test:11434/api/embed");
    expect(options.method).toBe("POST");
    expect(JSON.parse(options.body as string)).toEqual({
      model: "snowflake-arctic-embed:latest",
      input: "graph neural networks",
    });
  });

  it("throws on empty text without calling the server", async () => {
    const provider = createOllamaProvider("http://ollama.test:11434", "m");
    await expect(provider.embed("  \n ")).rejects.toThrow("Cannot embed empty text");
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("wraps transport errors in EmbeddingFailure", async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError("fetch failed"));

    const provider = createOllamaProvider("http://ollama.test:11434", "m");
    const error = await provider.embed("text").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingFailure);
    expect((error as Error).message).toBe(
      "Ollama embedding request failed: fetch failed",
    );
  });

  it("throws on non-OK HTTP response", async () => {
    fetchSpy.mockResolvedValueOnce(fakeErrorResponse(404, "model not found"));

    const provider = createOllamaProvider("http://ollama.test:11434", "missing");
    await expect(provider.embed("text")).rejects.toThrow(
      "Ollama embedding request failed (404): model not found",
    );
  });
});

describe("createOpenAIProvider", () => {
  let fetchSpy: MockInstance<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, "fetch");
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it("calls the OpenAI embeddings endpoint with a bearer token", async () => {
    fetchSpy.mockResolvedValueOnce(
      fakeJsonResponse({ data: [{ embedding: FAKE_VECTOR, index: 0 }] }),
    );

    const provider = createOpenAIProvider("test-key", "text-embedding-3-small");
    const result = await provider.embed("hello world");

    expect(result).toEqual(FAKE_VECTOR);
    const [url, options] = fetchSpy.mock.calls[0] as [string, RequestInit];
    expect(url).toBe("https://api.openai.com/v1/embeddings");
    expect(options.headers).toEqual(
      expect.objectContaining({
        Authorization: "Bearer test-key",
        "Content-Type": "application/json",
      }),
    );
    expect(JSON.parse(options.body as string)).toEqual({
      input: "hello world",
      model: "text-embedding-3-small",
    });
  });

  it("throws when response data is malformed", async () => {
    fetchSpy.mockResolvedValueOnce(fakeJsonResponse({ data: [] }));

    const provider = createOpenAIProvider("test-key");
    await expect(provider.embed("test")).rejects.toThrow(
      "Unexpected embedding response: missing embedding data",
    );
  });

  it("throws on non-OK HTTP response", async () => {
    fetchSpy.mockResolvedValueOnce(fakeErrorResponse(401, "Invalid API key"));

    const provider = createOpenAIProvider("bad-key");
    await expect(provider.embed("test")).rejects.toThrow(
      "OpenAI embedding request failed (401): Invalid API key",
    );
  });
});
