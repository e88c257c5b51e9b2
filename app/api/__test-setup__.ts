/**
 * Shared test utilities for API route tests.
 *
 * Provides environment setup with a throwaway data directory, fetch spy
 * registration, and fake responses for the model and search services.
 */

import { beforeEach, afterEach, vi } from "vitest";
import type { MockInstance } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

/**
 * Register beforeEach/afterEach hooks that point DATA_DIR at a fresh
 * temporary directory and remove it afterwards.
 *
 * Always sets DATA_DIR, GOOGLE_CSE_KEY and GOOGLE_CSE_ID. Pass additional
 * variables in `extra` when a test suite needs them.
 *
 * Returns a container whose `.dataDir` holds the active directory; read it
 * inside the test body, since it changes before each test.
 */
export function setupTestEnv(extra: Record<string, string> = {}): { dataDir: string } {
  const ref = { dataDir: "" };
  const envVars: Record<string, string> = {
    GOOGLE_CSE_KEY: "test-cse-key",
    GOOGLE_CSE_ID: "test-cse-id",
    ...extra,
  };

  beforeEach(() => {
    ref.dataDir = mkdtempSync(path.join(tmpdir(), "route-test-"));
    process.env.DATA_DIR = ref.dataDir;
    for (const [key, value] of Object.entries(envVars)) {
      process.env[key] = value;
    }
  });

  afterEach(() => {
    rmSync(ref.dataDir, { recursive: true, force: true });
    delete process.env.DATA_DIR;
    for (const key of Object.keys(envVars)) {
      delete process.env[key];
    }
  });

  return ref;
}

/**
 * Register beforeEach/afterEach hooks for the global fetch spy.
 *
 * Returns a container whose `.spy` property holds the active spy during each
 * test. Access it as `fetchSpy.spy.mockImplementation(...)`.
 */
export function setupFetchSpy(): { spy: MockInstance<typeof fetch> } {
  const ref = { spy: null as unknown as MockInstance<typeof fetch> };

  beforeEach(() => {
    ref.spy = vi.spyOn(globalThis, "fetch");
  });

  afterEach(() => {
    ref.spy.mockRestore();
  });

  return ref;
}

/** Silence the structured log lines the pipeline writes. */
export function silenceLogs(): void {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });
}

/** Fake successful response carrying a JSON body. */
export function fakeJsonResponse(body: unknown): Response {
  return {
    ok: true,
    status: 200,
    json: async () => body,
    text: async () => JSON.stringify(body),
  } as unknown as Response;
}

/** Fake successful response carrying a text body (arXiv answers in Atom XML). */
export function fakeTextResponse(body: string): Response {
  return {
    ok: true,
    status: 200,
    json: async () => ({}),
    text: async () => body,
  } as unknown as Response;
}

/** Fake failed response. */
export function fakeErrorResponse(status: number, body: string): Response {
  return {
    ok: false,
    status,
    json: async () => ({}),
    text: async () => body,
  } as unknown as Response;
}

/** Fake Ollama `/api/chat` answer holding a keyword string. */
export function fakeOllamaKeywords(keywords: string): Response {
  return fakeJsonResponse({
    model: "llama3",
    message: { role: "assistant", content: JSON.stringify({ keywords }) },
    done: true,
  });
}

/** Minimal arXiv Atom feed with one entry per summary. */
export function fakeArxivFeed(summaries: string[]): string {
  const entries = summaries.map(
    (summary, i) => `
  <entry>
    <id>http://arxiv.org/abs/2401.0000${i}v1</id>
    <published>2024-01-0${i + 1}T00:00:00Z</published>
    <title>Paper ${i}</title>
    <summary>${summary}</summary>
    <link href="http://arxiv.org/abs/2401.0000${i}v1" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/2401.0000${i}v1" rel="related" type="application/pdf"/>
  </entry>`,
  );
  return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>arXiv Query</title>${entries.join("")}
</feed>`;
}

/** Read the `input` field of an Ollama `/api/embed` request body. */
export function embedInput(init: RequestInit | undefined): string {
  const body: unknown = JSON.parse(String(init?.body));
  if (typeof body === "object" && body !== null && "input" in body) {
    return String(body.input);
  }
  throw new Error("Not an embedding request");
}
