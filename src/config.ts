/**
 * Centralized configuration for the search pipeline.
 *
 * Every tunable lives here. Values fall back to sensible defaults
 * and can be overridden via environment variables.
 *
 * Secrets are read lazily (on first access, or on every call for the
 * Custom Search credentials and the data directory) so that importing
 * this module in tests does not throw.
 */

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optionalEnv(name: string, fallback: string): string {
  return process.env[name] || fallback;
}

function optionalNumericEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${name} must be a number, got: ${raw}`);
  }
  return parsed;
}

/** Backends that can serve both embeddings and chat completions. */
export type ModelBackend = "ollama" | "openai";

function backendEnv(name: string, fallback: ModelBackend): ModelBackend {
  const raw = optionalEnv(name, fallback);
  if (raw !== "ollama" && raw !== "openai") {
    throw new Error(`Environment variable ${name} must be "ollama" or "openai", got: ${raw}`);
  }
  return raw;
}

/**
 * Create a lazy getter that defers validation until first access.
 * The resolved value is cached after the first successful read.
 */
function lazyRequired(name: string): { get value(): string } {
  let cached: string | undefined;
  return {
    get value(): string {
      if (cached === undefined) {
        cached = requireEnv(name);
      }
      return cached;
    },
  };
}

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------

/**
 * Directory under which saved searches are written, one subdirectory per
 * engine. Read from the environment on every call.
 */
export function getDataDir(): string {
  return optionalEnv("DATA_DIR", "data");
}

// ---------------------------------------------------------------------------
// Model backends
// ---------------------------------------------------------------------------

/** Base URL of the local Ollama server. */
export const OLLAMA_BASE_URL = optionalEnv(
  "OLLAMA_BASE_URL",
  "http://localhost:11434",
);

const _openaiApiKey = lazyRequired("OPENAI_API_KEY");

/** OpenAI API key (validated on first access). Only needed for OpenAI backends. */
export function getOpenAIApiKey(): string {
  return _openaiApiKey.value;
}

// ---------------------------------------------------------------------------
// Embedding
// ---------------------------------------------------------------------------

/** Which service produces embeddings. */
export const EMBEDDING_BACKEND = backendEnv("EMBEDDING_BACKEND", "ollama");

/** Embedding model; the default depends on the backend. */
export const EMBEDDING_MODEL = optionalEnv(
  "EMBEDDING_MODEL",
  EMBEDDING_BACKEND === "openai"
    ? "text-embedding-3-small"
    : "snowflake-arctic-embed:latest",
);

/** Maximum number of candidate embedding requests in flight at once. */
export const EMBEDDING_CONCURRENCY = optionalNumericEnv(
  "EMBEDDING_CONCURRENCY",
  4,
);

// ---------------------------------------------------------------------------
// Query formulation
// ---------------------------------------------------------------------------

/** Which service turns free text into a keyword string. */
export const LLM_BACKEND = backendEnv("LLM_BACKEND", "ollama");

/** Chat model used for keyword generation. */
export const LLM_MODEL = optionalEnv(
  "LLM_MODEL",
  LLM_BACKEND === "openai" ? "gpt-4o-mini" : "llama3",
);

/** Sampling temperature for keyword generation. */
export const LLM_TEMPERATURE = optionalNumericEnv("LLM_TEMPERATURE", 0.6);

// ---------------------------------------------------------------------------
// Search engines
// ---------------------------------------------------------------------------

/** arXiv export API base URL. */
export const ARXIV_API_BASE = optionalEnv(
  "ARXIV_API_BASE",
  "https://export.arxiv.org/api",
);

/** Number of papers requested from arXiv per search. */
export const ARXIV_MAX_RESULTS = optionalNumericEnv("ARXIV_MAX_RESULTS", 10);

/** Google Custom Search JSON API endpoint. */
export const CSE_API_URL = optionalEnv(
  "CSE_API_URL",
  "https://www.googleapis.com/customsearch/v1",
);

/** Google Custom Search API key, read from the environment on every call. */
export function getCseApiKey(): string {
  return requireEnv("GOOGLE_CSE_KEY");
}

/** Google Custom Search engine identifier, read on every call. */
export function getCseEngineId(): string {
  return requireEnv("GOOGLE_CSE_ID");
}
