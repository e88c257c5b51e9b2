/**
 * Embedding module: pluggable provider interface + Ollama and OpenAI
 * implementations.
 *
 * Every backend failure surfaces as an EmbeddingFailure, and every response
 * shape is normalized to a plain EmbeddingVector before it leaves this module.
 */

import { z } from "zod";
import type { EmbeddingVector } from "@/types";
import {
  EMBEDDING_BACKEND,
  EMBEDDING_MODEL,
  OLLAMA_BASE_URL,
  getOpenAIApiKey,
} from "./config";
import { EmbeddingFailure } from "./errors";

// ---------------------------------------------------------------------------
// Provider Interface
// ---------------------------------------------------------------------------

/** A pluggable embedding provider. */
export interface EmbeddingProvider {
  /** Generate an embedding vector for the given text. Rejects with EmbeddingFailure. */
  embed(text: string): Promise<EmbeddingVector>;
  /** Identifier of the model this provider uses. */
  readonly model: string;
}

// ---------------------------------------------------------------------------
// Response normalization
// ---------------------------------------------------------------------------

const vectorSchema = z.array(z.number().finite()).nonempty();

// Backends answer with a bare list, a single `embedding`, a batch of
// `embeddings`, or OpenAI's `data` envelope.
const embeddingResponseSchema = z.union([
  vectorSchema,
  z.object({ embedding: vectorSchema }),
  z.object({ embeddings: z.array(vectorSchema).nonempty() }),
  z.object({ data: z.array(z.object({ embedding: vectorSchema })).nonempty() }),
]);

/**
 * Reduce any supported embedding response body to a single vector.
 * Throws EmbeddingFailure when the body matches none of the known shapes.
 */
export function normalizeEmbeddingResponse(body: unknown): EmbeddingVector {
  const parsed = embeddingResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new EmbeddingFailure(
      "Unexpected embedding response: missing embedding data",
    );
  }

  const value = parsed.data;
  if (Array.isArray(value)) return value;
  if ("embedding" in value) return value.embedding;
  if ("embeddings" in value) return value.embeddings[0];
  return value.data[0].embedding;
}

/** POST a JSON body and return the normalized vector from the response. */
async function requestEmbedding(
  service: string,
  url: string,
  headers: Record<string, string>,
  payload: unknown,
): Promise<EmbeddingVector> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(payload),
    });
  } catch (error) {
    throw new EmbeddingFailure(`${service} embedding request failed: ${describe(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    const body = await response.text();
    throw new EmbeddingFailure(
      `${service} embedding request failed (${response.status}): ${body}`,
    );
  }

  let json: unknown;
  try {
    json = await response.json();
  } catch (error) {
    throw new EmbeddingFailure(`${service} returned a non-JSON embedding response`, {
      cause: error,
    });
  }

  return normalizeEmbeddingResponse(json);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function assertEmbeddable(text: string): void {
  if (!text.trim()) {
    throw new EmbeddingFailure("Cannot embed empty text");
  }
}

// ---------------------------------------------------------------------------
// Ollama Provider
// ---------------------------------------------------------------------------

/** Create an EmbeddingProvider backed by a local Ollama server (`/api/embed`). */
export function createOllamaProvider(
  baseUrl: string = OLLAMA_BASE_URL,
  model: string = EMBEDDING_MODEL,
): EmbeddingProvider {
  const url = `${baseUrl.replace(/\/+$/, "")}/api/embed`;
  return {
    model,

    async embed(text: string): Promise<EmbeddingVector> {
      assertEmbeddable(text);
      return requestEmbedding("Ollama", url, {}, { model, input: text });
    },
  };
}

// ---------------------------------------------------------------------------
// OpenAI Provider
// ---------------------------------------------------------------------------

/**
 * Create an EmbeddingProvider backed by the OpenAI embeddings API.
 *
 * The API key is resolved on the first request, so constructing the provider
 * never throws.
 */
export function createOpenAIProvider(
  apiKey?: string,
  model: string = EMBEDDING_MODEL,
): EmbeddingProvider {
  return {
    model,

    async embed(text: string): Promise<EmbeddingVector> {
      assertEmbeddable(text);
      let key: string;
      try {
        key = apiKey ?? getOpenAIApiKey();
      } catch (error) {
        throw new EmbeddingFailure(describe(error), { cause: error });
      }
      return requestEmbedding(
        "OpenAI",
        "https://api.openai.com/v1/embeddings",
        { Authorization: `Bearer ${key}` },
        { input: text, model },
      );
    },
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** The provider selected by EMBEDDING_BACKEND. */
export function createEmbeddingProvider(): EmbeddingProvider {
  return EMBEDDING_BACKEND === "openai"
    ? createOpenAIProvider()
    : createOllamaProvider();
}
