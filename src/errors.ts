/**
 * Error taxonomy for the search pipeline.
 *
 * Each failure mode has its own class so the orchestration layer and the
 * API routes can decide presentation with `instanceof` instead of parsing
 * messages.
 */

import type { SavedSearchKey, SearchEngine } from "@/types";

/** Two vectors cannot be compared (length mismatch, empty, or zero magnitude). */
export class InvalidDimensionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDimensionError";
  }
}

/** The embedding service was unreachable or returned something unusable. */
export class EmbeddingFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingFailure";
  }
}

/**
 * A search engine request failed.
 *
 * `retryable` is true for transport errors, 429 and 5xx responses; the
 * pipeline does not retry, but callers may.
 */
export class ProviderFailure extends Error {
  readonly engine: SearchEngine;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(
    engine: SearchEngine,
    message: string,
    options: { status?: number; retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderFailure";
    this.engine = engine;
    this.status = options.status;
    this.retryable = options.retryable ?? false;
  }
}

/** The language model could not turn the query into a keyword string. */
export class FormulationFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FormulationFailure";
  }
}

/** A saved search could not be read or written. */
export class PersistenceFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceFailure";
  }
}

/** The saved search file for a key does not exist. */
export class SavedSearchNotFoundError extends PersistenceFailure {
  readonly key: SavedSearchKey;

  constructor(key: SavedSearchKey) {
    super(`Saved search not found: ${key.engine}/${key.keywords}`);
    this.name = "SavedSearchNotFoundError";
    this.key = key;
  }
}

/** True for HTTP statuses worth retrying later. */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/** A request carried an unknown engine, an empty query or one that is too long. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}
