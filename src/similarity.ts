/**
 * Similarity module: relatedness between two embedding vectors.
 *
 * Pure math, no external dependencies. Relatedness is one minus the cosine
 * distance, i.e. the cosine similarity of the two vectors.
 */

import type { EmbeddingVector } from "@/types";
import { InvalidDimensionError } from "./errors";

/**
 * Compute the relatedness (cosine similarity) of two vectors.
 *
 * Returns a value in [-1, 1] where 1 means identical direction,
 * 0 means orthogonal, and -1 means opposite direction.
 *
 * Throws InvalidDimensionError if the vectors differ in length, are empty,
 * or either has zero magnitude.
 */
export function relatedness(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new InvalidDimensionError(
      `Vector length mismatch: ${a.length} vs ${b.length}`,
    );
  }

  if (a.length === 0) {
    throw new InvalidDimensionError("Cannot compute relatedness of empty vectors");
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(magA) * Math.sqrt(magB);

  if (magnitude === 0) {
    throw new InvalidDimensionError(
      "Cannot compute relatedness: zero magnitude vector",
    );
  }

  return dot / magnitude;
}
