/**
 * Embedding types.
 *
 * Embeddings map text into vector space for relatedness scoring. Vectors are
 * transient: only the resulting score is ever persisted.
 */

/** A dense vector of provider-defined dimension. */
export type EmbeddingVector = number[];
