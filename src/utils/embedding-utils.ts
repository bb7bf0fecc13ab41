/**
 * Embedding serialization and similarity.
 * Used by the vector store for SQLite BLOB storage and brute-force search.
 */

/**
 * Serialize an embedding to a Buffer for SQLite storage.
 *
 * Uses Float32Array (4 bytes per dimension).
 */
export function serializeEmbedding(embedding: readonly number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

/**
 * Deserialize an embedding from a SQLite Buffer.
 *
 * Reconstructs the Float32Array from the raw buffer bytes,
 * handling byte offset alignment properly.
 */
export function deserializeEmbedding(buffer: Buffer): number[] {
  const float32 = new Float32Array(
    buffer.buffer,
    buffer.byteOffset,
    buffer.length / Float32Array.BYTES_PER_ELEMENT,
  );
  return Array.from(float32);
}

/**
 * Dot product over the shorter of the two vectors.
 */
export function dot(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * L2 norm of a vector.
 */
export function norm(a: readonly number[]): number {
  return Math.sqrt(dot(a, a));
}

/**
 * Cosine similarity in [-1, 1]. Zero vectors and mismatched dimensions score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return 0;
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  // Clamp to [-1, 1] to absorb floating point error
  return Math.max(-1, Math.min(1, dot(a, b) / (na * nb)));
}

/**
 * Similarity score in [0, 1]: cosine with opposite directions floored at 0.
 */
export function similarityScore(a: readonly number[], b: readonly number[]): number {
  return Math.max(0, cosineSimilarity(a, b));
}
