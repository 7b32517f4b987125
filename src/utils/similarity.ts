/**
 * Vector similarity utilities for embedding comparison.
 *
 * Retrieval scores are cosine similarity clamped into [0, 1]:
 * vectors pointing away from the query (negative cosine) score 0.
 */

/**
 * Compute the dot product of two vectors.
 */
export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Compute the L2 norm of a vector.
 */
export function norm(a: readonly number[]): number {
  return Math.sqrt(dot(a, a));
}

/**
 * Cosine similarity between two vectors. Returns [-1, 1].
 * A zero vector has no direction and scores 0 against everything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const d = dot(a, b);
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  // Clamp to [-1, 1] to handle floating point errors
  return Math.max(-1, Math.min(1, d / (na * nb)));
}

/**
 * Retrieval similarity in [0, 1].
 */
export function similarityScore(a: readonly number[], b: readonly number[]): number {
  return Math.max(0, cosineSimilarity(a, b));
}

/**
 * True when every component is a finite number and there is at least one.
 */
export function isUsableVector(v: readonly number[]): boolean {
  return v.length > 0 && v.every((x) => Number.isFinite(x));
}
