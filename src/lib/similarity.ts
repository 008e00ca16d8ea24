/**
 * Vector similarity
 */

/**
 * Cosine similarity between two vectors.
 *
 * Vectors are compared as given; magnitude is factored out here rather than
 * at write time. Mismatched lengths or a zero-magnitude vector yield 0.
 */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[]
): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dotProduct += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  const similarity = dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
  // Rounding can push parallel vectors slightly past 1
  return Math.max(-1, Math.min(1, similarity));
}
