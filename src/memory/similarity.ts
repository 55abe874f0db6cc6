// ── Similarity Measures ──────────────────────────────────

/** Cosine similarity; 0 when either vector is zero or lengths differ. */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[],
): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Lower-cased alphanumeric tokens, deduplicated. */
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []);
}

/**
 * Fraction of query tokens present in the candidate: |Q ∩ C| / |Q|.
 * An empty query matches nothing.
 */
export function keywordOverlap(query: string, candidate: string): number {
  const q = tokenize(query);
  if (q.size === 0) return 0;
  const c = tokenize(candidate);

  let shared = 0;
  for (const token of q) {
    if (c.has(token)) shared++;
  }
  return shared / q.size;
}
