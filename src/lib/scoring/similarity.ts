// lib/scoring/similarity.ts

/**
 * Cosine similarity. Zero-norm (or empty) input yields 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return dot / denom;
}

export function centroid(vectors: number[][]): number[] | null {
  if (vectors.length === 0) return null;
  const dims = vectors[0].length;
  const sum = new Array<number>(dims).fill(0);

  for (const vector of vectors) {
    for (let i = 0; i < dims; i++) {
      sum[i] += vector[i] ?? 0;
    }
  }
  return sum.map((value) => value / vectors.length);
}

export interface EmbeddingAnchor {
  placementId: number;
  embedding: number[];
}

export interface IdealEmbedding {
  vector: number[] | null;
  /** Placement most similar to the job description. */
  bestPlacementId: number | null;
}

/**
 * Centroid of the top-K anchors ranked by similarity to the JD embedding.
 * Ties keep anchor order.
 */
export function computeIdealEmbedding(
  jdEmbedding: number[],
  anchors: EmbeddingAnchor[],
  topK: number = 3
): IdealEmbedding {
  if (anchors.length === 0) {
    return { vector: null, bestPlacementId: null };
  }

  const ranked = anchors
    .map((anchor, index) => ({ anchor, index, similarity: cosineSimilarity(jdEmbedding, anchor.embedding) }))
    .sort((a, b) => b.similarity - a.similarity || a.index - b.index)
    .slice(0, topK);

  return {
    vector: centroid(ranked.map((r) => r.anchor.embedding)),
    bestPlacementId: ranked[0].anchor.placementId,
  };
}

export interface ClosestPlacement {
  placementId: number;
  similarity: number;
}

/**
 * Most similar anchor to a candidate embedding. The first anchor wins ties.
 */
export function findClosestPlacement(
  candidateEmbedding: number[],
  anchors: EmbeddingAnchor[]
): ClosestPlacement | null {
  let best: ClosestPlacement | null = null;

  for (const anchor of anchors) {
    const similarity = cosineSimilarity(candidateEmbedding, anchor.embedding);
    if (best === null || similarity > best.similarity) {
      best = { placementId: anchor.placementId, similarity };
    }
  }
  return best;
}
