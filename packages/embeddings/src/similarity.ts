import { InvariantViolationError } from "@docpipe/errors";

/** Cosine similarity in [-1, 1]; a zero vector is similar to nothing. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new InvariantViolationError(
      `Vector dimension mismatch: ${String(a.length)} vs ${String(b.length)}`,
    );
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  const cosine = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.min(1, Math.max(-1, cosine));
}

export function meanVector(vectors: readonly (readonly number[])[]): number[] {
  const first = vectors[0];
  if (!first) throw new InvariantViolationError("Cannot average an empty vector set");
  const sum = new Array<number>(first.length).fill(0);
  for (const vector of vectors) {
    if (vector.length !== first.length) {
      throw new InvariantViolationError("Cannot average vectors of different dimensions");
    }
    vector.forEach((value, i) => {
      sum[i] = (sum[i] ?? 0) + value;
    });
  }
  return sum.map((value) => value / vectors.length);
}
