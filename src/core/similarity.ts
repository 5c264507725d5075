/**
 * SimilarityEngine: the embedding math shared by dedup, clustering,
 * linking, staleness, conflict detection and labeling.
 *
 * Everything here is a pure function over plain number arrays.
 */

import type { ClusterMember, Embedding } from './types';
import { EmbeddingShapeError } from './errors';

export type SimilarityMatrix = number[][];

export interface Match {
  number: number | null;
  similarity: number;
}

/** Anything with a number can be matched; titles/authors are only needed for clusters */
export interface Numbered {
  number: number;
}

export interface ClusterCandidate extends Numbered {
  title: string;
  author: { login: string };
}

function norm(v: Embedding): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

function dot(a: Embedding, b: Embedding): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

function checkShape(a: Embedding, b: Embedding): void {
  if (a.length > 0 && b.length > 0 && a.length !== b.length) {
    throw new EmbeddingShapeError(a.length, b.length);
  }
}

/** 0 when either vector is empty or all-zero */
export function cosineSimilarity(a: Embedding, b: Embedding): number {
  checkShape(a, b);
  if (a.length === 0 || b.length === 0) return 0;
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  return dot(a, b) / (na * nb);
}

function normalize(v: Embedding): Embedding {
  const n = norm(v);
  if (n === 0) return v.map(() => 0);
  return v.map(x => x / n);
}

/**
 * rows × cols cosine matrix. Each vector is normalised once up front so the
 * inner loop is a plain dot product.
 */
export function similarityMatrix(rows: readonly Embedding[], cols: readonly Embedding[]): SimilarityMatrix {
  if (rows.length === 0 || cols.length === 0) return [];
  const r = rows.map(normalize);
  const c = cols.map(normalize);
  return r.map(a => c.map(b => {
    checkShape(a, b);
    if (a.length === 0 || b.length === 0) return 0;
    return dot(a, b);
  }));
}

/**
 * Highest-scoring candidate other than the subject itself. Ties keep the
 * first candidate seen; nothing above 0 yields `{ number: null, similarity: 0 }`.
 */
export function bestMatch<T extends Numbered>(
  subject: Numbered,
  subjectEmbedding: Embedding,
  candidates: readonly T[],
  embeddingOf: (candidate: T) => Embedding | undefined,
): Match {
  let best: Match = { number: null, similarity: 0 };
  for (const candidate of candidates) {
    if (candidate.number === subject.number) continue;
    const emb = embeddingOf(candidate);
    if (!emb) continue;
    const sim = cosineSimilarity(subjectEmbedding, emb);
    if (sim > best.similarity) best = { number: candidate.number, similarity: sim };
  }
  return best;
}

/**
 * Like bestMatch, but a candidate is only eligible when it clears the
 * threshold and `isAfter(candidate, subject)` holds. Used to keep a merged PR from
 * "superseding" work that was opened after it landed.
 */
export function temporalGuardedMatch<S extends Numbered, T extends Numbered>(
  subject: S,
  subjectEmbedding: Embedding,
  candidates: readonly T[],
  embeddingOf: (candidate: T) => Embedding | undefined,
  threshold: number,
  isAfter: (candidate: T, subject: S) => boolean,
): { candidate: T | null; similarity: number } {
  let best: T | null = null;
  let bestSim = 0;
  for (const candidate of candidates) {
    if (candidate.number === subject.number) continue;
    const emb = embeddingOf(candidate);
    if (!emb) continue;
    const sim = cosineSimilarity(subjectEmbedding, emb);
    if (sim < threshold || sim <= bestSim) continue;
    if (!isAfter(candidate, subject)) continue;
    best = candidate;
    bestSim = sim;
  }
  return { candidate: best, similarity: bestSim };
}

/**
 * Connected components of the `sim >= threshold` graph, discovered by BFS in
 * input order. Items without an embedding and singleton components are
 * dropped. Quadratic in the number of items.
 */
export function findClusters<T extends ClusterCandidate>(
  items: readonly T[],
  embeddings: ReadonlyMap<number, Embedding>,
  threshold: number,
): ClusterMember[][] {
  const nodes = items.filter(item => embeddings.has(item.number));
  const matrix = similarityMatrix(
    nodes.map(n => embeddings.get(n.number) ?? []),
    nodes.map(n => embeddings.get(n.number) ?? []),
  );

  const adjacency: number[][] = nodes.map(() => []);
  for (let i = 0; i < nodes.length; i++) {
    for (let j = i + 1; j < nodes.length; j++) {
      if (matrix[i][j] >= threshold) {
        adjacency[i].push(j);
        adjacency[j].push(i);
      }
    }
  }

  const visited = new Set<number>();
  const clusters: ClusterMember[][] = [];

  for (let start = 0; start < nodes.length; start++) {
    if (visited.has(start) || adjacency[start].length === 0) continue;

    const component: number[] = [];
    const queue = [start];
    visited.add(start);
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      component.push(current);
      for (const next of adjacency[current]) {
        if (!visited.has(next)) {
          visited.add(next);
          queue.push(next);
        }
      }
    }

    clusters.push(component.map(idx => ({
      number: nodes[idx].number,
      title: nodes[idx].title,
      author: nodes[idx].author.login,
      similarity: idx === start
        ? null
        : Math.max(...adjacency[idx].map(n => matrix[idx][n])),
    })));
  }

  return clusters;
}

/** weightA·a + (1 − weightA)·b; weights are range-checked by config, not here */
export function blend(scoreA: number, weightA: number, scoreB: number): number {
  return weightA * scoreA + (1 - weightA) * scoreB;
}

export function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}
