/**
 * Cross-PR conflict detection: pairs of open PRs that touch the same files or
 * describe the same change, and should be reviewed together or sequenced.
 */

import type { ConflictPair, ConflictReport, EmbeddingIndex, PullRequest } from './types';
import type { GateConfig } from './config';
import { blend, round4, similarityMatrix } from './similarity';
import { createLogger } from './logger';

const log = createLogger('conflicts');

function fileSet(pr: PullRequest): Set<string> {
  return new Set(pr.files.map(f => f.filename));
}

export function overlappingFiles(a: PullRequest, b: PullRequest): string[] {
  const bFiles = fileSet(b);
  return [...fileSet(a)].filter(f => bFiles.has(f)).sort();
}

/** Jaccard index of the two file sets; 0 when both are empty */
export function fileOverlapScore(a: PullRequest, b: PullRequest): number {
  const aFiles = fileSet(a);
  const bFiles = fileSet(b);
  const union = new Set([...aFiles, ...bFiles]);
  if (union.size === 0) return 0;
  let shared = 0;
  for (const f of aFiles) if (bFiles.has(f)) shared++;
  return shared / union.size;
}

export function detectConflicts(
  prs: readonly PullRequest[],
  embeddings: EmbeddingIndex,
  config: GateConfig,
): ConflictReport {
  const weight = config.conflictFileOverlapWeight;
  const threshold = config.conflictThreshold;
  const report: ConflictReport = {
    owner: prs[0]?.owner ?? '',
    repo: prs[0]?.repo ?? '',
    totalOpenPRs: prs.length,
    fileOverlapWeight: weight,
    threshold,
    pairs: [],
  };
  if (prs.length < 2) return report;

  // PRs without an embedding contribute a zero vector, i.e. file overlap only
  const vectors = prs.map(pr => embeddings.get(pr.number) ?? []);
  const sim = similarityMatrix(vectors, vectors);

  const pairs: ConflictPair[] = [];
  for (let i = 0; i < prs.length; i++) {
    for (let j = i + 1; j < prs.length; j++) {
      const jaccard = fileOverlapScore(prs[i], prs[j]);
      const semantic = sim[i]?.[j] ?? 0;
      const confidence = blend(jaccard, weight, semantic);
      if (confidence < threshold) continue;
      pairs.push({
        prA: prs[i].number,
        prB: prs[j].number,
        prATitle: prs[i].title,
        prBTitle: prs[j].title,
        overlappingFiles: overlappingFiles(prs[i], prs[j]),
        fileOverlap: round4(jaccard),
        semanticSimilarity: round4(semantic),
        confidence: round4(confidence),
      });
    }
  }

  pairs.sort((a, b) => b.confidence - a.confidence);
  report.pairs = pairs;
  log.info({ prs: prs.length, pairs: pairs.length }, 'Conflict detection complete');
  return report;
}
