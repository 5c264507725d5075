/**
 * DedupEngine: Tier 1 semantic duplicate detection over precomputed embeddings
 */

import type {
  ContributionItem,
  DedupResult,
  DuplicateCluster,
  Embedding,
  EmbeddingIndex,
} from './types';
import type { GateConfig } from './config';
import { bestMatch, findClusters } from './similarity';
import { createLogger } from './logger';

const log = createLogger('dedup');

export class DedupEngine {
  private config: GateConfig;

  constructor(config: GateConfig) {
    this.config = config;
  }

  thresholdFor(item: ContributionItem): number {
    return item.kind === 'pull_request' ? this.config.duplicateThreshold : this.config.issueDuplicateThreshold;
  }

  /**
   * Compare one subject against its peers. Peers without an embedding are
   * ignored; no comparable peer at all is a pass with similarity 0.
   */
  check(
    subject: ContributionItem,
    embedding: Embedding,
    peers: readonly ContributionItem[],
    embeddings: EmbeddingIndex,
  ): DedupResult {
    const threshold = this.thresholdFor(subject);
    const match = bestMatch(subject, embedding, peers, p => embeddings.get(p.number));

    if (match.number !== null && match.similarity >= threshold) {
      log.info({ number: subject.number, duplicateOf: match.number, similarity: match.similarity }, 'Duplicate found');
      return { outcome: 'gated', isDuplicate: true, duplicateOf: match.number, maxSimilarity: match.similarity };
    }
    return { outcome: 'pass', isDuplicate: false, duplicateOf: null, maxSimilarity: match.similarity };
  }

  /** Backlog clustering; defaults to config.clusterThreshold */
  clusters(
    items: readonly ContributionItem[],
    embeddings: EmbeddingIndex,
    threshold = this.config.clusterThreshold,
  ): DuplicateCluster[] {
    const found = findClusters(items, embeddings, threshold).map(members => ({ threshold, members }));
    log.debug({ count: items.length, threshold, clusters: found.length }, 'Clustered items');
    return found;
  }
}
