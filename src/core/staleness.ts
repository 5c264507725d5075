/**
 * Stale detection: open work that a merged PR already covers, PRs blocked on
 * open issues, and anything that has simply gone quiet.
 */

import type {
  EmbeddingIndex,
  Issue,
  PullRequest,
  StaleItem,
  StalenessReport,
} from './types';
import type { GateConfig } from './config';
import { bestMatch, round4, temporalGuardedMatch } from './similarity';
import { parseTime } from './heuristics';
import { createLogger } from './logger';

const log = createLogger('staleness');

const DAY_MS = 24 * 60 * 60 * 1000;

const pct = (n: number) => `${Math.round(n * 100)}%`;

export interface StalenessInput {
  openPRs: readonly PullRequest[];
  openIssues: readonly Issue[];
  mergedPRs: readonly PullRequest[];
  embeddings: EmbeddingIndex;
}

/**
 * A merged PR can only supersede an open one if it landed after the open PR
 * was created. Without a merge time there is nothing to compare, so the
 * candidate is skipped; without a creation time the merge alone suffices.
 */
export function mergedAfterCreated(merged: PullRequest, open: PullRequest): boolean {
  const mergedAt = parseTime(merged.mergedAt);
  if (mergedAt === undefined) return false;
  const createdAt = parseTime(open.createdAt);
  return createdAt === undefined || mergedAt > createdAt;
}

export function findSupersededPRs(
  openPRs: readonly PullRequest[],
  mergedPRs: readonly PullRequest[],
  embeddings: EmbeddingIndex,
  threshold: number,
): StaleItem[] {
  const results: StaleItem[] = [];
  for (const pr of openPRs) {
    const emb = embeddings.get(pr.number);
    if (!emb) continue;
    const { candidate, similarity } = temporalGuardedMatch(
      pr, emb, mergedPRs, m => embeddings.get(m.number), threshold, mergedAfterCreated,
    );
    if (!candidate) continue;
    results.push({
      itemKind: 'pull_request',
      number: pr.number,
      title: pr.title,
      signal: 'superseded',
      relatedNumber: candidate.number,
      relatedTitle: candidate.title,
      similarity: round4(similarity),
      explanation: `PR #${pr.number} is ${pct(similarity)} similar to merged PR #${candidate.number}; likely superseded.`,
    });
  }
  return results;
}

export function findAddressedIssues(
  openIssues: readonly Issue[],
  mergedPRs: readonly PullRequest[],
  embeddings: EmbeddingIndex,
  threshold: number,
): StaleItem[] {
  const results: StaleItem[] = [];
  for (const issue of openIssues) {
    const emb = embeddings.get(issue.number);
    if (!emb) continue;
    const match = bestMatch(issue, emb, mergedPRs, m => embeddings.get(m.number));
    if (match.number === null || match.similarity < threshold) continue;
    const related = mergedPRs.find(m => m.number === match.number);
    results.push({
      itemKind: 'issue',
      number: issue.number,
      title: issue.title,
      signal: 'addressed',
      relatedNumber: match.number,
      relatedTitle: related?.title,
      similarity: round4(match.similarity),
      explanation: `Issue #${issue.number} is ${pct(match.similarity)} similar to merged PR #${match.number}; may already be addressed.`,
    });
  }
  return results;
}

export function findBlockedPRs(openPRs: readonly PullRequest[], openIssues: readonly Issue[]): StaleItem[] {
  const open = new Set(openIssues.map(i => i.number));
  const results: StaleItem[] = [];
  for (const pr of openPRs) {
    const blocking = pr.linkedIssues.filter(n => open.has(n));
    if (blocking.length === 0) continue;
    results.push({
      itemKind: 'pull_request',
      number: pr.number,
      title: pr.title,
      signal: 'blocked',
      relatedNumber: blocking[0],
      explanation: `PR #${pr.number} is blocked by open issue(s): ${blocking.map(n => `#${n}`).join(', ')}.`,
    });
  }
  return results;
}

/** Items without an updatedAt are never flagged; results are oldest first */
export function findInactive(
  items: readonly (PullRequest | Issue)[],
  inactiveDays: number,
  now: Date,
): StaleItem[] {
  const cutoff = now.getTime() - inactiveDays * DAY_MS;
  const inactive: { at: number; item: StaleItem }[] = [];
  for (const item of items) {
    const updated = parseTime(item.updatedAt);
    if (updated === undefined || updated >= cutoff) continue;
    const label = item.kind === 'pull_request' ? 'PR' : 'Issue';
    const day = new Date(updated).toISOString().slice(0, 10);
    inactive.push({
      at: updated,
      item: {
        itemKind: item.kind,
        number: item.number,
        title: item.title,
        signal: 'inactive',
        lastActivity: item.updatedAt,
        explanation: `${label} #${item.number} has had no activity since ${day}.`,
      },
    });
  }
  return inactive.sort((a, b) => a.at - b.at).map(e => e.item);
}

export function detectStaleItems(
  input: StalenessInput,
  config: GateConfig,
  now: Date = new Date(),
): StalenessReport {
  const { openPRs, openIssues, mergedPRs, embeddings } = input;
  const threshold = config.staleSimilarityThreshold;
  const inactiveDays = config.staleInactiveDays;
  const first = openPRs[0] ?? openIssues[0];

  const report: StalenessReport = {
    owner: first?.owner ?? '',
    repo: first?.repo ?? '',
    threshold,
    inactiveDays,
    totalOpenPRs: openPRs.length,
    totalOpenIssues: openIssues.length,
    totalMergedPRsChecked: mergedPRs.length,
    supersededPRs: findSupersededPRs(openPRs, mergedPRs, embeddings, threshold),
    addressedIssues: findAddressedIssues(openIssues, mergedPRs, embeddings, threshold),
    blockedPRs: findBlockedPRs(openPRs, openIssues),
    inactivePRs: findInactive(openPRs, inactiveDays, now),
    inactiveIssues: findInactive(openIssues, inactiveDays, now),
  };

  log.info({
    superseded: report.supersededPRs.length,
    addressed: report.addressedIssues.length,
    blocked: report.blockedPRs.length,
    inactivePRs: report.inactivePRs.length,
    inactiveIssues: report.inactiveIssues.length,
  }, 'Stale detection complete');
  return report;
}
