/**
 * Backlog audit: Tiers 1 and 2 over a whole set of open PRs, summarised as
 * verdict counts, duplicate clusters, the riskiest PRs and contributor stats.
 */

import type {
  AuditReport,
  AuditRiskEntry,
  EmbeddingIndex,
  HeuristicResult,
  PullRequest,
  VisionDocument,
} from './types';
import type { GateConfig } from './config';
import { DedupEngine } from './dedup';
import { HeuristicEngine, parseTime } from './heuristics';
import { createLogger } from './logger';

const log = createLogger('audit');

export const AUDIT_CLUSTER_THRESHOLDS = [0.9, 0.85, 0.8] as const;
const MAX_RISK_ENTRIES = 15;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface AuditOptions {
  vision?: VisionDocument;
  /** Shown in the report, usually the vision file's base name */
  visionName?: string;
  now?: () => Date;
}

const highCount = (r: HeuristicResult) => r.flags.filter(f => f.severity === 'high').length;

function compareRisk(a: HeuristicResult, b: HeuristicResult): number {
  return (highCount(b) - highCount(a))
    || (b.flags.length - a.flags.length)
    || (b.score - a.score);
}

export function runAudit(
  prs: readonly PullRequest[],
  embeddings: EmbeddingIndex,
  config: GateConfig,
  opts: AuditOptions = {},
): AuditReport {
  const now = opts.now ?? (() => new Date());
  const dedup = new DedupEngine(config);
  const heuristics = new HeuristicEngine(config, now);

  const clusters = AUDIT_CLUSTER_THRESHOLDS.map(threshold => ({
    threshold,
    clusters: dedup.clusters(prs, embeddings, threshold),
  }));

  // Everything but the anchor of a 0.90 cluster is a close candidate
  const duplicates = new Set<number>();
  for (const cluster of clusters[0].clusters) {
    for (const member of cluster.members.slice(1)) duplicates.add(member.number);
  }

  const assessed = prs.map(pr => ({
    pr,
    result: heuristics.assessPullRequest(pr, { peers: prs, extraSensitivePaths: opts.vision?.focusAreas }),
  }));

  let fastTrack = 0;
  let reviewRequired = 0;
  for (const { pr, result } of assessed) {
    if (duplicates.has(pr.number)) continue;
    if (result.outcome === 'gated') reviewRequired++;
    else fastTrack++;
  }

  const counts = new Map<string, number>();
  for (const { result } of assessed) {
    for (const f of result.flags) counts.set(f.ruleId, (counts.get(f.ruleId) ?? 0) + 1);
  }
  const flagFrequency = Object.fromEntries([...counts.entries()].sort((a, b) => b[1] - a[1]));

  const highestRisk: AuditRiskEntry[] = [];
  for (const { pr, result } of [...assessed].sort((a, b) => compareRisk(a.result, b.result)).slice(0, MAX_RISK_ENTRIES)) {
    if (result.flags.length === 0) break;
    highestRisk.push({
      prNumber: pr.number,
      title: pr.title,
      author: pr.author.login,
      score: Math.round(result.score * 1000) / 1000,
      flagCount: result.flags.length,
      highSeverityCount: highCount(result),
      flags: result.flags.map(f => f.ruleId),
    });
  }

  const nowMs = now().getTime();
  const hasFlag = (r: HeuristicResult, id: string) => r.flags.some(f => f.ruleId === id);

  const report: AuditReport = {
    owner: prs[0]?.owner ?? '',
    repo: prs[0]?.repo ?? '',
    prsAnalyzed: prs.length,
    fastTrackCount: fastTrack,
    reviewRequiredCount: reviewRequired,
    recommendCloseCount: duplicates.size,
    clusters,
    highestRisk,
    flagFrequency,
    uniqueAuthors: new Set(prs.map(pr => pr.author.login)).size,
    firstTimeContributors: prs.filter(pr => pr.author.contributionsToRepo === 0).length,
    newAccounts: prs.filter(pr => {
      const created = parseTime(pr.author.accountCreatedAt);
      return created !== undefined && nowMs - created < config.newAccountDays * DAY_MS;
    }).length,
    sensitivePathPRs: assessed.filter(a => hasFlag(a.result, 'sensitive_paths')).length,
    lowTestPRs: assessed.filter(a => hasFlag(a.result, 'low_test_ratio')).length,
    ...(opts.visionName ? { visionDocument: opts.visionName } : {}),
  };

  log.info({
    prs: prs.length,
    fastTrack,
    reviewRequired,
    recommendClose: duplicates.size,
  }, 'Audit complete');
  return report;
}
