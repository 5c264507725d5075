/**
 * Issue ↔ PR linking: explicit references plus embedding-suggested links
 */

import type { EmbeddingIndex, Issue, LinkSuggestion, LinkingReport, PullRequest } from './types';
import type { GateConfig } from './config';
import { similarityMatrix } from './similarity';
import { createLogger } from './logger';

const log = createLogger('linking');

const pairKey = (pr: number, issue: number) => `${pr}:${issue}`;

export function findIssuePrLinks(
  prs: readonly PullRequest[],
  issues: readonly Issue[],
  embeddings: EmbeddingIndex,
  config: GateConfig,
): LinkingReport {
  const threshold = config.linkingThreshold;
  const first = prs[0] ?? issues[0];
  const report: LinkingReport = {
    owner: first?.owner ?? '',
    repo: first?.repo ?? '',
    totalPRs: prs.length,
    totalIssues: issues.length,
    threshold,
    suggestions: [],
    explicitLinks: [],
    orphanIssues: [],
  };

  if (prs.length === 0 || issues.length === 0) {
    report.orphanIssues = issues.map(i => i.number).sort((a, b) => a - b);
    return report;
  }

  const issueByNumber = new Map(issues.map(i => [i.number, i]));
  const explicit = new Set<string>();
  const linked = new Set<number>();

  for (const pr of prs) {
    for (const n of pr.linkedIssues) {
      explicit.add(pairKey(pr.number, n));
      const issue = issueByNumber.get(n);
      if (!issue) continue;
      report.explicitLinks.push({
        prNumber: pr.number,
        issueNumber: n,
        similarity: 1,
        prTitle: pr.title,
        issueTitle: issue.title,
        isExplicit: true,
      });
      linked.add(n);
    }
  }

  // Missing embeddings score 0 against everything and so never suggest a link
  const sim = similarityMatrix(
    prs.map(pr => embeddings.get(pr.number) ?? []),
    issues.map(issue => embeddings.get(issue.number) ?? []),
  );

  const suggestions: LinkSuggestion[] = [];
  prs.forEach((pr, i) => {
    issues.forEach((issue, j) => {
      const s = sim[i][j];
      if (s < threshold || explicit.has(pairKey(pr.number, issue.number))) return;
      suggestions.push({
        prNumber: pr.number,
        issueNumber: issue.number,
        similarity: s,
        prTitle: pr.title,
        issueTitle: issue.title,
        isExplicit: false,
      });
      linked.add(issue.number);
    });
  });

  suggestions.sort((a, b) => b.similarity - a.similarity);
  report.suggestions = suggestions;
  report.orphanIssues = issues
    .map(i => i.number)
    .filter(n => !linked.has(n))
    .sort((a, b) => a - b);

  log.info(
    { suggestions: suggestions.length, explicit: report.explicitLinks.length, orphans: report.orphanIssues.length },
    'Linking complete',
  );
  return report;
}
