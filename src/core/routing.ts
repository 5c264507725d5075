/**
 * Review routing: rank likely reviewers for a PR from CODEOWNERS and from who
 * reviewed recent PRs touching the same files. No LLM involved.
 */

import type { CodeOwnerRule, PullRequest, ReviewerSuggestion, ReviewRoutingReport } from './types';
import type { GateConfig } from './config';
import { round4 } from './similarity';
import { createLogger } from './logger';

const log = createLogger('routing');

const CODEOWNER_WEIGHT = 2;
const PAST_REVIEW_WEIGHT = 1;

export function parseCodeowners(content: string): CodeOwnerRule[] {
  const rules: CodeOwnerRule[] = [];
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const [pattern, ...rest] = trimmed.split(/\s+/);
    const owners = rest.filter(o => o.startsWith('@')).map(o => o.slice(1));
    if (pattern && owners.length > 0) rules.push({ pattern, owners });
  }
  return rules;
}

/** Shell-style glob: `*` spans any characters (slashes too), `?` one, the rest literal */
function globToRegExp(pattern: string): RegExp {
  const body = pattern
    .split('')
    .map(ch => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return ch.replace(/[.+^${}()|[\]\\/]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^(?:${body}|.*/${body})$`);
}

/**
 * Owner → reasons for every changed file. Within one file the last matching
 * rule wins, as GitHub applies CODEOWNERS.
 */
export function matchCodeowners(changedFiles: readonly string[], rules: readonly CodeOwnerRule[]): Map<string, string[]> {
  const compiled = rules.map(rule => ({ rule, regex: globToRegExp(rule.pattern) }));
  const reasons = new Map<string, string[]>();

  for (const file of changedFiles) {
    let match: CodeOwnerRule | undefined;
    for (const { rule, regex } of compiled) {
      if (regex.test(file)) match = rule;
    }
    if (!match) continue;
    const reason = `CODEOWNERS: ${match.pattern}`;
    for (const owner of match.owners) {
      const list = reasons.get(owner) ?? [];
      if (!list.includes(reason)) list.push(reason);
      reasons.set(owner, list);
    }
  }
  return reasons;
}

/** Reviewer → number of recent PRs they reviewed that share a file with the subject */
export function pastReviewers(
  changedFiles: readonly string[],
  recentPRs: readonly PullRequest[],
  reviewsByPr: ReadonlyMap<number, readonly string[]>,
): Map<string, number> {
  const changed = new Set(changedFiles);
  const counts = new Map<string, number>();
  for (const pr of recentPRs) {
    if (!pr.files.some(f => changed.has(f.filename))) continue;
    for (const reviewer of reviewsByPr.get(pr.number) ?? []) {
      counts.set(reviewer, (counts.get(reviewer) ?? 0) + 1);
    }
  }
  return counts;
}

export interface RoutingInput {
  codeowners?: readonly CodeOwnerRule[];
  /** Usually recently merged PRs */
  recentPRs?: readonly PullRequest[];
  reviewsByPr?: ReadonlyMap<number, readonly string[]>;
}

/**
 * Each CODEOWNERS pattern a candidate owns is worth 2, having reviewed
 * similar recent PRs is worth 1. Scores are divided by the best one, the
 * author is never suggested, and at most config.reviewMaxSuggestions remain.
 */
export function suggestReviewers(pr: PullRequest, input: RoutingInput, config: GateConfig): ReviewRoutingReport {
  const changedFiles = pr.files.map(f => f.filename);
  const rules = input.codeowners ?? [];
  const recentPRs = input.recentPRs ?? [];

  const scores = new Map<string, number>();
  const reasons = new Map<string, string[]>();
  const credit = (user: string, points: number, why: string[]) => {
    scores.set(user, (scores.get(user) ?? 0) + points);
    reasons.set(user, [...(reasons.get(user) ?? []), ...why]);
  };

  for (const [owner, why] of matchCodeowners(changedFiles, rules)) {
    credit(owner, CODEOWNER_WEIGHT * why.length, why);
  }
  if (input.reviewsByPr) {
    for (const [reviewer, count] of pastReviewers(changedFiles, recentPRs, input.reviewsByPr)) {
      credit(reviewer, PAST_REVIEW_WEIGHT, [`Reviewed ${count} recent PR(s) touching similar files`]);
    }
  }

  scores.delete(pr.author.login);
  const best = Math.max(0, ...scores.values());
  const suggestions: ReviewerSuggestion[] = [...scores]
    .sort((a, b) => b[1] - a[1])
    .slice(0, config.reviewMaxSuggestions)
    .map(([username, score]) => ({
      username,
      score: best > 0 ? round4(score / best) : 0,
      reasons: reasons.get(username) ?? [],
    }));

  log.debug({ pr: pr.number, candidates: scores.size, suggested: suggestions.length }, 'Reviewers ranked');

  return {
    owner: pr.owner,
    repo: pr.repo,
    prNumber: pr.number,
    prTitle: pr.title,
    changedFiles,
    codeownersFound: rules.length > 0,
    recentReviewersChecked: recentPRs.length,
    suggestions,
  };
}
