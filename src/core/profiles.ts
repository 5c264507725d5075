/**
 * Contributor profiles: merge rate, test habits, PR size and the directories
 * an author works in, from their PR history alone.
 */

import type { ContributorProfile, PullRequest } from './types';
import { isTestFile } from './heuristics';
import { round4 } from './similarity';

const MAX_AREAS = 5;

function topDirectory(filename: string): string {
  const parts = filename.replace(/\\/g, '/').split('/');
  return parts.length > 1 ? parts[0] : '(root)';
}

export interface ProfileContext {
  owner: string;
  repo: string;
  /** PRs this user reviewed */
  reviewCount?: number;
}

export function buildContributorProfile(
  username: string,
  prs: readonly PullRequest[],
  ctx: ProfileContext,
): ContributorProfile {
  const profile: ContributorProfile = {
    owner: ctx.owner,
    repo: ctx.repo,
    username,
    prsAnalyzed: prs.length,
    reviewCount: ctx.reviewCount ?? 0,
    totalPrs: 0,
    mergedPrs: 0,
    openPrs: 0,
    closedPrs: 0,
    mergeRate: 0,
    testInclusionRate: 0,
    avgAdditions: 0,
    avgDeletions: 0,
    areasOfExpertise: [],
  };
  if (prs.length === 0) return profile;

  let withTests = 0;
  let additions = 0;
  let deletions = 0;
  // Map keeps first-seen order, which breaks ties between equally busy directories
  const dirs = new Map<string, number>();
  const dates: Array<{ raw: string; time: number }> = [];

  for (const pr of prs) {
    if (pr.mergedAt || pr.state === 'merged') profile.mergedPrs++;
    else if (pr.state === 'open') profile.openPrs++;
    else profile.closedPrs++;

    if (pr.files.some(f => isTestFile(f.filename))) withTests++;
    additions += pr.totalAdditions;
    deletions += pr.totalDeletions;

    for (const f of pr.files) {
      const dir = topDirectory(f.filename);
      dirs.set(dir, (dirs.get(dir) ?? 0) + 1);
    }

    const time = pr.createdAt ? Date.parse(pr.createdAt) : NaN;
    if (pr.createdAt && !Number.isNaN(time)) dates.push({ raw: pr.createdAt, time });
  }

  const total = prs.length;
  profile.totalPrs = total;
  profile.mergeRate = round4(profile.mergedPrs / total);
  profile.testInclusionRate = round4(withTests / total);
  profile.avgAdditions = round4(additions / total);
  profile.avgDeletions = round4(deletions / total);
  profile.areasOfExpertise = [...dirs]
    .sort((a, b) => b[1] - a[1])
    .slice(0, MAX_AREAS)
    .map(([dir]) => dir);

  if (dates.length > 0) {
    dates.sort((a, b) => a.time - b.time);
    profile.firstContribution = dates[0].raw;
    profile.lastContribution = dates[dates.length - 1].raw;
  }
  return profile;
}

/**
 * One profile per author. A PR listed both as open and as merged counts once,
 * the later entry winning. Busiest contributors first.
 */
export function profileContributors(
  prs: readonly PullRequest[],
  reviewsByPr: ReadonlyMap<number, readonly string[]>,
  owner: string,
  repo: string,
): ContributorProfile[] {
  const byNumber = new Map<number, PullRequest>();
  for (const pr of prs) byNumber.set(pr.number, pr);

  const byAuthor = new Map<string, PullRequest[]>();
  for (const pr of byNumber.values()) {
    const list = byAuthor.get(pr.author.login) ?? [];
    list.push(pr);
    byAuthor.set(pr.author.login, list);
  }

  return [...byAuthor]
    .map(([login, authored]) => buildContributorProfile(login, authored, {
      owner,
      repo,
      reviewCount: countReviews(login, reviewsByPr),
    }))
    .sort((a, b) => b.totalPrs - a.totalPrs || a.username.localeCompare(b.username));
}

export function countReviews(login: string, reviewsByPr: ReadonlyMap<number, readonly string[]>): number {
  let count = 0;
  for (const reviewers of reviewsByPr.values()) {
    if (reviewers.includes(login)) count++;
  }
  return count;
}
