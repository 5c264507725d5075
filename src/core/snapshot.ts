/**
 * Snapshot reader: the JSON file the CLI works from in place of a live
 * GitHub fetch. Every value is narrowed from `unknown`; optional fields take
 * the same defaults an ingestion step would give them.
 *
 * {
 *   "owner": "acme", "repo": "widgets",
 *   "pullRequests": [...], "issues": [...], "mergedPullRequests": [...],
 *   "embeddings": { "12": [0.1, ...] },
 *   "labels": [{ "name": "bug", "description": "...", "color": "d73a4a" }],
 *   "labelEmbeddings": { "bug": [0.2, ...] },
 *   "reviews": { "12": ["alice"] },
 *   "codeowners": "src/auth/* @security-team"
 * }
 */

import { readFileSync } from 'fs';
import type { Author, FileChange, Issue, PullRequest } from './types';
import type { RepositoryLabel } from './labeling';
import { SnapshotError } from './errors';

export interface Snapshot {
  owner: string;
  repo: string;
  pullRequests: PullRequest[];
  issues: Issue[];
  mergedPullRequests: PullRequest[];
  embeddings: Map<number, number[]>;
  labels: RepositoryLabel[];
  labelEmbeddings: Map<string, number[]>;
  /** PR number → logins that reviewed it */
  reviews: Map<number, string[]>;
  /** CODEOWNERS file content, empty when the repo has none */
  codeowners: string;
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown, path: string): Json {
  if (!isRecord(value)) throw new SnapshotError('expected an object', path);
  return value;
}

function list(value: unknown, path: string): unknown[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new SnapshotError('expected an array', path);
  return value;
}

function str(value: unknown, path: string, fallback?: string): string {
  if ((value === undefined || value === null) && fallback !== undefined) return fallback;
  if (typeof value !== 'string') throw new SnapshotError('expected a string', path);
  return value;
}

function optStr(value: unknown, path: string): string | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  return str(value, path);
}

function num(value: unknown, path: string, fallback?: number): number {
  if ((value === undefined || value === null) && fallback !== undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) throw new SnapshotError('expected a number', path);
  return value;
}

function strList(value: unknown, path: string): string[] {
  return list(value, path).map((v, i) => str(v, `${path}[${i}]`));
}

function numList(value: unknown, path: string): number[] {
  return list(value, path).map((v, i) => num(v, `${path}[${i}]`));
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], path: string, fallback: T): T {
  if (value === undefined || value === null) return fallback;
  const match = allowed.find(a => a === value);
  if (match === undefined) throw new SnapshotError(`expected one of ${allowed.join(', ')}`, path);
  return match;
}

function parseAuthor(value: unknown, path: string): Author {
  const raw = record(value, path);
  return {
    login: str(raw.login, `${path}.login`),
    accountCreatedAt: optStr(raw.accountCreatedAt, `${path}.accountCreatedAt`),
    contributionsToRepo: num(raw.contributionsToRepo, `${path}.contributionsToRepo`, 0),
  };
}

const FILE_STATUSES = ['added', 'removed', 'modified', 'renamed'] as const;

function parseFile(value: unknown, path: string): FileChange {
  const raw = record(value, path);
  return {
    filename: str(raw.filename, `${path}.filename`),
    status: oneOf(raw.status, FILE_STATUSES, `${path}.status`, 'modified'),
    additions: num(raw.additions, `${path}.additions`, 0),
    deletions: num(raw.deletions, `${path}.deletions`, 0),
  };
}

interface Defaults {
  owner: string;
  repo: string;
}

function parsePullRequest(value: unknown, path: string, defaults: Defaults, state: PullRequest['state']): PullRequest {
  const raw = record(value, path);
  const files = list(raw.files, `${path}.files`).map((f, i) => parseFile(f, `${path}.files[${i}]`));
  return {
    kind: 'pull_request',
    owner: str(raw.owner, `${path}.owner`, defaults.owner),
    repo: str(raw.repo, `${path}.repo`, defaults.repo),
    number: num(raw.number, `${path}.number`),
    title: str(raw.title, `${path}.title`),
    body: str(raw.body, `${path}.body`, ''),
    author: parseAuthor(raw.author, `${path}.author`),
    createdAt: optStr(raw.createdAt, `${path}.createdAt`),
    updatedAt: optStr(raw.updatedAt, `${path}.updatedAt`),
    labels: strList(raw.labels, `${path}.labels`),
    state: oneOf(raw.state, ['open', 'closed', 'merged'] as const, `${path}.state`, state),
    files,
    diffText: str(raw.diffText, `${path}.diffText`, ''),
    linkedIssues: numList(raw.linkedIssues, `${path}.linkedIssues`),
    mergedAt: optStr(raw.mergedAt, `${path}.mergedAt`),
    totalAdditions: num(raw.totalAdditions, `${path}.totalAdditions`, files.reduce((s, f) => s + f.additions, 0)),
    totalDeletions: num(raw.totalDeletions, `${path}.totalDeletions`, files.reduce((s, f) => s + f.deletions, 0)),
  };
}

function parseReactions(value: unknown, path: string): Record<string, number> {
  if (value === undefined || value === null) return {};
  const raw = record(value, path);
  const reactions: Record<string, number> = {};
  for (const [name, count] of Object.entries(raw)) reactions[name] = num(count, `${path}.${name}`);
  return reactions;
}

function parseIssue(value: unknown, path: string, defaults: Defaults): Issue {
  const raw = record(value, path);
  return {
    kind: 'issue',
    owner: str(raw.owner, `${path}.owner`, defaults.owner),
    repo: str(raw.repo, `${path}.repo`, defaults.repo),
    number: num(raw.number, `${path}.number`),
    title: str(raw.title, `${path}.title`),
    body: str(raw.body, `${path}.body`, ''),
    author: parseAuthor(raw.author, `${path}.author`),
    createdAt: optStr(raw.createdAt, `${path}.createdAt`),
    updatedAt: optStr(raw.updatedAt, `${path}.updatedAt`),
    labels: strList(raw.labels, `${path}.labels`),
    state: oneOf(raw.state, ['open', 'closed'] as const, `${path}.state`, 'open'),
    assignees: strList(raw.assignees, `${path}.assignees`),
    reactions: parseReactions(raw.reactions, `${path}.reactions`),
    commentCount: num(raw.commentCount, `${path}.commentCount`, 0),
    milestone: optStr(raw.milestone, `${path}.milestone`),
    closedAt: optStr(raw.closedAt, `${path}.closedAt`),
  };
}

function parseVectors<K>(value: unknown, path: string, key: (raw: string) => K): Map<K, number[]> {
  const vectors = new Map<K, number[]>();
  if (value === undefined || value === null) return vectors;
  for (const [k, v] of Object.entries(record(value, path))) {
    vectors.set(key(k), numList(v, `${path}.${k}`));
  }
  return vectors;
}

function itemNumber(raw: string, path: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new SnapshotError('keys must be item numbers', path);
  return n;
}

function parseReviews(value: unknown, path: string): Map<number, string[]> {
  const reviews = new Map<number, string[]>();
  if (value === undefined || value === null) return reviews;
  for (const [k, v] of Object.entries(record(value, path))) {
    reviews.set(itemNumber(k, `${path}.${k}`), strList(v, `${path}.${k}`));
  }
  return reviews;
}

function parseLabel(value: unknown, path: string): RepositoryLabel {
  const raw = record(value, path);
  return {
    name: str(raw.name, `${path}.name`),
    description: optStr(raw.description, `${path}.description`) ?? null,
    color: optStr(raw.color, `${path}.color`) ?? null,
  };
}

export function parseSnapshot(data: unknown, source = 'snapshot'): Snapshot {
  const root = record(data, source);
  const defaults: Defaults = {
    owner: str(root.owner, `${source}.owner`, ''),
    repo: str(root.repo, `${source}.repo`, ''),
  };

  const embeddings = parseVectors(root.embeddings, `${source}.embeddings`, k => itemNumber(k, `${source}.embeddings.${k}`));

  return {
    ...defaults,
    pullRequests: list(root.pullRequests, `${source}.pullRequests`)
      .map((v, i) => parsePullRequest(v, `${source}.pullRequests[${i}]`, defaults, 'open')),
    issues: list(root.issues, `${source}.issues`)
      .map((v, i) => parseIssue(v, `${source}.issues[${i}]`, defaults)),
    mergedPullRequests: list(root.mergedPullRequests, `${source}.mergedPullRequests`)
      .map((v, i) => parsePullRequest(v, `${source}.mergedPullRequests[${i}]`, defaults, 'merged')),
    embeddings,
    labels: list(root.labels, `${source}.labels`).map((v, i) => parseLabel(v, `${source}.labels[${i}]`)),
    labelEmbeddings: parseVectors(root.labelEmbeddings, `${source}.labelEmbeddings`, k => k),
    reviews: parseReviews(root.reviews, `${source}.reviews`),
    codeowners: str(root.codeowners, `${source}.codeowners`, ''),
  };
}

export function loadSnapshot(path: string): Snapshot {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    throw new SnapshotError(err instanceof Error ? err.message : String(err), path);
  }
  return parseSnapshot(data, path);
}
