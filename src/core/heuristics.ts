/**
 * HeuristicEngine: Tier 2 deterministic suspicion rules
 *
 * Each rule inspects one item (plus the peers it arrived with) and either
 * raises a SuspicionFlag or returns null. Rules never throw on missing
 * optional data. Flags are aggregated into a capped, severity-weighted score.
 */

import type {
  ContributionItem,
  FlagSeverity,
  HeuristicResult,
  Issue,
  PullRequest,
  SuspicionFlag,
} from './types';
import type { GateConfig } from './config';
import { createLogger } from './logger';

const log = createLogger('heuristics');

export const SEVERITY_WEIGHTS: Readonly<Record<FlagSeverity, number>> = Object.freeze({
  high: 0.3,
  medium: 0.15,
  low: 0.05,
});

const DAY_MS = 24 * 60 * 60 * 1000;
const CLUSTER_WINDOW_MS = DAY_MS;

const HIGH_RISK_PATH_PARTS = ['auth', 'crypto', 'security', 'password', 'login'];

const DEPENDENCY_MANIFESTS = [
  'requirements.txt', 'package.json', 'pyproject.toml',
  'Gemfile', 'go.mod', 'Cargo.toml', 'pom.xml',
  'package-lock.json', 'yarn.lock', 'Pipfile',
];

const DEPENDENCY_KEYWORDS = ['depend', 'upgrade', 'bump', 'update', 'package', 'library', 'version'];

const BUG_KEYWORDS = ['bug', 'error', 'crash', 'exception', 'traceback', 'fail', 'broken', 'issue'];

const REPRO_KEYWORDS = [
  'reproduce', 'repro', 'steps to', 'step 1', 'expected', 'actual',
  'stack trace', 'traceback', '```',
];

export interface RuleContext<T extends ContributionItem> {
  peers: readonly T[];
  sensitivePaths: readonly string[];
  config: GateConfig;
  now: Date;
}

export interface HeuristicRule<T extends ContributionItem> {
  id: string;
  check(item: T, ctx: RuleContext<T>): SuspicionFlag | null;
}

function flag(
  ruleId: string,
  severity: FlagSeverity,
  title: string,
  explanation: string,
  evidence: string,
): SuspicionFlag {
  return Object.freeze({ ruleId, severity, title, explanation, evidence });
}

/** Epoch millis, or undefined for a missing or unparseable timestamp */
export function parseTime(iso: string | undefined): number | undefined {
  if (!iso) return undefined;
  const t = Date.parse(iso);
  return Number.isNaN(t) ? undefined : t;
}

function percent(ratio: number, digits: number): string {
  return `${(ratio * 100).toFixed(digits)}%`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

export function isSensitivePath(filename: string, sensitivePaths: readonly string[]): boolean {
  const lower = filename.toLowerCase();
  return sensitivePaths.some(p => lower.includes(p.toLowerCase()));
}

export function isTestFile(filename: string): boolean {
  const lower = filename.toLowerCase();
  return lower.includes('test') || lower.includes('spec');
}

/** Added + deleted lines; falls back to summing files when the totals were never filled in */
export function totalChanges(pr: PullRequest): number {
  const total = pr.totalAdditions + pr.totalDeletions;
  if (total > 0) return total;
  return pr.files.reduce((sum, f) => sum + f.additions + f.deletions, 0);
}

function isNewAccount(createdAt: string | undefined, ctx: { config: GateConfig; now: Date }): boolean {
  const created = parseTime(createdAt);
  if (created === undefined) return false;
  return ctx.now.getTime() - created < ctx.config.newAccountDays * DAY_MS;
}

// --- Shared rules ---

function newAccountRule<T extends ContributionItem>(): HeuristicRule<T> {
  return {
    id: 'new_account',
    check(item, ctx) {
      const created = parseTime(item.author.accountCreatedAt);
      if (created === undefined) return null;
      const ageMs = ctx.now.getTime() - created;
      const thresholdDays = ctx.config.newAccountDays;
      if (ageMs >= thresholdDays * DAY_MS) return null;
      return flag(
        'new_account', 'medium', 'New account',
        `Account created ${Math.floor(ageMs / DAY_MS)} days ago (threshold: ${thresholdDays} days)`,
        `Account created: ${item.author.accountCreatedAt}`,
      );
    },
  };
}

function firstContributionRule<T extends ContributionItem>(noun: string): HeuristicRule<T> {
  return {
    id: 'first_contribution',
    check(item) {
      if (item.author.contributionsToRepo !== 0) return null;
      return flag(
        'first_contribution', 'low', 'First contribution',
        `User '${item.author.login}' has no prior ${noun} to this repo`,
        'contributionsToRepo=0',
      );
    },
  };
}

function temporalClusteringRule<T extends ContributionItem>(noun: string, refPrefix: string): HeuristicRule<T> {
  return {
    id: 'temporal_clustering',
    check(item, ctx) {
      const created = parseTime(item.createdAt);
      if (ctx.peers.length === 0 || created === undefined) return null;

      const clustered = ctx.peers.filter(other => {
        if (other.number === item.number) return false;
        const otherCreated = parseTime(other.createdAt);
        if (otherCreated === undefined) return false;
        return isNewAccount(other.author.accountCreatedAt, ctx)
          && Math.abs(created - otherCreated) < CLUSTER_WINDOW_MS;
      });

      const minCluster = ctx.peers.length < 50 ? 3 : 5;
      if (clustered.length < minCluster) return null;
      return flag(
        'temporal_clustering', 'high', `Temporal clustering of new-account ${noun}`,
        `${clustered.length} other new-account ${noun} within 24h window`,
        clustered.slice(0, 5).map(o => `${refPrefix}#${o.number} by ${o.author.login}`).join(', '),
      );
    },
  };
}

// --- Pull request rules ---

const sensitivePathsRule: HeuristicRule<PullRequest> = {
  id: 'sensitive_paths',
  check(pr, ctx) {
    const touched = pr.files.filter(f => isSensitivePath(f.filename, ctx.sensitivePaths));
    if (touched.length === 0) return null;
    const highRisk = touched.some(f => {
      const lower = f.filename.toLowerCase();
      return HIGH_RISK_PATH_PARTS.some(p => lower.includes(p));
    });
    return flag(
      'sensitive_paths', highRisk ? 'high' : 'medium', 'Sensitive path changes',
      `PR modifies ${touched.length} security-sensitive file(s)`,
      touched.slice(0, 5).map(f => f.filename).join(', '),
    );
  },
};

const lowTestRatioRule: HeuristicRule<PullRequest> = {
  id: 'low_test_ratio',
  check(pr, ctx) {
    let code = 0;
    let tests = 0;
    for (const f of pr.files) {
      if (isTestFile(f.filename)) tests += f.additions;
      else code += f.additions;
    }
    if (code <= 20) return null;

    const total = code + tests;
    const ratio = total > 0 ? tests / total : 0;
    const min = ctx.config.minTestRatio;
    if (ratio >= min) return null;
    return flag(
      'low_test_ratio', 'medium', 'Low test coverage',
      `Test ratio ${percent(ratio, 1)} is below threshold ${percent(min, 0)} (${tests} test lines / ${total} total additions)`,
      `code_additions=${code}, test_additions=${tests}`,
    );
  },
};

const unjustifiedDepsRule: HeuristicRule<PullRequest> = {
  id: 'unjustified_deps',
  check(pr) {
    const manifests = pr.files.filter(f => DEPENDENCY_MANIFESTS.some(m => f.filename.endsWith(m)));
    if (manifests.length === 0) return null;
    const body = pr.body.toLowerCase();
    if (DEPENDENCY_KEYWORDS.some(kw => body.includes(kw))) return null;
    return flag(
      'unjustified_deps', 'high', 'Unjustified dependency changes',
      "Dependency files modified but PR description doesn't mention dependency changes",
      manifests.map(f => f.filename).join(', '),
    );
  },
};

const largeDiffHidingRule: HeuristicRule<PullRequest> = {
  id: 'large_diff_hiding',
  check(pr, ctx) {
    const total = totalChanges(pr);
    if (total < 500) return null;
    const sensitive = pr.files
      .filter(f => isSensitivePath(f.filename, ctx.sensitivePaths))
      .reduce((sum, f) => sum + f.additions + f.deletions, 0);
    if (sensitive === 0) return null;
    const ratio = sensitive / total;
    if (ratio >= 0.05) return null;
    return flag(
      'large_diff_hiding', 'high', 'Large diff with hidden sensitive changes',
      `Large diff (${total} changes) with only ${percent(ratio, 1)} in sensitive paths; sensitive changes may be hidden in bulk`,
      `total_changes=${total}, sensitive_changes=${sensitive}`,
    );
  },
};

export const PULL_REQUEST_RULES: readonly HeuristicRule<PullRequest>[] = [
  newAccountRule<PullRequest>(),
  firstContributionRule<PullRequest>('contributions'),
  sensitivePathsRule,
  lowTestRatioRule,
  unjustifiedDepsRule,
  largeDiffHidingRule,
  temporalClusteringRule<PullRequest>('PRs', 'PR'),
];

// --- Issue rules ---

const vagueDescriptionRule: HeuristicRule<Issue> = {
  id: 'vague_description',
  check(issue, ctx) {
    const length = issue.body.trim().length;
    const min = ctx.config.issueMinBodyLength;
    if (length >= min) return null;
    return flag(
      'vague_description', 'medium', 'Vague description',
      `Issue body is ${length} chars (minimum: ${min})`,
      `body_length=${length}`,
    );
  },
};

const missingReproductionRule: HeuristicRule<Issue> = {
  id: 'missing_reproduction',
  check(issue) {
    const title = issue.title.toLowerCase();
    const body = issue.body.toLowerCase();
    const looksLikeBug = BUG_KEYWORDS.some(kw => title.includes(kw) || body.includes(kw))
      || issue.labels.some(l => l.toLowerCase().includes('bug'));
    if (!looksLikeBug) return null;
    if (REPRO_KEYWORDS.some(kw => body.includes(kw))) return null;
    return flag(
      'missing_reproduction', 'medium', 'Missing reproduction steps',
      'Bug-like issue without reproduction steps or code snippets',
      `title='${truncate(issue.title, 60)}'`,
    );
  },
};

const shortTitleRule: HeuristicRule<Issue> = {
  id: 'short_title',
  check(issue) {
    const length = issue.title.trim().length;
    if (length >= 10) return null;
    return flag(
      'short_title', 'low', 'Short title',
      `Issue title is only ${length} chars`,
      `title='${issue.title}'`,
    );
  },
};

const allCapsTitleRule: HeuristicRule<Issue> = {
  id: 'all_caps_title',
  check(issue) {
    const letters = issue.title.match(/\p{L}/gu) ?? [];
    if (letters.length < 5 || issue.title !== issue.title.toUpperCase()) return null;
    return flag(
      'all_caps_title', 'low', 'ALL CAPS title',
      'Issue title is in ALL CAPS, which may indicate spam or low quality',
      `title='${truncate(issue.title, 60)}'`,
    );
  },
};

export const ISSUE_RULES: readonly HeuristicRule<Issue>[] = [
  vagueDescriptionRule,
  newAccountRule<Issue>(),
  firstContributionRule<Issue>('issues'),
  missingReproductionRule,
  shortTitleRule,
  allCapsTitleRule,
  temporalClusteringRule<Issue>('issues', 'Issue'),
];

/**
 * Sum severity weights, cap at 1, gate when the score reaches the threshold.
 * The sum is capped after adding, never per flag.
 */
export function aggregateFlags(flags: readonly SuspicionFlag[], threshold: number): HeuristicResult {
  const raw = flags.reduce((sum, f) => sum + SEVERITY_WEIGHTS[f.severity], 0);
  const score = Math.min(raw, 1);
  return {
    outcome: score >= threshold ? 'gated' : 'pass',
    score,
    flags: [...flags],
  };
}

export interface AssessOptions<T extends ContributionItem> {
  peers?: readonly T[];
  /** Appended to config.sensitivePaths, e.g. a vision document's focus areas */
  extraSensitivePaths?: readonly string[];
}

export class HeuristicEngine {
  private config: GateConfig;
  private now: () => Date;

  constructor(config: GateConfig, now: () => Date = () => new Date()) {
    this.config = config;
    this.now = now;
  }

  assessPullRequest(pr: PullRequest, opts: AssessOptions<PullRequest> = {}): HeuristicResult {
    const extra = (opts.extraSensitivePaths ?? []).map(p => p.trim()).filter(p => p !== '');
    const sensitivePaths = [...this.config.sensitivePaths, ...extra];
    const ctx: RuleContext<PullRequest> = {
      peers: opts.peers ?? [],
      sensitivePaths,
      config: this.config,
      now: this.now(),
    };
    return this.run(pr, PULL_REQUEST_RULES, ctx, this.config.suspicionThreshold);
  }

  assessIssue(issue: Issue, opts: AssessOptions<Issue> = {}): HeuristicResult {
    const ctx: RuleContext<Issue> = {
      peers: opts.peers ?? [],
      sensitivePaths: this.config.sensitivePaths,
      config: this.config,
      now: this.now(),
    };
    return this.run(issue, ISSUE_RULES, ctx, this.config.issueSuspicionThreshold);
  }

  /** Dispatch on kind; peers of the other kind are ignored */
  assess(item: ContributionItem, opts: { peers?: readonly ContributionItem[]; extraSensitivePaths?: readonly string[] } = {}): HeuristicResult {
    const peers = opts.peers ?? [];
    if (item.kind === 'pull_request') {
      return this.assessPullRequest(item, {
        peers: peers.filter((p): p is PullRequest => p.kind === 'pull_request'),
        extraSensitivePaths: opts.extraSensitivePaths,
      });
    }
    return this.assessIssue(item, {
      peers: peers.filter((p): p is Issue => p.kind === 'issue'),
    });
  }

  private run<T extends ContributionItem>(
    item: T,
    rules: readonly HeuristicRule<T>[],
    ctx: RuleContext<T>,
    threshold: number,
  ): HeuristicResult {
    const flags: SuspicionFlag[] = [];
    for (const rule of rules) {
      const raised = rule.check(item, ctx);
      if (raised) flags.push(raised);
    }
    const result = aggregateFlags(flags, threshold);
    log.debug(
      { kind: item.kind, number: item.number, score: result.score, flags: flags.map(f => f.ruleId) },
      'Heuristics evaluated',
    );
    return result;
  }
}
