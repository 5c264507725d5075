#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import path from 'path';
import { CONFIG_FILE_NAME, resolveGateConfig } from './core/config';
import type { GateConfig } from './core/config';
import { createProvider, isProviderName, PROVIDER_NAMES } from './core/provider';
import type { LLMProvider, ProviderName } from './core/provider';
import { createRuntime } from './core/runtime';
import type { ConcurrencyController } from './core/concurrency';
import { LLMAlignmentJudge } from './core/judge';
import { loadVisionDocument } from './core/vision';
import { loadSnapshot } from './core/snapshot';
import type { Snapshot } from './core/snapshot';
import { embedItems, embedTexts, labelToText } from './core/embeddings';
import { TierOrchestrator } from './core/orchestrator';
import type { AssessmentRequest } from './core/orchestrator';
import { runAudit } from './core/audit';
import { detectConflicts } from './core/conflicts';
import { findIssuePrLinks } from './core/linking';
import { detectStaleItems } from './core/staleness';
import { classifyItem, mergeTaxonomies, repositoryLabelsToTaxonomy } from './core/labeling';
import type { ContributionItem, EmbeddingIndex, VisionDocument } from './core/types';
import { parseCodeowners, suggestReviewers } from './core/routing';
import { buildContributorProfile, countReviews, profileContributors } from './core/profiles';
import { createLogger } from './core/logger';

const log = createLogger('cli');

const program = new Command();

interface CLIOpts {
  snapshot: string;
  config?: string;
  vision?: string;
  provider?: string;
  apiKey?: string;
  model?: string;
  format?: string;
  number?: string;
  codeowners?: string;
  user?: string;
}

const PROVIDER_ENV_KEY_MAP: Record<ProviderName, string> = {
  gemini: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  openrouter: 'OPENROUTER_API_KEY',
};

interface Context {
  config: GateConfig;
  snapshot: Snapshot;
  vision?: VisionDocument;
  visionPath?: string;
  provider?: LLMProvider;
  controller: ConcurrencyController;
}

function resolveProvider(opts: CLIOpts): LLMProvider | undefined {
  const selected = (opts.provider ?? process.env.GATEKEEP_PROVIDER ?? 'gemini').toLowerCase();
  if (selected === 'none') return undefined;
  if (!isProviderName(selected)) {
    throw new Error(`Invalid provider "${selected}". Use ${PROVIDER_NAMES.join(', ')}, or none.`);
  }
  const apiKey = opts.apiKey ?? process.env[PROVIDER_ENV_KEY_MAP[selected]];
  if (!apiKey) return undefined;

  const model = opts.model ?? process.env.GATEKEEP_MODEL;
  return createProvider(selected, apiKey, model);
}

function makeContext(opts: CLIOpts): Context {
  const configPath = opts.config ?? path.join(process.cwd(), CONFIG_FILE_NAME);
  const config = resolveGateConfig({ filePath: configPath });
  const { controller, provider } = createRuntime(config.maxConcurrent, resolveProvider(opts));
  const visionPath = opts.vision ?? config.visionDocumentPath;
  return {
    config,
    snapshot: loadSnapshot(opts.snapshot),
    vision: visionPath ? loadVisionDocument(visionPath) : undefined,
    visionPath,
    provider,
    controller,
  };
}

/** Snapshot embeddings first; the provider fills in whatever is missing */
async function ensureEmbeddings(ctx: Context, items: readonly ContributionItem[]): Promise<EmbeddingIndex> {
  const known = new Map(ctx.snapshot.embeddings);
  const missing = items.filter(item => !known.has(item.number));
  if (missing.length === 0) return known;
  if (!ctx.provider) {
    log.warn({ missing: missing.length }, 'No provider configured, items without embeddings skip similarity checks');
    return known;
  }
  const fresh = await embedItems(missing, ctx.provider, ctx.controller);
  for (const [n, v] of fresh) known.set(n, v);
  return known;
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = parseInt(raw, 10);
  if (isNaN(n) || n < 1) throw new Error(`Invalid item number "${raw}"`);
  return n;
}

function findItem(snapshot: Snapshot, n: number): ContributionItem {
  const item = snapshot.pullRequests.find(pr => pr.number === n) ?? snapshot.issues.find(i => i.number === n);
  if (!item) throw new Error(`#${n} not found in snapshot`);
  return item;
}

function output(data: unknown, format: string | undefined, rows: () => Record<string, unknown>[], summary?: string) {
  if (format === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }
  const table = rows();
  if (table.length > 0) console.table(table);
  if (summary) console.log(`\n${summary}`);
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .requiredOption('-s, --snapshot <path>', 'Snapshot JSON of the repository')
    .option('-c, --config <path>', `Config file (default: ./${CONFIG_FILE_NAME})`)
    .option('-f, --format <format>', 'Output format: table|json', 'table');
}

function withProviderOptions(cmd: Command): Command {
  return cmd
    .option('-p, --provider <name>', `LLM provider: ${PROVIDER_NAMES.join('|')}|none`)
    .option('-m, --model <name>', 'LLM model name (overrides provider default)')
    .option('--api-key <key>', 'API key for the selected provider');
}

function run(action: (opts: CLIOpts) => Promise<void>) {
  return async (opts: CLIOpts) => {
    try {
      await action(opts);
    } catch (err: unknown) {
      log.error({ err }, err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  };
}

program
  .name('gatekeep')
  .description('Tiered risk assessment for incoming pull requests and issues')
  .version('0.1.0');

withProviderOptions(withCommonOptions(program.command('assess')))
  .description('Run the tier pipeline on one item, or on every open PR and issue')
  .option('-n, --number <number>', 'PR or issue number')
  .option('-v, --vision <path>', 'Vision document (YAML)')
  .action(run(async (opts) => {
    const ctx = makeContext(opts);
    const { snapshot, config } = ctx;
    const target = parseNumber(opts.number);
    const all: ContributionItem[] = [...snapshot.pullRequests, ...snapshot.issues];
    const subjects = target === undefined ? all : [findItem(snapshot, target)];
    const embeddings = await ensureEmbeddings(ctx, all);

    const orchestrator = new TierOrchestrator(config, {
      judge: ctx.provider ? new LLMAlignmentJudge(ctx.provider) : undefined,
      controller: ctx.controller,
    });
    const requests: AssessmentRequest[] = subjects.map(item => {
      const sameKind = all.filter(other => other.kind === item.kind);
      return {
        item,
        embedding: embeddings.get(item.number),
        existing: sameKind,
        existingEmbeddings: embeddings,
        recent: sameKind,
        vision: ctx.vision,
      };
    });

    const outcomes = await orchestrator.runBatch(requests);
    output(
      outcomes,
      opts.format,
      () => outcomes.map(o => ({
        '#': o.number,
        Verdict: o.scorecard?.verdict ?? 'error',
        Confidence: o.scorecard ? o.scorecard.confidence.toFixed(2) : '-',
        Flags: o.scorecard?.flags.length ?? 0,
        Summary: (o.scorecard?.summary ?? o.error ?? '').slice(0, 80),
      })),
    );
  }));

withProviderOptions(withCommonOptions(program.command('audit')))
  .description('Audit the open PR backlog: verdict counts, duplicate clusters, riskiest PRs')
  .option('-v, --vision <path>', 'Vision document (YAML)')
  .action(run(async (opts) => {
    const ctx = makeContext(opts);
    const prs = ctx.snapshot.pullRequests;
    const embeddings = await ensureEmbeddings(ctx, prs);
    const report = runAudit(prs, embeddings, ctx.config, {
      vision: ctx.vision,
      visionName: ctx.vision && ctx.visionPath ? path.basename(ctx.visionPath) : undefined,
    });
    output(
      report,
      opts.format,
      () => report.highestRisk.map(r => ({
        '#': r.prNumber,
        Score: r.score,
        High: r.highSeverityCount,
        Flags: r.flags.join(', '),
        Author: r.author,
        Title: r.title.slice(0, 50),
      })),
      `${report.prsAnalyzed} PRs: ${report.fastTrackCount} fast-track, ${report.reviewRequiredCount} review, ` +
        `${report.recommendCloseCount} close. ${report.uniqueAuthors} authors, ${report.newAccounts} new accounts.`,
    );
  }));

withProviderOptions(withCommonOptions(program.command('conflicts')))
  .description('Find open PR pairs that overlap in files or intent')
  .action(run(async (opts) => {
    const ctx = makeContext(opts);
    const prs = ctx.snapshot.pullRequests;
    const report = detectConflicts(prs, await ensureEmbeddings(ctx, prs), ctx.config);
    output(
      report,
      opts.format,
      () => report.pairs.map(p => ({
        A: `#${p.prA}`,
        B: `#${p.prB}`,
        Confidence: p.confidence,
        Files: p.fileOverlap,
        Semantic: p.semanticSimilarity,
        Shared: p.overlappingFiles.slice(0, 3).join(', '),
      })),
      `${report.pairs.length} potential conflict(s) among ${report.totalOpenPRs} open PRs`,
    );
  }));

withProviderOptions(withCommonOptions(program.command('link')))
  .description('Suggest links between open issues and PRs')
  .action(run(async (opts) => {
    const ctx = makeContext(opts);
    const { pullRequests, issues } = ctx.snapshot;
    const report = findIssuePrLinks(
      pullRequests,
      issues,
      await ensureEmbeddings(ctx, [...pullRequests, ...issues]),
      ctx.config,
    );
    output(
      report,
      opts.format,
      () => [...report.explicitLinks, ...report.suggestions].map(s => ({
        PR: `#${s.prNumber}`,
        Issue: `#${s.issueNumber}`,
        Similarity: s.similarity.toFixed(3),
        Explicit: s.isExplicit,
      })),
      `${report.suggestions.length} suggested link(s); orphan issues: ${report.orphanIssues.map(n => `#${n}`).join(', ') || 'none'}`,
    );
  }));

withProviderOptions(withCommonOptions(program.command('stale')))
  .description('Find superseded, addressed, blocked and inactive items')
  .action(run(async (opts) => {
    const ctx = makeContext(opts);
    const { pullRequests, issues, mergedPullRequests } = ctx.snapshot;
    const embeddings = await ensureEmbeddings(ctx, [...pullRequests, ...issues, ...mergedPullRequests]);
    const report = detectStaleItems(
      { openPRs: pullRequests, openIssues: issues, mergedPRs: mergedPullRequests, embeddings },
      ctx.config,
    );
    output(
      report,
      opts.format,
      () => [
        ...report.supersededPRs,
        ...report.addressedIssues,
        ...report.blockedPRs,
        ...report.inactivePRs,
        ...report.inactiveIssues,
      ].map(s => ({ '#': s.number, Signal: s.signal, Explanation: s.explanation })),
    );
  }));

withProviderOptions(withCommonOptions(program.command('label')))
  .description('Suggest labels for a PR or issue from the vision taxonomy and repository labels')
  .requiredOption('-n, --number <number>', 'PR or issue number')
  .option('-v, --vision <path>', 'Vision document (YAML)')
  .action(run(async (opts) => {
    const ctx = makeContext(opts);
    const n = parseNumber(opts.number);
    if (n === undefined) throw new Error('--number is required');
    const item = findItem(ctx.snapshot, n);
    const taxonomy = mergeTaxonomies(
      ctx.vision?.labelTaxonomy ?? [],
      repositoryLabelsToTaxonomy(ctx.snapshot.labels),
    );

    const embeddings = await ensureEmbeddings(ctx, [item]);
    const labelEmbeddings = new Map(ctx.snapshot.labelEmbeddings);
    const unembedded = taxonomy.filter(lb => !labelEmbeddings.has(lb.name));
    if (ctx.provider && unembedded.length > 0) {
      const fresh = await embedTexts(
        unembedded.map(lb => ({ key: lb.name, text: labelToText(lb) })),
        ctx.provider,
        ctx.controller,
      );
      for (const [name, v] of fresh) labelEmbeddings.set(name, v);
    }

    const report = classifyItem(item, embeddings.get(item.number), taxonomy, labelEmbeddings, ctx.config);
    output(
      report,
      opts.format,
      () => report.suggestions.map(s => ({
        Label: s.label,
        Confidence: s.confidence,
        Semantic: s.embeddingSimilarity,
        Keywords: s.keywordMatches.join(', '),
        Source: s.source,
      })),
      `${report.suggestions.length} suggestion(s) from a taxonomy of ${report.taxonomySize}`,
    );
  }));

withCommonOptions(program.command('route'))
  .description('Suggest reviewers for a PR from CODEOWNERS and recent review history')
  .requiredOption('-n, --number <number>', 'PR number')
  .option('--codeowners <path>', 'CODEOWNERS file (default: the one in the snapshot)')
  .action(run(async (opts) => {
    const ctx = makeContext(opts);
    const n = parseNumber(opts.number);
    const pr = ctx.snapshot.pullRequests.find(p => p.number === n);
    if (!pr) throw new Error(`PR #${opts.number} not found in snapshot`);
    const codeowners = opts.codeowners ? readFileSync(opts.codeowners, 'utf-8') : ctx.snapshot.codeowners;

    const report = suggestReviewers(pr, {
      codeowners: parseCodeowners(codeowners),
      recentPRs: ctx.snapshot.mergedPullRequests,
      reviewsByPr: ctx.snapshot.reviews,
    }, ctx.config);
    output(
      report,
      opts.format,
      () => report.suggestions.map(s => ({ Reviewer: s.username, Score: s.score, Reasons: s.reasons.join('; ') })),
      report.suggestions.length === 0
        ? 'No reviewer candidates found'
        : `${report.suggestions.length} reviewer(s) for #${report.prNumber} across ${report.changedFiles.length} changed file(s)`,
    );
  }));

withCommonOptions(program.command('profile'))
  .description('Summarize contributors from their PR history')
  .option('-u, --user <login>', 'Only this contributor')
  .action(run(async (opts) => {
    const ctx = makeContext(opts);
    const { owner, repo, pullRequests, mergedPullRequests, reviews } = ctx.snapshot;
    const prs = [...pullRequests, ...mergedPullRequests];
    const all = profileContributors(prs, reviews, owner, repo);
    const user = opts.user;
    const profiles = user
      ? [all.find(p => p.username === user)
          ?? buildContributorProfile(user, [], { owner, repo, reviewCount: countReviews(user, reviews) })]
      : all;
    output(
      profiles,
      opts.format,
      () => profiles.map(p => ({
        Contributor: p.username,
        PRs: p.totalPrs,
        Merged: p.mergedPrs,
        'Merge rate': p.mergeRate,
        'With tests': p.testInclusionRate,
        Reviews: p.reviewCount,
        Areas: p.areasOfExpertise.join(', '),
      })),
    );
  }));

program.parseAsync().catch((err: unknown) => {
  log.error({ err }, 'Command failed');
  process.exit(1);
});
