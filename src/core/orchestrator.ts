/**
 * TierOrchestrator: runs Tier 1 (dedup) → Tier 2 (heuristics) → Tier 3
 * (vision alignment) for one contribution and stops at the first gate.
 *
 * Each tier records its dimension on the scorecard before its gate is
 * evaluated, so a gated scorecard still explains what tripped it.
 */

import type {
  AlignmentResult,
  ContributionItem,
  DedupResult,
  Embedding,
  EmbeddingIndex,
  Scorecard,
  VisionDocument,
} from './types';
import type { GateConfig } from './config';
import type { AlignmentJudge } from './judge';
import { alignmentError } from './judge';
import { DedupEngine } from './dedup';
import { HeuristicEngine } from './heuristics';
import { ScorecardBuilder } from './scorecard';
import { ConcurrencyController } from './concurrency';
import { createLogger } from './logger';

const log = createLogger('orchestrator');

/** Alignment below this is review_required regardless of Tier 2 */
const LOW_ALIGNMENT = 0.4;
/** Alignment below this is review_required when Tier 2 raised any flag */
const MODERATE_ALIGNMENT = 0.6;
const JUDGE_ERROR_CONFIDENCE = 0.5;
const MODERATE_CONFIDENCE = 0.6;
const DEFAULT_FAST_TRACK_CONFIDENCE = 0.8;

interface DimensionNames {
  noun: string;
  dedup: string;
  heuristics: string;
  alignment: string;
}

const NAMES: Record<ContributionItem['kind'], DimensionNames> = {
  pull_request: {
    noun: 'PR',
    dedup: 'Hygiene & Dedup',
    heuristics: 'Supply Chain Suspicion',
    alignment: 'Vision Alignment',
  },
  issue: {
    noun: 'Issue',
    dedup: 'Issue Dedup',
    heuristics: 'Issue Quality',
    alignment: 'Vision Alignment',
  },
};

export interface AssessmentRequest {
  item: ContributionItem;
  /** Omit to skip Tier 1 */
  embedding?: Embedding;
  /** Candidates for dedup comparison */
  existing?: readonly ContributionItem[];
  existingEmbeddings?: EmbeddingIndex;
  /** Recent items for temporal clustering */
  recent?: readonly ContributionItem[];
  vision?: VisionDocument;
}

export interface OrchestratorDeps {
  judge?: AlignmentJudge;
  dedup?: DedupEngine;
  heuristics?: HeuristicEngine;
  /** Shared with the provider's throttle hook; runBatch makes its own when absent */
  controller?: ConcurrencyController;
}

export interface BatchOutcome {
  number: number;
  scorecard?: Scorecard;
  error?: string;
}

const fixed = (n: number) => n.toFixed(2);

export class TierOrchestrator {
  private config: GateConfig;
  private judge?: AlignmentJudge;
  private dedup: DedupEngine;
  private heuristics: HeuristicEngine;
  private controller?: ConcurrencyController;

  constructor(config: GateConfig, deps: OrchestratorDeps = {}) {
    this.config = config;
    this.judge = deps.judge;
    this.dedup = deps.dedup ?? new DedupEngine(config);
    this.heuristics = deps.heuristics ?? new HeuristicEngine(config);
    this.controller = deps.controller;
  }

  async assess(request: AssessmentRequest): Promise<Scorecard> {
    const { item, vision } = request;
    const names = NAMES[item.kind];
    const card = new ScorecardBuilder(item);

    // --- Tier 1: Dedup ---
    const dedup: DedupResult = request.embedding
      ? this.dedup.check(item, request.embedding, request.existing ?? [], request.existingEmbeddings ?? new Map())
      : { outcome: 'skipped', isDuplicate: false, duplicateOf: null, maxSimilarity: 0 };

    card.withDedup(dedup).addDimension(
      names.dedup,
      dedup.isDuplicate ? 0 : 1,
      dedup.isDuplicate
        ? `Duplicate of ${names.noun}#${dedup.duplicateOf} (similarity: ${fixed(dedup.maxSimilarity)})`
        : 'No duplicates found',
    );

    if (dedup.outcome === 'gated') {
      log.info({ number: item.number, duplicateOf: dedup.duplicateOf }, 'Tier 1 gated');
      return card.build(
        'recommend_close',
        dedup.maxSimilarity,
        `${names.noun} is a duplicate of ${names.noun}#${dedup.duplicateOf} (similarity: ${fixed(dedup.maxSimilarity)}). Recommend closing.`,
      );
    }

    // --- Tier 2: Heuristics ---
    const heuristics = this.heuristics.assess(item, {
      peers: request.recent,
      extraSensitivePaths: vision?.focusAreas,
    });
    card.withHeuristics(heuristics).addDimension(
      names.heuristics,
      1 - heuristics.score,
      `Suspicion score: ${fixed(heuristics.score)} (${heuristics.flags.length} flag(s))`,
      heuristics.flags,
    );

    if (heuristics.outcome === 'gated') {
      log.info({ number: item.number, score: heuristics.score }, 'Tier 2 gated');
      return card.build(
        'review_required',
        heuristics.score,
        `Suspicion score ${fixed(heuristics.score)} exceeds threshold. Flagged: ${heuristics.flags.map(f => f.title).join(', ')}.`,
      );
    }

    // --- Tier 3: Vision alignment ---
    let alignment: AlignmentResult | undefined;
    if (this.config.enableTier3 && vision && this.judge) {
      alignment = await this.runJudge(this.judge, item, vision);
      card.withAlignment(alignment).addDimension(
        names.alignment,
        alignment.alignmentScore,
        `Alignment: ${fixed(alignment.alignmentScore)}`,
      );

      if (alignment.outcome === 'error') {
        return card.build(
          'review_required',
          JUDGE_ERROR_CONFIDENCE,
          `Vision assessment errored: ${alignment.concerns[0] ?? 'unknown error'}`,
        );
      }
      if (alignment.alignmentScore < LOW_ALIGNMENT) {
        return card.build(
          'review_required',
          1 - alignment.alignmentScore,
          `Low vision alignment (${fixed(alignment.alignmentScore)}). Violated: ${alignment.violatedPrinciples.join(', ') || 'none'}.`,
        );
      }
      if (card.flagCount > 0 && alignment.alignmentScore < MODERATE_ALIGNMENT) {
        return card.build(
          'review_required',
          MODERATE_CONFIDENCE,
          `Moderate alignment (${fixed(alignment.alignmentScore)}) combined with ${card.flagCount} suspicion flag(s) warrants review.`,
        );
      }
    } else if (this.config.enableTier3 && vision && !this.judge) {
      log.debug({ number: item.number }, 'No alignment judge configured, Tier 3 skipped');
    }

    const confidence = alignment && alignment.alignmentScore > 0
      ? alignment.alignmentScore
      : DEFAULT_FAST_TRACK_CONFIDENCE;
    return card.build('fast_track', confidence, `${names.noun} passed all tiers. Safe to fast-track.`);
  }

  /**
   * Assess many subjects under the injected controller, or with at most
   * config.maxConcurrent in flight. One subject failing is recorded on its
   * outcome and does not stop the rest.
   */
  async runBatch(requests: readonly AssessmentRequest[]): Promise<BatchOutcome[]> {
    if (requests.length === 0) return [];
    const controller = this.controller ?? new ConcurrencyController({ maxConcurrent: this.config.maxConcurrent });
    log.info({ count: requests.length, maxConcurrent: controller.getMaxConcurrent() }, 'Assessing batch');

    const results = await controller.mapSettled(requests, request => this.assess(request));
    let failed = 0;
    const outcomes = results.map((result, i): BatchOutcome => {
      const number = requests[i].item.number;
      if (result.status === 'fulfilled') return { number, scorecard: result.value };
      failed++;
      const error = result.reason instanceof Error ? result.reason.message : String(result.reason);
      log.warn({ number, err: error }, 'Assessment failed');
      return { number, error };
    });
    if (failed > 0) log.warn({ failed, total: requests.length }, 'Some assessments failed');
    return outcomes;
  }

  private async runJudge(judge: AlignmentJudge, item: ContributionItem, vision: VisionDocument): Promise<AlignmentResult> {
    const signal = AbortSignal.timeout(this.config.judgeTimeoutMs);
    try {
      return await judge.judge(item, vision, signal);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn({ number: item.number, reason }, 'Alignment judge threw, treating as error');
      return alignmentError(reason);
    }
  }
}
