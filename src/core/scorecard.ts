/**
 * ScorecardBuilder: mutable while the orchestrator walks the tiers, frozen
 * once built.
 */

import type {
  AlignmentResult,
  ContributionItem,
  DedupResult,
  DimensionScore,
  HeuristicResult,
  Scorecard,
  SubjectRef,
  SuspicionFlag,
  Verdict,
} from './types';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export class ScorecardBuilder {
  private readonly subject: SubjectRef;
  private readonly dimensions: DimensionScore[] = [];
  private readonly flags: SuspicionFlag[] = [];
  private dedupResult?: DedupResult;
  private heuristicResult?: HeuristicResult;
  private alignmentResult?: AlignmentResult;
  private built = false;

  constructor(item: ContributionItem) {
    this.subject = { kind: item.kind, owner: item.owner, repo: item.repo, number: item.number };
  }

  addDimension(dimension: string, score: number, summary: string, flags: readonly SuspicionFlag[] = []): this {
    this.dimensions.push({ dimension, score, summary, flags: [...flags] });
    return this;
  }

  withDedup(result: DedupResult): this {
    this.dedupResult = result;
    return this;
  }

  withHeuristics(result: HeuristicResult): this {
    this.heuristicResult = result;
    this.flags.push(...result.flags);
    return this;
  }

  withAlignment(result: AlignmentResult): this {
    this.alignmentResult = result;
    return this;
  }

  get flagCount(): number {
    return this.flags.length;
  }

  /** Tier results that were never set are left off the record entirely */
  build(verdict: Verdict, confidence: number, summary: string): Scorecard {
    if (this.built) throw new Error(`Scorecard for #${this.subject.number} was already built`);
    this.built = true;

    const card: Scorecard = {
      subject: { ...this.subject },
      verdict,
      confidence: clampUnit(confidence),
      dimensions: this.dimensions.map(d => ({ ...d, flags: [...d.flags] })),
      flags: [...this.flags],
      summary,
      ...(this.dedupResult && { dedupResult: structuredClone(this.dedupResult) }),
      ...(this.heuristicResult && { heuristicResult: structuredClone(this.heuristicResult) }),
      ...(this.alignmentResult && { alignmentResult: structuredClone(this.alignmentResult) }),
    };
    return deepFreeze(card);
  }
}
