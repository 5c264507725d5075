/**
 * gatekeep: tiered risk assessment for open-source contributions
 *
 * Core pipeline:
 * 1. Tier 1: embedding dedup against existing items
 * 2. Tier 2: deterministic heuristic rules, severity-weighted
 * 3. Tier 3: optional LLM judge of vision alignment
 * 4. Frozen scorecard with verdict, confidence and per-tier dimensions
 */

export { TierOrchestrator } from './core/orchestrator';
export type { AssessmentRequest, BatchOutcome, OrchestratorDeps } from './core/orchestrator';
export { DedupEngine } from './core/dedup';
export { HeuristicEngine, PULL_REQUEST_RULES, ISSUE_RULES, SEVERITY_WEIGHTS, aggregateFlags } from './core/heuristics';
export type { HeuristicRule, RuleContext } from './core/heuristics';
export {
  cosineSimilarity,
  similarityMatrix,
  bestMatch,
  temporalGuardedMatch,
  findClusters,
  blend,
} from './core/similarity';
export { ScorecardBuilder } from './core/scorecard';
export { LLMAlignmentJudge, buildAlignmentPrompt, parseAlignmentReply } from './core/judge';
export type { AlignmentJudge } from './core/judge';
export { parseVisionDocument, loadVisionDocument } from './core/vision';
export {
  createGateConfig,
  resolveGateConfig,
  configFromEnv,
  loadConfigFile,
  DEFAULT_CONFIG,
  DEFAULT_SENSITIVE_PATHS,
} from './core/config';
export type { GateConfig } from './core/config';
export { ConfigError, EmbeddingShapeError, ProviderError, SnapshotError, VisionDocumentError } from './core/errors';
export { runAudit } from './core/audit';
export { detectConflicts } from './core/conflicts';
export { findIssuePrLinks } from './core/linking';
export { detectStaleItems } from './core/staleness';
export { classifyItem, mergeTaxonomies, repositoryLabelsToTaxonomy } from './core/labeling';
export { parseCodeowners, matchCodeowners, pastReviewers, suggestReviewers } from './core/routing';
export type { RoutingInput } from './core/routing';
export { buildContributorProfile, profileContributors, countReviews } from './core/profiles';
export type { ProfileContext } from './core/profiles';
export { embedItems, embedTexts } from './core/embeddings';
export { parseSnapshot, loadSnapshot } from './core/snapshot';
export type { Snapshot } from './core/snapshot';
export { ConcurrencyController } from './core/concurrency';
export { RetryableProvider } from './core/retryable-provider';
export { createRuntime } from './core/runtime';
export type { Runtime } from './core/runtime';
export { createProvider, GeminiProvider, OpenAIProvider, AnthropicProvider, OpenRouterProvider } from './core/provider';
export type { LLMProvider, ProviderName } from './core/provider';
export type * from './core/types';
