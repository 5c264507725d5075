/**
 * Core type definitions for gatekeep
 */

export type ItemKind = 'pull_request' | 'issue';

export type Verdict = 'fast_track' | 'review_required' | 'recommend_close';

export type TierOutcome = 'pass' | 'gated' | 'skipped' | 'error';

export type FlagSeverity = 'high' | 'medium' | 'low';

export interface Author {
  login: string;
  accountCreatedAt?: string;   // ISO-8601
  contributionsToRepo: number;
}

export interface FileChange {
  filename: string;
  status: 'added' | 'removed' | 'modified' | 'renamed';
  additions: number;
  deletions: number;
}

interface ContributionBase {
  owner: string;
  repo: string;
  number: number;
  title: string;
  body: string;
  author: Author;
  createdAt?: string;
  updatedAt?: string;
  labels: string[];
}

export interface PullRequest extends ContributionBase {
  kind: 'pull_request';
  state: 'open' | 'closed' | 'merged';
  files: FileChange[];
  diffText: string;
  linkedIssues: number[];
  mergedAt?: string;
  totalAdditions: number;
  totalDeletions: number;
}

export interface Issue extends ContributionBase {
  kind: 'issue';
  state: 'open' | 'closed';
  assignees: string[];
  reactions: Record<string, number>;
  commentCount: number;
  milestone?: string;
  closedAt?: string;
}

export type ContributionItem = PullRequest | Issue;

/** Opaque text embedding; only dot products and norms are taken. */
export type Embedding = readonly number[];

/** Embeddings keyed by item number */
export type EmbeddingIndex = ReadonlyMap<number, Embedding>;

// --- Tier 1 ---

export interface DedupResult {
  outcome: Extract<TierOutcome, 'pass' | 'gated' | 'skipped'>;
  isDuplicate: boolean;
  duplicateOf: number | null;
  maxSimilarity: number;
}

export interface ClusterMember {
  number: number;
  title: string;
  author: string;
  /** Max similarity to any neighbour; null for the anchor the component was discovered from */
  similarity: number | null;
}

export interface DuplicateCluster {
  threshold: number;
  members: ClusterMember[];
}

// --- Tier 2 ---

export interface SuspicionFlag {
  readonly ruleId: string;
  readonly severity: FlagSeverity;
  readonly title: string;
  readonly explanation: string;
  readonly evidence: string;
}

export interface HeuristicResult {
  outcome: Extract<TierOutcome, 'pass' | 'gated'>;
  score: number;               // 0-1, capped
  flags: SuspicionFlag[];
}

// --- Tier 3 ---

export interface VisionPrinciple {
  name: string;
  description: string;
}

export interface LabelDefinition {
  name: string;
  description: string;
  keywords: string[];
  color: string;
  source: 'vision' | 'repository';
}

export interface VisionDocument {
  project: string;
  principles: VisionPrinciple[];
  antiPatterns: string[];
  focusAreas: string[];
  labelTaxonomy: LabelDefinition[];
}

export interface AlignmentResult {
  outcome: Extract<TierOutcome, 'pass' | 'gated' | 'error'>;
  alignmentScore: number;      // 0-1
  violatedPrinciples: string[];
  strengths: string[];
  concerns: string[];
}

// --- Scorecard ---

export interface DimensionScore {
  dimension: string;
  score: number;
  flags: SuspicionFlag[];
  summary: string;
}

export interface SubjectRef {
  kind: ItemKind;
  owner: string;
  repo: string;
  number: number;
}

export interface Scorecard {
  readonly subject: SubjectRef;
  readonly verdict: Verdict;
  readonly confidence: number;
  readonly dimensions: readonly DimensionScore[];
  readonly flags: readonly SuspicionFlag[];
  readonly summary: string;
  readonly dedupResult?: DedupResult;
  readonly heuristicResult?: HeuristicResult;
  readonly alignmentResult?: AlignmentResult;
}

// --- Blended two-signal results ---

export interface ConflictPair {
  prA: number;
  prB: number;
  prATitle: string;
  prBTitle: string;
  overlappingFiles: string[];
  fileOverlap: number;         // Jaccard of file sets
  semanticSimilarity: number;
  confidence: number;
}

export interface ConflictReport {
  owner: string;
  repo: string;
  totalOpenPRs: number;
  fileOverlapWeight: number;
  threshold: number;
  pairs: ConflictPair[];
}

export interface LinkSuggestion {
  prNumber: number;
  issueNumber: number;
  similarity: number;
  prTitle: string;
  issueTitle: string;
  isExplicit: boolean;         // PR already references the issue
}

export interface LinkingReport {
  owner: string;
  repo: string;
  totalPRs: number;
  totalIssues: number;
  threshold: number;
  suggestions: LinkSuggestion[];
  explicitLinks: LinkSuggestion[];
  orphanIssues: number[];
}

export type StaleSignal = 'superseded' | 'addressed' | 'blocked' | 'inactive';

export interface StaleItem {
  itemKind: ItemKind;
  number: number;
  title: string;
  signal: StaleSignal;
  relatedNumber?: number;
  relatedTitle?: string;
  similarity?: number;
  lastActivity?: string;
  explanation: string;
}

export interface StalenessReport {
  owner: string;
  repo: string;
  threshold: number;
  inactiveDays: number;
  totalOpenPRs: number;
  totalOpenIssues: number;
  totalMergedPRsChecked: number;
  supersededPRs: StaleItem[];
  addressedIssues: StaleItem[];
  blockedPRs: StaleItem[];
  inactivePRs: StaleItem[];
  inactiveIssues: StaleItem[];
}

export interface LabelSuggestion {
  label: string;
  confidence: number;
  embeddingSimilarity: number;
  keywordScore: number;
  keywordMatches: string[];
  source: LabelDefinition['source'];
}

export interface LabelingReport {
  owner: string;
  repo: string;
  itemKind: ItemKind;
  itemNumber: number;
  itemTitle: string;
  existingLabels: string[];
  taxonomySize: number;
  threshold: number;
  suggestions: LabelSuggestion[];
}

// --- Backlog audit ---

export interface AuditRiskEntry {
  prNumber: number;
  title: string;
  author: string;
  score: number;
  flagCount: number;
  highSeverityCount: number;
  flags: string[];
}

export interface AuditReport {
  owner: string;
  repo: string;
  prsAnalyzed: number;
  fastTrackCount: number;
  reviewRequiredCount: number;
  recommendCloseCount: number;
  clusters: { threshold: number; clusters: DuplicateCluster[] }[];
  highestRisk: AuditRiskEntry[];
  flagFrequency: Record<string, number>;
  uniqueAuthors: number;
  firstTimeContributors: number;
  newAccounts: number;
  sensitivePathPRs: number;
  lowTestPRs: number;
  visionDocument?: string;
}

// --- Review routing ---

/** One CODEOWNERS line: a glob and the logins after it, without the @ */
export interface CodeOwnerRule {
  pattern: string;
  owners: string[];
}

export interface ReviewerSuggestion {
  username: string;
  /** Relative to the strongest candidate, so the first suggestion is 1 */
  score: number;
  reasons: string[];
}

export interface ReviewRoutingReport {
  owner: string;
  repo: string;
  prNumber: number;
  prTitle: string;
  changedFiles: string[];
  codeownersFound: boolean;
  recentReviewersChecked: number;
  suggestions: ReviewerSuggestion[];
}

// --- Contributor profiles ---

export interface ContributorProfile {
  owner: string;
  repo: string;
  username: string;
  prsAnalyzed: number;
  reviewCount: number;
  totalPrs: number;
  mergedPrs: number;
  openPrs: number;
  /** Closed without merging */
  closedPrs: number;
  mergeRate: number;
  testInclusionRate: number;
  avgAdditions: number;
  avgDeletions: number;
  /** Top-level directories touched most often, at most five */
  areasOfExpertise: string[];
  firstContribution?: string;
  lastContribution?: string;
}
