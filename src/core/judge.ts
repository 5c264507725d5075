/**
 * Tier 3: LLM-backed vision alignment judge
 */

import type { AlignmentResult, ContributionItem, Issue, PullRequest, VisionDocument } from './types';
import type { LLMProvider } from './provider';
import { createLogger } from './logger';

const log = createLogger('judge');

/** Below this the judge reports `gated` */
export const ALIGNMENT_PASS_SCORE = 0.4;

export interface AlignmentJudge {
  judge(item: ContributionItem, vision: VisionDocument, signal?: AbortSignal): Promise<AlignmentResult>;
}

const PR_SYSTEM_PROMPT =
  "You are a code reviewer assessing pull requests against a project's vision document. " +
  'Return ONLY valid JSON matching the schema below. No markdown, no extra keys, no extra text.';

const ISSUE_SYSTEM_PROMPT =
  "You are a project maintainer triaging GitHub issues against a project's vision document. " +
  'Return ONLY valid JSON matching the schema below. No markdown, no extra keys, no extra text.';

const SCHEMA_INSTRUCTION = `You MUST respond with ONLY valid JSON matching this exact schema:
{
  "alignment_score": <number 0.0-1.0>,
  "violated_principles": [<string>, ...],
  "strengths": [<string>, ...],
  "concerns": [<string>, ...]
}`;

function bullets(lines: readonly string[]): string {
  return lines.map(l => `- ${l}`).join('\n');
}

function visionSection(vision: VisionDocument): string {
  return `## Project: ${vision.project}

### Vision Principles
${bullets(vision.principles.map(p => `${p.name}: ${p.description}`))}

### Anti-Patterns to Watch For
${bullets(vision.antiPatterns)}

### Focus Areas
${bullets(vision.focusAreas)}`;
}

function pullRequestSection(pr: PullRequest): string {
  const diff = pr.diffText ? pr.diffText.slice(0, 5000) : '(no diff available)';
  return `## Pull Request #${pr.number}: ${pr.title}

**Author:** ${pr.author.login}
**Description:** ${pr.body ? pr.body.slice(0, 2000) : '(no description)'}

### Changed Files
${bullets(pr.files.map(f => `${f.filename} (+${f.additions}/-${f.deletions})`))}

### Diff (truncated)
\`\`\`
${diff}
\`\`\``;
}

function issueSection(issue: Issue): string {
  return `## Issue #${issue.number}: ${issue.title}

**Author:** ${issue.author.login}
**State:** ${issue.state}
**Labels:** ${issue.labels.length > 0 ? issue.labels.join(', ') : '(none)'}
**Comments:** ${issue.commentCount}
**Description:** ${issue.body ? issue.body.slice(0, 2000) : '(no description)'}`;
}

export function buildAlignmentPrompt(item: ContributionItem, vision: VisionDocument): string {
  const isPR = item.kind === 'pull_request';
  const subject = isPR ? pullRequestSection(item) : issueSection(item);
  const noun = isPR ? 'pull request' : 'GitHub issue';
  const low = isPR ? 'violates vision' : 'off-topic / violates vision';

  return `${isPR ? PR_SYSTEM_PROMPT : ISSUE_SYSTEM_PROMPT}

Assess this ${noun} for alignment with the project's vision document.

${visionSection(vision)}

${subject}

Evaluate alignment_score from 0.0 (${low}) to 1.0 (perfect fit). List any violated principle names exactly as shown above.

${SCHEMA_INSTRUCTION}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * Pull the JSON object out of a model reply (which may be wrapped in prose or
 * a code fence) and map it onto an AlignmentResult. Throws when no usable
 * object is present.
 */
export function parseAlignmentReply(text: string): AlignmentResult {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) throw new Error('no JSON object in reply');

  const parsed: unknown = JSON.parse(text.slice(start, end + 1));
  if (!isRecord(parsed)) throw new Error('reply is not a JSON object');

  const raw = parsed.alignment_score;
  const score = typeof raw === 'number' ? raw : Number(raw ?? 0);
  if (!Number.isFinite(score)) throw new Error(`alignment_score is not a number: ${String(raw)}`);
  const alignmentScore = Math.max(0, Math.min(1, score));

  return {
    outcome: alignmentScore >= ALIGNMENT_PASS_SCORE ? 'pass' : 'gated',
    alignmentScore,
    violatedPrinciples: strings(parsed.violated_principles),
    strengths: strings(parsed.strengths),
    concerns: strings(parsed.concerns),
  };
}

export function alignmentError(reason: string): AlignmentResult {
  return { outcome: 'error', alignmentScore: 0, violatedPrinciples: [], strengths: [], concerns: [reason] };
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error && reason.name === 'TimeoutError') return 'timed out';
  return reason instanceof Error ? reason.message : 'aborted';
}

/** Reject as soon as the signal fires, even if the wrapped call ignores it */
function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new Error(abortReason(signal)));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error(abortReason(signal)));
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      value => { signal.removeEventListener('abort', onAbort); resolve(value); },
      (err: unknown) => { signal.removeEventListener('abort', onAbort); reject(err); },
    );
  });
}

export class LLMAlignmentJudge implements AlignmentJudge {
  private provider: LLMProvider;

  constructor(provider: LLMProvider) {
    this.provider = provider;
  }

  async judge(item: ContributionItem, vision: VisionDocument, signal?: AbortSignal): Promise<AlignmentResult> {
    const prompt = buildAlignmentPrompt(item, vision);
    try {
      const reply = await raceAbort(
        this.provider.generateText(prompt, { temperature: 0.1, signal }),
        signal,
      );
      const result = parseAlignmentReply(reply);
      log.debug({ kind: item.kind, number: item.number, score: result.alignmentScore }, 'Alignment judged');
      return result;
    } catch (err: unknown) {
      const reason = `${this.provider.name}: ${err instanceof Error ? err.message : String(err)}`;
      log.warn({ kind: item.kind, number: item.number, reason }, 'Alignment judge failed');
      return alignmentError(reason);
    }
  }
}
