/**
 * Label classification against a project taxonomy. Two signals: semantic
 * similarity between item and label embeddings, and the fraction of a
 * label's keywords that appear as whole words in the item text.
 */

import type {
  ContributionItem,
  Embedding,
  LabelDefinition,
  LabelSuggestion,
  LabelingReport,
} from './types';
import type { GateConfig } from './config';
import { itemToLabelText } from './embeddings';
import { blend, cosineSimilarity, round4 } from './similarity';
import { createLogger } from './logger';

const log = createLogger('labeling');

/** Label as it comes back from the repository's label listing */
export interface RepositoryLabel {
  name?: string;
  description?: string | null;
  color?: string | null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function keywordScore(text: string, keywords: readonly string[]): { score: number; matches: string[] } {
  if (keywords.length === 0) return { score: 0, matches: [] };
  const lower = text.toLowerCase();
  const matches = keywords.filter(kw => new RegExp(`\\b${escapeRegExp(kw.toLowerCase())}\\b`).test(lower));
  return { score: matches.length / keywords.length, matches };
}

export function repositoryLabelsToTaxonomy(raw: readonly RepositoryLabel[]): LabelDefinition[] {
  const taxonomy: LabelDefinition[] = [];
  for (const lb of raw) {
    const name = (lb.name ?? '').trim();
    if (!name) continue;
    taxonomy.push({
      name,
      description: lb.description ?? '',
      keywords: [],
      color: lb.color ?? '',
      source: 'repository',
    });
  }
  return taxonomy;
}

/** Vision labels win over repository labels with the same (case-insensitive) name */
export function mergeTaxonomies(
  visionLabels: readonly LabelDefinition[],
  repositoryLabels: readonly LabelDefinition[],
): LabelDefinition[] {
  const taken = new Set(visionLabels.map(lb => lb.name.toLowerCase()));
  return [...visionLabels, ...repositoryLabels.filter(lb => !taken.has(lb.name.toLowerCase()))];
}

export function classifyItem(
  item: ContributionItem,
  itemEmbedding: Embedding | undefined,
  taxonomy: readonly LabelDefinition[],
  labelEmbeddings: ReadonlyMap<string, Embedding>,
  config: GateConfig,
): LabelingReport {
  const threshold = config.labelThreshold;
  const keywordWeight = config.labelKeywordWeight;
  const report: LabelingReport = {
    owner: item.owner,
    repo: item.repo,
    itemKind: item.kind,
    itemNumber: item.number,
    itemTitle: item.title,
    existingLabels: [...item.labels],
    taxonomySize: taxonomy.length,
    threshold,
    suggestions: [],
  };
  if (taxonomy.length === 0) return report;

  const text = itemToLabelText(item);
  const suggestions: LabelSuggestion[] = [];
  for (const label of taxonomy) {
    const labelEmb = labelEmbeddings.get(label.name);
    const semantic = itemEmbedding && labelEmb ? cosineSimilarity(itemEmbedding, labelEmb) : 0;
    const kw = keywordScore(text, label.keywords);
    const confidence = blend(kw.score, keywordWeight, semantic);
    if (confidence < threshold) continue;
    suggestions.push({
      label: label.name,
      confidence: round4(confidence),
      embeddingSimilarity: round4(semantic),
      keywordScore: round4(kw.score),
      keywordMatches: kw.matches,
      source: label.source,
    });
  }

  suggestions.sort((a, b) => b.confidence - a.confidence);
  report.suggestions = suggestions.slice(0, config.labelMaxSuggestions);
  log.debug({ number: item.number, candidates: suggestions.length }, 'Labels classified');
  return report;
}
