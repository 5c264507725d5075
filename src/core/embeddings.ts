/**
 * Embedding collaborator: turns items into text and fills an embedding index
 * through an LLMProvider.
 */

import type { ContributionItem, LabelDefinition } from './types';
import type { LLMProvider } from './provider';
import { ConcurrencyController } from './concurrency';
import { createLogger } from './logger';

const log = createLogger('embeddings');

const BATCH_SIZE = 100;

/** Text used for dedup, clustering, linking and staleness embeddings */
export function itemToText(item: ContributionItem): string {
  const parts = [item.title];
  if (item.body) parts.push(item.body.slice(0, 1000));
  if (item.kind === 'pull_request') {
    if (item.files.length > 0) parts.push(item.files.map(f => f.filename).join(' '));
    if (item.diffText) parts.push(item.diffText.split('\n').slice(0, 100).join('\n'));
  } else if (item.labels.length > 0) {
    parts.push(item.labels.join(' '));
  }
  return parts.join('\n');
}

/** Text matched against label keywords */
export function itemToLabelText(item: ContributionItem): string {
  const parts = [item.title];
  if (item.body) parts.push(item.body.slice(0, 1000));
  if (item.kind === 'pull_request' && item.files.length > 0) {
    parts.push(item.files.map(f => f.filename).join(' '));
  }
  if (item.labels.length > 0) parts.push(item.labels.join(' '));
  return parts.join('\n');
}

export function labelToText(label: LabelDefinition): string {
  const parts = [label.name];
  if (label.description) parts.push(label.description);
  if (label.keywords.length > 0) parts.push(label.keywords.join(' '));
  return parts.join(' ');
}

/**
 * Embed every text keyed by `keyOf`. Batch calls go first when the provider
 * supports them; whatever is still missing afterwards is embedded one by one
 * under the concurrency controller. Failures are logged and left out of the
 * result, so callers see them as "no embedding".
 */
export async function embedTexts<K>(
  entries: readonly { key: K; text: string }[],
  provider: LLMProvider,
  cc: ConcurrencyController = new ConcurrencyController({ maxConcurrent: 5 }),
): Promise<Map<K, number[]>> {
  const embeddings = new Map<K, number[]>();
  if (entries.length === 0) return embeddings;

  const batch = provider.generateEmbeddingBatch?.bind(provider);
  if (batch) {
    for (let i = 0; i < entries.length; i += BATCH_SIZE) {
      const chunk = entries.slice(i, i + BATCH_SIZE);
      try {
        const vectors = await batch(chunk.map(e => e.text));
        chunk.forEach((e, j) => {
          const v = vectors[j];
          if (v && v.length > 0) embeddings.set(e.key, v);
        });
      } catch (err: unknown) {
        log.warn({ err, offset: i, size: chunk.length }, 'Batch embedding failed, falling back to individual calls');
      }
    }
  }

  const remaining = entries.filter(e => !embeddings.has(e.key));
  if (remaining.length > 0) {
    log.info({ count: remaining.length }, 'Embedding individually');
    const results = await cc.mapSettled(remaining, e => provider.generateEmbedding(e.text));
    let failed = 0;
    results.forEach((r, i) => {
      if (r.status === 'fulfilled' && r.value.length > 0) embeddings.set(remaining[i].key, r.value);
      else failed++;
    });
    if (failed > 0) log.warn({ failed, total: entries.length }, 'Some embeddings failed');
  }

  return embeddings;
}

export async function embedItems(
  items: readonly ContributionItem[],
  provider: LLMProvider,
  cc?: ConcurrencyController,
): Promise<Map<number, number[]>> {
  log.info({ count: items.length, provider: provider.name }, 'Embedding items');
  return embedTexts(items.map(item => ({ key: item.number, text: itemToText(item) })), provider, cc);
}
