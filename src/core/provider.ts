/**
 * Multi-provider LLM abstraction backing the Tier-3 judge and item embeddings
 */

import { ProviderError } from './errors';

/** Default models per provider */
export const DEFAULT_PROVIDER_MODELS: Record<ProviderName, string> = {
  gemini: 'gemini-2.0-flash',
  openai: 'gpt-4o-mini',
  anthropic: 'claude-haiku-4-5-20251001',
  openrouter: 'anthropic/claude-sonnet-4.5',
};

export type ProviderName = 'gemini' | 'openai' | 'anthropic' | 'openrouter';

export const PROVIDER_NAMES: readonly ProviderName[] = ['gemini', 'openai', 'anthropic', 'openrouter'];

export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMProvider {
  readonly name: string;
  readonly supportsEmbeddings?: boolean;
  generateText(prompt: string, options?: GenerateOptions): Promise<string>;
  generateEmbedding(text: string): Promise<number[]>;
  generateEmbeddingBatch?(texts: string[]): Promise<number[][]>;
}

/** The judge asks for a JSON object with a few short lists, so verbose models need room */
function defaultMaxTokens(model: string): number {
  if (/sonnet|opus|claude-3/.test(model)) return 1024;
  return 512;
}

function parseRetryAfter(res: Response): number | undefined {
  const raw = res.headers?.get('retry-after');
  if (!raw) return undefined;
  const seconds = Number(raw);
  return Number.isFinite(seconds) ? seconds : undefined;
}

async function failure(label: string, res: Response): Promise<ProviderError> {
  const detail = await res.text().catch(() => '');
  const message = detail ? `${label} ${res.status}: ${detail}` : `${label} ${res.status}`;
  return new ProviderError(message, res.status, parseRetryAfter(res));
}

export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini';
  readonly supportsEmbeddings = true;
  private apiKey: string;
  private model: string;

  constructor(apiKey: string, model = DEFAULT_PROVIDER_MODELS.gemini) {
    this.apiKey = apiKey;
    this.model = model;
  }

  async generateText(prompt: string, options?: GenerateOptions): Promise<string> {
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent`;
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-goog-api-key': this.apiKey },
      body: JSON.stringify({
        contents: [{ parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: options?.temperature ?? 0.1,
          maxOutputTokens: options?.maxTokens ?? defaultMaxTokens(this.model),
        },
      }),
      signal: options?.signal,
    });
    if (!res.ok) throw await failure('Gemini', res);
    const data: { candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }> } = await res.json();
    return data.candidates?.[0]?.content?.parts?.[0]?.text ?? '';
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const url = 'https://generativelanguage.googleapis.com/v1beta/models/gemini-embedding-001:embedContent';
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-goog-api-key': this.apiKey },
      body: JSON.stringify({
        model: 'models/gemini-embedding-001',
        content: { parts: [{ text }] },
      }),
    });
    if (!res.ok) throw await failure('Embedding API error:', res);
    const data: { embedding?: { values?: number[] } } = await res.json();
    return data.embedding?.values ?? [];
  }

  async generateEmbeddingBatch(texts: string[]): Promise<number[][]> {
    const url = 'https://generativelanguage.googleapis.com/v1beta/models/gemini-embedding-001:batchEmbedContents';
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-goog-api-key': this.apiKey },
      body: JSON.stringify({
        requests: texts.map(text => ({
          model: 'models/gemini-embedding-001',
          content: { parts: [{ text }] },
        })),
      }),
    });
    if (!res.ok) throw await failure('Embedding API error:', res);
    const data: { embeddings?: Array<{ values?: number[] }> } = await res.json();
    const embeddings = (data.embeddings ?? []).map(e => e.values ?? []);
    if (embeddings.length !== texts.length) {
      throw new Error(`Gemini returned ${embeddings.length} embeddings for ${texts.length} inputs`);
    }
    return embeddings;
  }
}

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  readonly supportsEmbeddings = true;
  private apiKey: string;
  private model: string;

  constructor(apiKey: string, model = DEFAULT_PROVIDER_MODELS.openai) {
    this.apiKey = apiKey;
    this.model = model;
  }

  async generateText(prompt: string, options?: GenerateOptions): Promise<string> {
    const res = await fetch('https://api.openai.com/v1/chat/completions', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: options?.temperature ?? 0.1,
        max_tokens: options?.maxTokens ?? defaultMaxTokens(this.model),
        response_format: { type: 'json_object' },
      }),
      signal: options?.signal,
    });
    if (!res.ok) throw await failure('OpenAI', res);
    const data: { choices?: Array<{ message?: { content?: string } }> } = await res.json();
    return data.choices?.[0]?.message?.content ?? '';
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const [embedding] = await this.embed(text);
    if (!embedding || embedding.length === 0) {
      throw new Error('Empty embedding returned from OpenAI');
    }
    return embedding;
  }

  async generateEmbeddingBatch(texts: string[]): Promise<number[][]> {
    const embeddings = await this.embed(texts);
    if (embeddings.length !== texts.length) {
      throw new Error(`OpenAI returned ${embeddings.length} embeddings for ${texts.length} inputs`);
    }
    return embeddings;
  }

  private async embed(input: string | string[]): Promise<number[][]> {
    const res = await fetch('https://api.openai.com/v1/embeddings', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({ model: 'text-embedding-3-small', input }),
    });
    if (!res.ok) throw await failure('OpenAI Embedding', res);
    const data: { data?: Array<{ index?: number; embedding?: number[] }> } = await res.json();
    return [...(data.data ?? [])]
      .sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      .map(d => d.embedding ?? []);
  }
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly supportsEmbeddings = false;
  private apiKey: string;
  private model: string;
  private embeddingFallback?: LLMProvider;

  constructor(apiKey: string, model = DEFAULT_PROVIDER_MODELS.anthropic, embeddingFallback?: LLMProvider) {
    this.apiKey = apiKey;
    this.model = model;
    this.embeddingFallback = embeddingFallback;
  }

  async generateText(prompt: string, options?: GenerateOptions): Promise<string> {
    const res = await fetch('https://api.anthropic.com/v1/messages', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: options?.maxTokens ?? defaultMaxTokens(this.model),
        messages: [{ role: 'user', content: prompt }],
        temperature: options?.temperature ?? 0.1,
      }),
      signal: options?.signal,
    });
    if (!res.ok) throw await failure('Anthropic', res);
    const data: { content?: Array<{ text?: string }> } = await res.json();
    return data.content?.[0]?.text ?? '';
  }

  async generateEmbedding(text: string): Promise<number[]> {
    if (!this.embeddingFallback) {
      throw new Error('Anthropic does not support embeddings. Provide an embeddingFallback provider.');
    }
    return this.embeddingFallback.generateEmbedding(text);
  }
}

export class OpenRouterProvider implements LLMProvider {
  readonly name = 'openrouter';
  readonly supportsEmbeddings = false;
  private apiKey: string;
  private model: string;
  private embeddingFallback?: LLMProvider;

  constructor(apiKey: string, model = DEFAULT_PROVIDER_MODELS.openrouter, embeddingFallback?: LLMProvider) {
    this.apiKey = apiKey;
    this.model = model;
    this.embeddingFallback = embeddingFallback;
  }

  async generateText(prompt: string, options?: GenerateOptions): Promise<string> {
    const res = await fetch('https://openrouter.ai/api/v1/chat/completions', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
        'X-Title': 'gatekeep',
      },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: options?.temperature ?? 0.1,
        max_tokens: options?.maxTokens ?? defaultMaxTokens(this.model),
      }),
      signal: options?.signal,
    });
    if (!res.ok) throw await failure('OpenRouter', res);
    const data: { choices?: Array<{ message?: { content?: string } }> } = await res.json();
    return data.choices?.[0]?.message?.content ?? '';
  }

  async generateEmbedding(text: string): Promise<number[]> {
    if (!this.embeddingFallback) {
      throw new Error('OpenRouter does not support embeddings. Provide an embeddingFallback provider (e.g., Gemini).');
    }
    return this.embeddingFallback.generateEmbedding(text);
  }
}

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some(name => name === value);
}

/**
 * Pick an embedding-capable provider from whichever API key is present.
 */
export function autoEmbeddingFallback(env: NodeJS.ProcessEnv = process.env): LLMProvider | undefined {
  if (env.GEMINI_API_KEY) return new GeminiProvider(env.GEMINI_API_KEY);
  if (env.OPENAI_API_KEY) return new OpenAIProvider(env.OPENAI_API_KEY);
  return undefined;
}

export function createProvider(name: string, apiKey: string, model?: string, embeddingFallback?: LLMProvider): LLMProvider {
  if (!isProviderName(name)) throw new Error(`Unknown provider: ${name}`);
  const m = model || DEFAULT_PROVIDER_MODELS[name];
  const ef = embeddingFallback ?? autoEmbeddingFallback();
  switch (name) {
    case 'gemini': return new GeminiProvider(apiKey, m);
    case 'openai': return new OpenAIProvider(apiKey, m);
    case 'anthropic': return new AnthropicProvider(apiKey, m, ef);
    case 'openrouter': return new OpenRouterProvider(apiKey, m, ef);
  }
}
