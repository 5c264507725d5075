import type { GenerateOptions, LLMProvider } from './provider';
import { ProviderError } from './errors';
import { createLogger } from './logger';

const log = createLogger('retryable-provider');

const NON_RETRYABLE = new Set([400, 401, 403, 404, 422]);

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  onThrottle?: () => void;
}

function statusOf(err: unknown): number | undefined {
  if (err instanceof ProviderError) return err.status;
  if (err instanceof Error) {
    const match = err.message.match(/\b(4\d{2}|5\d{2})\b/);
    return match ? parseInt(match[1], 10) : undefined;
  }
  return undefined;
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

function abortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error('Request aborted');
}

/** Back-off wait that ends early, with a rejection, when the caller aborts */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) return new Promise(resolve => setTimeout(resolve, ms));
  if (signal.aborted) return Promise.reject(abortError(signal));
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Wraps a provider with exponential back-off on 429/5xx. An aborted request
 * is never retried.
 */
export class RetryableProvider implements LLMProvider {
  get name() { return this.inner.name; }
  get supportsEmbeddings() { return this.inner.supportsEmbeddings; }

  private inner: LLMProvider;
  private maxRetries: number;
  private baseDelay: number;
  private maxDelay: number;
  private onThrottle?: () => void;

  constructor(inner: LLMProvider, opts: RetryOptions = {}) {
    this.inner = inner;
    this.maxRetries = opts.maxRetries ?? 3;
    this.baseDelay = opts.baseDelay ?? 1000;
    this.maxDelay = opts.maxDelay ?? 30000;
    this.onThrottle = opts.onThrottle;
  }

  async generateText(prompt: string, options?: GenerateOptions): Promise<string> {
    return this.withRetry(() => this.inner.generateText(prompt, options), 'generateText', options?.signal);
  }

  async generateEmbedding(text: string): Promise<number[]> {
    return this.withRetry(() => this.inner.generateEmbedding(text), 'generateEmbedding');
  }

  get generateEmbeddingBatch(): ((texts: string[]) => Promise<number[][]>) | undefined {
    const inner = this.inner;
    if (!inner.generateEmbeddingBatch) return undefined;
    return (texts: string[]) =>
      this.withRetry(() => inner.generateEmbeddingBatch?.(texts) ?? Promise.resolve([]), 'generateEmbeddingBatch');
  }

  private async withRetry<T>(fn: () => Promise<T>, label: string, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (err: unknown) {
        const status = statusOf(err);

        if (isAbort(err) || signal?.aborted) throw err;
        if (status !== undefined && NON_RETRYABLE.has(status)) throw err;
        if (attempt >= this.maxRetries) throw err;

        let delay = this.baseDelay * Math.pow(2, attempt);
        if (status === 429) {
          this.onThrottle?.();
          if (err instanceof ProviderError && err.retryAfter !== undefined) {
            delay = err.retryAfter * 1000;
          }
          log.warn({ attempt, delay, label }, 'Rate limited (429), backing off');
        } else {
          log.warn({ attempt, delay, label, err: err instanceof Error ? err.message : String(err) }, 'Retrying after error');
        }

        delay = Math.min(delay, this.maxDelay);
        await sleep(delay, signal);
      }
    }
  }
}
