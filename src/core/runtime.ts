/**
 * Pairs an LLM provider with the ConcurrencyController that schedules its
 * calls. Retries live in RetryableProvider alone; the controller only bounds
 * what is in flight, and a 429 from the provider halves that bound.
 */

import type { LLMProvider } from './provider';
import { RetryableProvider } from './retryable-provider';
import type { RetryOptions } from './retryable-provider';
import { ConcurrencyController } from './concurrency';

export interface Runtime {
  controller: ConcurrencyController;
  provider?: LLMProvider;
}

export function createRuntime(
  maxConcurrent: number,
  inner: LLMProvider,
  retry?: Omit<RetryOptions, 'onThrottle'>,
): Required<Runtime>;
export function createRuntime(
  maxConcurrent: number,
  inner?: LLMProvider,
  retry?: Omit<RetryOptions, 'onThrottle'>,
): Runtime;
export function createRuntime(
  maxConcurrent: number,
  inner?: LLMProvider,
  retry: Omit<RetryOptions, 'onThrottle'> = {},
): Runtime {
  const controller = new ConcurrencyController({ maxConcurrent });
  if (!inner) return { controller };
  const provider = new RetryableProvider(inner, {
    ...retry,
    onThrottle: () => controller.throttle(),
  });
  return { controller, provider };
}
