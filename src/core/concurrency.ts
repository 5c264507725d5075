/**
 * ConcurrencyController: bounds how many embedding calls or orchestrator
 * runs are in flight at once. Slots are handed out in FIFO order.
 */

export interface ConcurrencyOptions {
  maxConcurrent?: number;
  /** Extra attempts after the first failure; 0 disables retry */
  retryAttempts?: number;
  retryDelay?: number;
}

export class ConcurrencyController {
  private maxConcurrent: number;
  private readonly initialMax: number;
  private readonly retryAttempts: number;
  private readonly retryDelay: number;
  private running = 0;
  private queue: Array<() => void> = [];

  constructor(opts: ConcurrencyOptions = {}) {
    this.maxConcurrent = Math.max(1, opts.maxConcurrent ?? 5);
    this.initialMax = this.maxConcurrent;
    this.retryAttempts = opts.retryAttempts ?? 0;
    this.retryDelay = opts.retryDelay ?? 1000;
  }

  getMaxConcurrent(): number {
    return this.maxConcurrent;
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Halve the limit (floor 1) after the upstream signals back-pressure */
  throttle(): void {
    this.maxConcurrent = Math.max(1, Math.floor(this.maxConcurrent / 2));
  }

  recover(): void {
    this.maxConcurrent = Math.min(this.initialMax, this.maxConcurrent + 1);
    this.drain();
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await this.withRetry(fn);
    } finally {
      this.release();
    }
  }

  /**
   * Run fn over every item under the limit. Results keep input order and a
   * rejection only affects its own slot.
   */
  async mapSettled<T, R>(items: readonly T[], fn: (item: T, index: number) => Promise<R>): Promise<PromiseSettledResult<R>[]> {
    return Promise.allSettled(items.map((item, i) => this.execute(() => fn(item, i))));
  }

  private acquire(): Promise<void> {
    if (this.running < this.maxConcurrent) {
      this.running++;
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.queue.push(() => {
        this.running++;
        resolve();
      });
    });
  }

  private release(): void {
    this.running--;
    this.drain();
  }

  private drain(): void {
    while (this.running < this.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) return;
      next();
    }
  }

  private async withRetry<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (attempt >= this.retryAttempts) throw err;
        await new Promise(r => setTimeout(r, this.retryDelay * (attempt + 1)));
      }
    }
  }
}
