/**
 * Async Utility Functions
 *
 * Cooperative cancellation and a bounded worker pool for fan-out/fan-in work.
 *
 * @module
 */

// =============================================================================
// Cancellation
// =============================================================================

/**
 * A token that can be used to cancel async operations.
 * Follows the cancellation token pattern for cooperative cancellation.
 */
export class CancellationToken {
  private _cancelled = false;
  private _reason?: string;

  /** Whether the token has been cancelled */
  get cancelled(): boolean {
    return this._cancelled;
  }

  /**
   * Cancels the token. Later calls keep the first reason.
   */
  cancel(reason?: string): void {
    if (!this._cancelled) {
      this._cancelled = true;
      this._reason = reason;
    }
  }

  /**
   * Throws an error if the token has been cancelled.
   * Use this for cooperative cancellation checks.
   */
  throwIfCancelled(): void {
    if (this._cancelled) {
      throw new Error(this._reason ?? "Operation cancelled");
    }
  }
}

/**
 * A CancellationToken source that owns and can cancel a token.
 */
export class CancellationTokenSource {
  readonly token: CancellationToken;

  constructor() {
    this.token = new CancellationToken();
  }

  cancel(reason?: string): void {
    this.token.cancel(reason);
  }
}

// =============================================================================
// Concurrency Utilities
// =============================================================================

export interface MapConcurrentOptions {
  /** Maximum concurrent operations */
  concurrency: number;
  /**
   * Source cancelled when any operation fails. Workers stop taking new items
   * once its token is cancelled; operations already running see the token.
   */
  cancellation?: CancellationTokenSource;
}

/**
 * Runs `fn` over `items` on a bounded pool of workers and joins on all of them.
 * Results keep the order of `items`. The first failure cancels the pool; the
 * returned promise rejects with that failure once every running operation
 * has settled.
 *
 * @param items - Items to process
 * @param fn - Async function to apply to each item
 */
export async function mapConcurrent<T, U>(
  items: readonly T[],
  fn: (item: T, index: number, token: CancellationToken) => Promise<U>,
  options: MapConcurrentOptions
): Promise<U[]> {
  const source = options.cancellation ?? new CancellationTokenSource();
  const results: U[] = new Array<U>(items.length);
  let currentIndex = 0;
  const failures: unknown[] = [];

  async function worker(): Promise<void> {
    while (!source.token.cancelled && currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        results[index] = await fn(item, index, source.token);
      } catch (error) {
        failures.push(error);
        source.cancel(error instanceof Error ? error.message : String(error));
      }
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(options.concurrency, items.length)) }, () => worker());

  await Promise.allSettled(workers);
  if (failures.length > 0) throw failures[0];
  return results;
}
