import PQueue from 'p-queue';
import { Logger } from '../utils/logger';
import { raceWithAbort, sleep, throwIfAborted } from '../utils/retry';

export interface RateLimiterConfig {
  maxRequests: number;
  timeWindowSeconds: number;
}

export const DEFAULT_RATE_LIMIT: RateLimiterConfig = {
  maxRequests: 5,
  timeWindowSeconds: 60,
};

/**
 * Sliding-window limiter: at most `maxRequests` acquisitions in any trailing window.
 * Acquisitions run one at a time through a single-concurrency queue.
 */
export class RateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly timestamps: number[] = [];
  private readonly lock = new PQueue({ concurrency: 1 });

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = { ...DEFAULT_RATE_LIMIT, ...config };
    if (!Number.isInteger(this.config.maxRequests) || this.config.maxRequests < 1) {
      throw new RangeError('maxRequests must be a positive integer');
    }
    if (!(this.config.timeWindowSeconds > 0)) {
      throw new RangeError('timeWindowSeconds must be positive');
    }
  }

  /**
   * Wait for a free slot and record this call. An abort rejects and records nothing.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    await raceWithAbort(
      this.lock.add(() => this.waitForSlot(signal)),
      signal
    );
  }

  /**
   * Callers waiting for, or holding, the lock
   */
  get pending(): number {
    return this.lock.size + this.lock.pending;
  }

  /**
   * Calls recorded inside the current window
   */
  recentCount(now: number = Date.now()): number {
    this.prune(now);
    return this.timestamps.length;
  }

  getConfig(): RateLimiterConfig {
    return { ...this.config };
  }

  private get windowMs(): number {
    return this.config.timeWindowSeconds * 1000;
  }

  private prune(now: number): void {
    while (this.timestamps.length > 0 && now - this.timestamps[0] >= this.windowMs) {
      this.timestamps.shift();
    }
  }

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    for (;;) {
      throwIfAborted(signal);

      const now = Date.now();
      this.prune(now);

      if (this.timestamps.length < this.config.maxRequests) {
        this.timestamps.push(now);
        return;
      }

      const waitMs = this.timestamps[0] + this.windowMs - now;
      Logger.info(`Rate limit reached, waiting ${(waitMs / 1000).toFixed(2)}s`, {
        maxRequests: this.config.maxRequests,
        timeWindowSeconds: this.config.timeWindowSeconds,
      });
      await sleep(waitMs, signal);
    }
  }
}
