import PQueue from 'p-queue';
import { Logger } from '../utils/logger';
import { raceWithAbort, sleep, throwIfAborted } from '../utils/retry';

export interface RequestPacerConfig {
  /** Minimum gap between two requests */
  minIntervalMs: number;
  /** Rolling cap over the last 60 seconds */
  maxPerMinute: number;
}

const ONE_MINUTE_MS = 60_000;

/**
 * Per-client pacing, stacked under the crawler's shared RateLimiter
 */
export class RequestPacer {
  private readonly requestTimes: number[] = [];
  private lastRequestAt: number | null = null;
  private readonly lock = new PQueue({ concurrency: 1 });

  constructor(
    private readonly name: string,
    private readonly config: RequestPacerConfig
  ) {
    if (config.minIntervalMs < 0 || !Number.isInteger(config.maxPerMinute) || config.maxPerMinute < 1) {
      throw new RangeError(`Invalid pacing for ${name}`);
    }
  }

  async wait(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    await raceWithAbort(
      this.lock.add(() => this.pace(signal)),
      signal
    );
  }

  getConfig(): RequestPacerConfig {
    return { ...this.config };
  }

  private async pace(signal?: AbortSignal): Promise<void> {
    let now = Date.now();
    this.pruneOlderThanAMinute(now);

    if (this.requestTimes.length >= this.config.maxPerMinute) {
      const waitMs = this.requestTimes[0] + ONE_MINUTE_MS - now;
      if (waitMs > 0) {
        Logger.info(`[${this.name}] Per-minute cap reached, waiting ${(waitMs / 1000).toFixed(1)}s`);
        await sleep(waitMs, signal);
      }
      now = Date.now();
      this.pruneOlderThanAMinute(now);
    }

    if (this.lastRequestAt !== null) {
      const sinceLast = now - this.lastRequestAt;
      if (sinceLast < this.config.minIntervalMs) {
        await sleep(this.config.minIntervalMs - sinceLast, signal);
        now = Date.now();
      }
    }

    this.lastRequestAt = now;
    this.requestTimes.push(now);
  }

  private pruneOlderThanAMinute(now: number): void {
    while (this.requestTimes.length > 0 && now - this.requestTimes[0] >= ONE_MINUTE_MS) {
      this.requestTimes.shift();
    }
  }
}
