import { RateLimiter, DEFAULT_RATE_LIMIT } from '../src/services/rate-limiter';
import { RequestPacer } from '../src/services/request-pacer';
import { CancellationError } from '../src/utils/error-handler';

describe('RateLimiter', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should use 5 requests per 60 seconds by default', () => {
    expect(new RateLimiter().getConfig()).toEqual(DEFAULT_RATE_LIMIT);
    expect(DEFAULT_RATE_LIMIT).toEqual({ maxRequests: 5, timeWindowSeconds: 60 });
  });

  it('should reject invalid settings', () => {
    expect(() => new RateLimiter({ maxRequests: 0 })).toThrow(RangeError);
    expect(() => new RateLimiter({ maxRequests: 1.5 })).toThrow(RangeError);
    expect(() => new RateLimiter({ timeWindowSeconds: 0 })).toThrow(RangeError);
  });

  it('should grant requests immediately while under the limit', async () => {
    const limiter = new RateLimiter({ maxRequests: 3, timeWindowSeconds: 60 });
    const started = Date.now();

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(Date.now() - started).toBeLessThan(1000);
    expect(limiter.recentCount()).toBe(3);
  });

  it('should wait for the window to slide once the limit is reached', async () => {
    const limiter = new RateLimiter({ maxRequests: 2, timeWindowSeconds: 0.2 });
    const started = Date.now();

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(Date.now() - started).toBeGreaterThanOrEqual(150);
  });

  it('should never exceed maxRequests inside any window', async () => {
    const limiter = new RateLimiter({ maxRequests: 2, timeWindowSeconds: 0.1 });
    const grantedAt: number[] = [];

    await Promise.all(
      Array.from({ length: 5 }, () => limiter.acquire().then(() => grantedAt.push(Date.now())))
    );

    grantedAt.sort((a, b) => a - b);
    for (let i = 2; i < grantedAt.length; i++) {
      // the (i-2)th grant must have left the window before the ith
      expect(grantedAt[i] - grantedAt[i - 2]).toBeGreaterThanOrEqual(95);
    }
  });

  it('should forget requests older than the window', () => {
    const limiter = new RateLimiter({ maxRequests: 2, timeWindowSeconds: 1 });
    return limiter.acquire().then(() => {
      expect(limiter.recentCount()).toBe(1);
      expect(limiter.recentCount(Date.now() + 1000)).toBe(0);
    });
  });

  it('should reject an aborted acquire without recording it', async () => {
    const limiter = new RateLimiter({ maxRequests: 1, timeWindowSeconds: 60 });
    await limiter.acquire();

    const controller = new AbortController();
    const waiting = limiter.acquire(controller.signal);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(CancellationError);
    expect(limiter.recentCount()).toBe(1);
  });

  it('should reject immediately with an already aborted signal', async () => {
    const limiter = new RateLimiter();
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(CancellationError);
    expect(limiter.pending).toBe(0);
  });
});

describe('RequestPacer', () => {
  it('should keep the minimum interval between requests', async () => {
    const pacer = new RequestPacer('Test', { minIntervalMs: 50, maxPerMinute: 100 });
    const started = Date.now();

    await pacer.wait();
    await pacer.wait();
    await pacer.wait();

    expect(Date.now() - started).toBeGreaterThanOrEqual(95);
  });

  it('should not delay the first request', async () => {
    const pacer = new RequestPacer('Test', { minIntervalMs: 5000, maxPerMinute: 10 });
    const started = Date.now();

    await pacer.wait();

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('should reject invalid pacing', () => {
    expect(() => new RequestPacer('Bad', { minIntervalMs: -1, maxPerMinute: 10 })).toThrow('Invalid pacing for Bad');
    expect(() => new RequestPacer('Bad', { minIntervalMs: 0, maxPerMinute: 0 })).toThrow(RangeError);
  });

  it('should cancel a paced wait', async () => {
    const pacer = new RequestPacer('Test', { minIntervalMs: 10000, maxPerMinute: 10 });
    await pacer.wait();

    const controller = new AbortController();
    const waiting = pacer.wait(controller.signal);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(CancellationError);
  });
});
