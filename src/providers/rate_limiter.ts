/**
 * Sliding-window rate limiter with a concurrency cap, one per provider client.
 */

import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('rate_limiter');

export interface RateLimiterConfig {
  maxRequestsPerWindow: number;
  windowMs: number;
  maxConcurrent: number;
}

export class RateLimiter {
  private requestTimes: number[] = [];
  private activeRequests = 0;
  private waitQueue: Array<() => void> = [];
  private readonly config: RateLimiterConfig;

  constructor(
    private readonly name: string,
    config: Partial<RateLimiterConfig> = {}
  ) {
    this.config = {
      maxRequestsPerWindow: config.maxRequestsPerWindow ?? 10,
      windowMs: config.windowMs ?? 1_000,
      maxConcurrent: config.maxConcurrent ?? 2,
    };
  }

  static perSecond(name: string, requestsPerSecond: number, maxConcurrent: number): RateLimiter {
    return new RateLimiter(name, {
      maxRequestsPerWindow: Math.max(1, Math.floor(requestsPerSecond)),
      windowMs: 1_000,
      maxConcurrent,
    });
  }

  private cleanOldRequests(): void {
    const windowStart = Date.now() - this.config.windowMs;
    this.requestTimes = this.requestTimes.filter((t) => t > windowStart);
  }

  private async waitForSlot(): Promise<void> {
    // Concurrency first so that window accounting reflects actual start times
    while (this.activeRequests >= this.config.maxConcurrent) {
      await new Promise<void>((resolve) => {
        this.waitQueue.push(resolve);
      });
    }

    this.cleanOldRequests();
    while (this.requestTimes.length >= this.config.maxRequestsPerWindow) {
      const oldestRequest = this.requestTimes[0] ?? Date.now();
      const waitTime = oldestRequest + this.config.windowMs - Date.now();
      if (waitTime > 0) {
        logger.debug({ limiter: this.name, waitTime }, 'Rate limit reached, waiting');
        await this.sleep(waitTime);
      }
      this.cleanOldRequests();
    }
  }

  async acquire(): Promise<void> {
    await this.waitForSlot();
    this.activeRequests++;
    this.requestTimes.push(Date.now());
  }

  release(): void {
    this.activeRequests = Math.max(0, this.activeRequests - 1);
    const next = this.waitQueue.shift();
    if (next) {
      next();
    }
  }

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
