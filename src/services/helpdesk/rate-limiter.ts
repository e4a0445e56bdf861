/**
 * Sliding Window Rate Limiter for the helpdesk API.
 *
 * The API allows 600 requests per rolling minute. The limiter keeps the
 * timestamps of admitted requests in the trailing window and delays callers
 * once the window is full. When responses carry X-RateLimit-* headers, the
 * server's remaining budget takes precedence over the local estimate.
 */

import { logger } from '../../lib/logger.js';
import { raceAbort, sleep, throwIfAborted } from './abort.js';

/**
 * Configuration for the sliding window.
 */
export interface RateLimiterConfig {
  /** Requests admitted per window */
  limit: number;
  /** Window length in milliseconds */
  windowMs: number;
  /** Name used in log lines */
  name: string;
}

const DEFAULT_CONFIG: RateLimiterConfig = {
  limit: 600,
  windowMs: 60_000,
  name: 'api',
};

/**
 * Remaining budget as last reported by the server.
 */
export interface ServerBudget {
  remaining: number;
  /** Epoch milliseconds at which the server resets the budget */
  resetAt: number;
}

/**
 * Header values at or above this are epoch seconds, below it seconds-from-now.
 */
const EPOCH_SECONDS_THRESHOLD = 1_000_000_000;

function parseHeaderNumber(value: string | null): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

/**
 * Sliding window limiter with serialized admission.
 *
 * Only one caller at a time runs the prune/check/record sequence, so the
 * window can never hold more than `limit` entries for the same instant.
 */
export class SlidingWindowRateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly window: number[] = [];
  private serverLimit: number | undefined;
  private serverBudget: ServerBudget | undefined;

  // Tail of the admission chain; each admit() waits for its predecessor.
  private tail: Promise<void> = Promise.resolve();

  constructor(config: RateLimiterConfig) {
    this.config = config;
  }

  /**
   * Waits until a request may be sent, then records it.
   *
   * @param signal - Aborts the wait with RequestCancelledError
   */
  async admit(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);

    const previous = this.tail;
    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => turn);

    try {
      await raceAbort(previous, signal);
      await this.waitForSlot(signal);
      this.record(Date.now());
    } finally {
      release();
    }
  }

  /**
   * Updates the server budget from X-RateLimit-* response headers.
   */
  recalibrate(headers: Headers): void {
    const limit = parseHeaderNumber(headers.get('x-ratelimit-limit'));
    const remaining = parseHeaderNumber(headers.get('x-ratelimit-remaining'));
    const reset = parseHeaderNumber(headers.get('x-ratelimit-reset'));

    if (limit !== undefined && limit > 0) {
      this.serverLimit = Math.floor(limit);
    }

    if (remaining === undefined) {
      return;
    }

    const now = Date.now();
    let resetAt: number;
    if (reset === undefined) {
      resetAt = now + this.config.windowMs;
    } else if (reset >= EPOCH_SECONDS_THRESHOLD) {
      resetAt = reset * 1000;
    } else {
      resetAt = now + reset * 1000;
    }

    this.serverBudget = { remaining: Math.floor(remaining), resetAt };
    logger.debug('Rate limiter recalibrated from server headers', {
      limiter: this.config.name,
      remaining: this.serverBudget.remaining,
      resetInMs: resetAt - now,
      serverLimit: this.serverLimit,
    });
  }

  /**
   * Number of admissions in the trailing window.
   */
  getWindowSize(): number {
    this.prune(Date.now());
    return this.window.length;
  }

  /**
   * Local limit, lowered to the server's X-RateLimit-Limit when that is smaller.
   */
  getEffectiveLimit(): number {
    if (this.serverLimit === undefined) {
      return this.config.limit;
    }
    return Math.min(this.config.limit, this.serverLimit);
  }

  /**
   * Server budget, or undefined when none is known or it has expired.
   */
  getServerBudget(): ServerBudget | undefined {
    this.expireServerBudget(Date.now());
    return this.serverBudget ? { ...this.serverBudget } : undefined;
  }

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const waitMs = this.computeWait(Date.now());
      if (waitMs <= 0) {
        return;
      }

      logger.debug('Rate limiter waiting for slot', {
        limiter: this.config.name,
        waitMs,
        windowSize: this.window.length,
        limit: this.getEffectiveLimit(),
      });
      // Re-check after waking; the server budget may have changed meanwhile.
      await sleep(waitMs, signal);
    }
  }

  private computeWait(now: number): number {
    this.prune(now);
    this.expireServerBudget(now);

    let waitMs = 0;

    const oldest = this.window[0];
    if (oldest !== undefined && this.window.length >= this.getEffectiveLimit()) {
      waitMs = this.config.windowMs - (now - oldest);
    }

    if (this.serverBudget && this.serverBudget.remaining <= 0) {
      waitMs = Math.max(waitMs, this.serverBudget.resetAt - now);
    }

    return waitMs;
  }

  private record(now: number): void {
    this.window.push(now);
    if (this.serverBudget) {
      this.serverBudget.remaining = Math.max(0, this.serverBudget.remaining - 1);
    }
  }

  private prune(now: number): void {
    while (this.window.length > 0) {
      const oldest = this.window[0];
      if (oldest === undefined || now - oldest < this.config.windowMs) {
        break;
      }
      this.window.shift();
    }
  }

  private expireServerBudget(now: number): void {
    if (this.serverBudget && this.serverBudget.resetAt <= now) {
      this.serverBudget = undefined;
    }
  }
}

/**
 * Creates a rate limiter with helpdesk API defaults (600 per 60s).
 *
 * @param config - Partial configuration to override defaults
 */
export function createRateLimiter(
  config?: Partial<RateLimiterConfig>
): SlidingWindowRateLimiter {
  return new SlidingWindowRateLimiter({ ...DEFAULT_CONFIG, ...config });
}

export { DEFAULT_CONFIG as RATE_LIMITER_DEFAULT_CONFIG };
