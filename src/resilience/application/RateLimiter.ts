// src/resilience/application/RateLimiter.ts

/**
 * Sliding-window rate limiter.
 *
 * Keeps the timestamps of admitted calls per key over a trailing window
 * (60 s by default). Rejected calls are not recorded.
 *
 * allow() runs start to finish without awaiting, so prune/count/record is
 * atomic per key on the event loop.
 */

import { RateLimitExceededError } from '../../delegation/domain/Errors';

export type RateLimiterOptions = {
  windowMs?: number;
  now?: () => number;
};

export type RateDecision = {
  allowed: boolean;
  limit: number;

  /**
   * Slots left in the window after this decision.
   */
  remaining: number;

  /**
   * When the oldest recorded call leaves the window; null if the window is empty.
   */
  resetAt: Date | null;
};

export type RateLimiterStats = {
  keys: number;
  trackedCalls: number;
  windowMs: number;
};

export const DEFAULT_WINDOW_MS = 60_000;

export class SlidingWindowRateLimiter {
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly windows = new Map<string, number[]>();

  public constructor(options: RateLimiterOptions = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.now = options.now ?? (() => Date.now());
  }

  public allow(key: string, limitPerMinute: number): RateDecision {
    const now = this.now();
    const window = this.prune(key, now);
    const count = window.length;

    if (count >= limitPerMinute) {
      return {
        allowed: false,
        limit: limitPerMinute,
        remaining: 0,
        resetAt: this.resetAt(window),
      };
    }

    window.push(now);
    this.windows.set(key, window);

    return {
      allowed: true,
      limit: limitPerMinute,
      remaining: limitPerMinute - window.length,
      resetAt: this.resetAt(window),
    };
  }

  /**
   * Like allow(), but throws RateLimitExceededError when rejected.
   */
  public acquire(key: string, limitPerMinute: number): RateDecision {
    const decision = this.allow(key, limitPerMinute);
    if (!decision.allowed) {
      throw new RateLimitExceededError(key, limitPerMinute, decision.remaining, decision.resetAt);
    }
    return decision;
  }

  public reset(key: string): void {
    this.windows.delete(key);
  }

  public stats(): RateLimiterStats {
    let trackedCalls = 0;
    for (const [key] of this.windows) {
      trackedCalls += this.prune(key, this.now()).length;
    }
    return { keys: this.windows.size, trackedCalls, windowMs: this.windowMs };
  }

  /**
   * Drop entries at least windowMs old. Empty windows are removed from the map.
   */
  private prune(key: string, now: number): number[] {
    const existing = this.windows.get(key);
    if (!existing) return [];

    const cutoff = now - this.windowMs;
    const kept = existing.filter((ts) => ts > cutoff);

    if (kept.length === 0) {
      this.windows.delete(key);
    } else {
      this.windows.set(key, kept);
    }
    return kept;
  }

  private resetAt(window: number[]): Date | null {
    if (window.length === 0) return null;
    return new Date(window[0] + this.windowMs);
  }
}
