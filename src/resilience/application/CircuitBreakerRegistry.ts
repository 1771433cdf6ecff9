// src/resilience/application/CircuitBreakerRegistry.ts

import {
  CircuitBreaker,
  type CircuitBreakerOptions,
  type CircuitSettings,
  type CircuitSnapshot,
  type CircuitStateChange,
} from './CircuitBreaker';

/**
 * One breaker per agent, created lazily. Keys are per agent only, not per caller.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly listeners = new Set<(change: CircuitStateChange) => void>();

  public constructor(private readonly defaults: CircuitBreakerOptions = {}) {}

  /**
   * Get (or create) the breaker for a key. Per-agent overrides are applied on
   * every call so a re-registered descriptor takes effect.
   */
  public get(key: string, overrides: Partial<CircuitSettings> = {}): CircuitBreaker {
    const normalized = key.trim().toLowerCase();
    let breaker = this.breakers.get(normalized);

    if (!breaker) {
      breaker = new CircuitBreaker(normalized, { ...this.defaults, ...overrides });
      breaker.onStateChange((change) => {
        for (const listener of this.listeners) listener(change);
      });
      this.breakers.set(normalized, breaker);
    } else if (Object.keys(overrides).length > 0) {
      breaker.updateSettings(overrides);
    }

    return breaker;
  }

  /**
   * Observe transitions of every breaker, current and future.
   */
  public onStateChange(listener: (change: CircuitStateChange) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public snapshot(): CircuitSnapshot[] {
    return Array.from(this.breakers.values()).map((b) => b.snapshot());
  }
}
