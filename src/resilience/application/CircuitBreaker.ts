// src/resilience/application/CircuitBreaker.ts

/**
 * CircuitBreaker
 * --------------
 * Per-agent failure-tracking gate.
 *
 *   closed --(failureThreshold consecutive failures)--> open
 *   open   --(openTimeoutMs elapsed, next call)-------> half-open
 *   half-open --(successThreshold probe successes)----> closed
 *   half-open --(probe failure)-----------------------> open (timer reset)
 *
 * While open, calls are rejected with CircuitOpenError without running the
 * operation. Half-open admits a single probe at a time.
 */

import { CallAbandonedError, CircuitOpenError, RateLimitExceededError } from '../../delegation/domain/Errors';
import { logger as defaultLogger, type AppLogger } from '../../shared/logging/Logger';

export type CircuitStateName = 'closed' | 'open' | 'half-open';

export type CircuitSettings = {
  failureThreshold: number;
  openTimeoutMs: number;
  successThreshold: number;
};

export type CircuitBreakerOptions = Partial<CircuitSettings> & {
  now?: () => number;

  /**
   * Decides which errors count against the circuit. Errors that do not count
   * neither increment nor reset the failure streak.
   */
  isFailure?: (err: unknown) => boolean;

  logger?: AppLogger;
};

export type CircuitStateChange = {
  circuit: string;
  from: CircuitStateName;
  to: CircuitStateName;
  at: Date;
};

export type CircuitSnapshot = {
  name: string;
  state: CircuitStateName;
  consecutiveFailures: number;
  openedAt: string | null;
  failureThreshold: number;
  openTimeoutMs: number;
};

export const DEFAULT_CIRCUIT_SETTINGS: CircuitSettings = {
  failureThreshold: 5,
  openTimeoutMs: 60_000,
  successThreshold: 1,
};

/**
 * Rate-limit rejections happen before the remote call, and abandoned calls
 * were cut short by the caller; neither says anything about the agent's health.
 */
export function countsAsCircuitFailure(err: unknown): boolean {
  return !(err instanceof RateLimitExceededError || err instanceof CallAbandonedError);
}

export class CircuitBreaker {
  private settings: CircuitSettings;
  private readonly now: () => number;
  private readonly isFailure: (err: unknown) => boolean;
  private readonly log: AppLogger;
  private readonly listeners = new Set<(change: CircuitStateChange) => void>();

  private state: CircuitStateName = 'closed';
  private consecutiveFailures = 0;
  private probeSuccesses = 0;
  private openedAt: number | null = null;
  private probeInFlight = false;

  public constructor(
    public readonly name: string,
    options: CircuitBreakerOptions = {},
  ) {
    this.settings = {
      failureThreshold: options.failureThreshold ?? DEFAULT_CIRCUIT_SETTINGS.failureThreshold,
      openTimeoutMs: options.openTimeoutMs ?? DEFAULT_CIRCUIT_SETTINGS.openTimeoutMs,
      successThreshold: options.successThreshold ?? DEFAULT_CIRCUIT_SETTINGS.successThreshold,
    };
    this.now = options.now ?? (() => Date.now());
    this.isFailure = options.isFailure ?? countsAsCircuitFailure;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Run the operation behind the gate.
   */
  public async execute<T>(operation: () => Promise<T>): Promise<T> {
    const isProbe = this.admit();

    let result: T;
    try {
      result = await operation();
    } catch (err) {
      if (this.isFailure(err)) {
        this.recordFailure(isProbe);
      } else if (isProbe) {
        this.probeInFlight = false;
      }
      throw err;
    }

    this.recordSuccess(isProbe);
    return result;
  }

  public getState(): CircuitStateName {
    return this.state;
  }

  public snapshot(): CircuitSnapshot {
    return {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt === null ? null : new Date(this.openedAt).toISOString(),
      failureThreshold: this.settings.failureThreshold,
      openTimeoutMs: this.settings.openTimeoutMs,
    };
  }

  /**
   * Subscribe to transitions. Returns an unsubscribe function.
   */
  public onStateChange(listener: (change: CircuitStateChange) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public updateSettings(settings: Partial<CircuitSettings>): void {
    this.settings = { ...this.settings, ...settings };
  }

  public reset(): void {
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.transition('closed');
  }

  public forceOpen(): void {
    this.trip();
  }

  /**
   * Returns true when the admitted call is the half-open probe.
   */
  private admit(): boolean {
    if (this.state === 'closed') return false;

    if (this.state === 'open') {
      const openedAt = this.openedAt ?? this.now();
      const retryAt = openedAt + this.settings.openTimeoutMs;
      if (this.now() < retryAt) {
        throw new CircuitOpenError(this.name, new Date(retryAt));
      }
      this.transition('half-open');
    } else if (this.probeInFlight) {
      throw new CircuitOpenError(this.name, new Date(this.now()));
    }

    this.probeInFlight = true;
    return true;
  }

  private recordSuccess(isProbe: boolean): void {
    if (this.state === 'closed') {
      this.consecutiveFailures = 0;
      return;
    }

    // Late results from calls admitted before the circuit tripped are ignored.
    if (this.state !== 'half-open' || !isProbe) return;

    this.probeInFlight = false;
    this.probeSuccesses += 1;
    if (this.probeSuccesses >= this.settings.successThreshold) {
      this.consecutiveFailures = 0;
      this.openedAt = null;
      this.transition('closed');
    }
  }

  private recordFailure(isProbe: boolean): void {
    if (this.state === 'closed') {
      this.consecutiveFailures += 1;
      if (this.consecutiveFailures >= this.settings.failureThreshold) {
        this.trip();
      }
      return;
    }

    if (this.state === 'half-open' && isProbe) {
      this.consecutiveFailures += 1;
      this.trip();
    }
  }

  private trip(): void {
    this.openedAt = this.now();
    this.probeInFlight = false;
    this.transition('open');
  }

  private transition(to: CircuitStateName): void {
    const from = this.state;
    this.probeSuccesses = 0;
    if (from === to) return;

    this.state = to;
    if (to !== 'half-open') this.probeInFlight = false;

    const change: CircuitStateChange = { circuit: this.name, from, to, at: new Date(this.now()) };
    const logFields = { circuit: this.name, from, to, consecutiveFailures: this.consecutiveFailures };
    if (to === 'open') {
      this.log.warn(logFields, 'Circuit opened');
    } else {
      this.log.info(logFields, 'Circuit state changed');
    }

    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        this.log.error({ circuit: this.name, err }, 'Circuit state listener failed');
      }
    }
  }
}
