// src/delegation/infrastructure/TransportClient.ts

/**
 * TransportClient
 * ---------------
 * Sends delegation envelopes to one remote agent endpoint over a pooled
 * keep-alive connection (axios + http(s).Agent).
 *
 * Failure handling:
 * - timeout / connection errors (and 502/503/504) are retried with backoff
 * - an error object in the envelope is surfaced at once (remote_error)
 * - anything not matching the envelope is a protocol_error
 */

import http from 'http';
import https from 'https';
import { setTimeout as delay } from 'timers/promises';

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';

import { CallAbandonedError, CommunicationError } from '../domain/Errors';
import { MAX_TIMEOUT_MS } from '../domain/Workflow';
import {
  DELEGATE_METHOD,
  isDelegateFailure,
  parseDelegateResponse,
  type DelegateRequest,
} from '../domain/RpcEnvelope';
import { logger as defaultLogger, type AppLogger } from '../../shared/logging/Logger';
import { computeBackoffDelay, DEFAULT_RETRY_POLICY, type RetryPolicy } from './RetryPolicy';

export type TransportClientOptions = {
  /**
   * Default per-attempt timeout.
   */
  timeoutMs?: number;
  retry?: RetryPolicy;
  maxSockets?: number;

  /**
   * Replaces the HTTP layer; tests use this to stand in for a remote agent.
   */
  adapter?: AxiosAdapter;

  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  logger?: AppLogger;
};

export type DelegateOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

type LinkedSignal = {
  signal: AbortSignal;
  release: () => void;
};

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ERR_NETWORK',
]);

const GATEWAY_STATUSES = new Set([502, 503, 504]);

const DEFAULT_TIMEOUT_MS = 30_000;
const HEALTH_TIMEOUT_MS = 5_000;

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, signal ? { signal } : undefined);
}

export class TransportClient {
  private readonly http: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly log: AppLogger;

  private readonly shutdown = new AbortController();
  private readonly inFlight = new Set<Promise<string>>();
  private nextRequestId = 0;
  private closed = false;

  public constructor(
    public readonly endpoint: string,
    options: TransportClientOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.log = (options.logger ?? defaultLogger).child({ endpoint });

    this.httpAgent = new http.Agent({ keepAlive: true, maxSockets: options.maxSockets ?? 16 });
    this.httpsAgent = new https.Agent({ keepAlive: true, maxSockets: options.maxSockets ?? 16 });

    this.http = axios.create({
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      // Status codes are classified here, not by axios.
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  public get activeCalls(): number {
    return this.inFlight.size;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Delegate one task and return the agent's text result.
   */
  public async delegate(
    taskText: string,
    correlationId: string,
    options: DelegateOptions = {},
  ): Promise<string> {
    if (this.closed) {
      throw new CommunicationError('connection_refused', 'Transport client closed', this.endpoint);
    }

    const call = this.delegateWithRetry(taskText, correlationId, options);
    this.inFlight.add(call);
    try {
      return await call;
    } finally {
      this.inFlight.delete(call);
    }
  }

  /**
   * GET <endpoint>/health. Never throws.
   */
  public async healthCheck(): Promise<boolean> {
    try {
      const res = await this.http.get(`${this.endpoint.replace(/\/+$/, '')}/health`, {
        timeout: HEALTH_TIMEOUT_MS,
        signal: this.shutdown.signal,
      });
      return res.status === 200;
    } catch (err) {
      this.log.debug({ err }, 'Agent health check failed');
      return false;
    }
  }

  /**
   * Wait up to graceMs for in-flight calls, then abort the rest and release sockets.
   * Safe to call more than once.
   */
  public async close(graceMs = 0): Promise<void> {
    this.closed = true;

    if (this.inFlight.size > 0 && graceMs > 0) {
      let timer: NodeJS.Timeout | undefined;
      const graceElapsed = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, graceMs);
      });
      await Promise.race([Promise.allSettled(Array.from(this.inFlight)), graceElapsed]);
      clearTimeout(timer);
    }

    if (this.inFlight.size > 0) {
      this.log.warn({ abandoned: this.inFlight.size }, 'Abandoning in-flight delegations');
    }

    this.shutdown.abort();
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private async delegateWithRetry(
    taskText: string,
    correlationId: string,
    options: DelegateOptions,
  ): Promise<string> {
    const maxAttempts = this.retry.maxRetries + 1;
    let attempt = 0;

    for (;;) {
      attempt += 1;
      this.throwIfAborted(options.signal, attempt);

      try {
        return await this.attempt(taskText, correlationId, options);
      } catch (err) {
        const error = this.toCommunicationError(err, options.signal, attempt);

        if (!error.transient || attempt >= maxAttempts || this.isAborted(options.signal)) {
          this.log.debug(
            { correlationId, attempt, kind: error.kind, detail: error.detail },
            'Delegation failed',
          );
          throw error;
        }

        const waitMs = computeBackoffDelay(this.retry, attempt, this.random);
        this.log.warn(
          { correlationId, attempt, maxAttempts, waitMs, kind: error.kind, detail: error.detail },
          'Transient delegation failure, retrying',
        );

        const link = this.linkSignal(options.signal);
        try {
          await this.sleep(waitMs, link.signal);
        } catch {
          throw this.abandoned(options.signal, attempt);
        } finally {
          link.release();
        }
      }
    }
  }

  private async attempt(
    taskText: string,
    correlationId: string,
    options: DelegateOptions,
  ): Promise<string> {
    this.nextRequestId += 1;
    const request: DelegateRequest = {
      jsonrpc: '2.0',
      method: DELEGATE_METHOD,
      params: { task_text: taskText, correlation_id: correlationId },
      id: this.nextRequestId,
    };

    const link = this.linkSignal(options.signal);
    let res: AxiosResponse<unknown>;
    try {
      res = await this.http.post<unknown>(this.endpoint, request, {
        timeout: Math.min(options.timeoutMs ?? this.timeoutMs, MAX_TIMEOUT_MS),
        signal: link.signal,
        headers: { 'x-correlation-id': correlationId },
      });
    } finally {
      link.release();
    }

    const envelope = parseDelegateResponse(res.data);

    if (envelope && isDelegateFailure(envelope)) {
      throw new CommunicationError(
        'remote_error',
        `${envelope.error.code}: ${envelope.error.message}`,
        this.endpoint,
      );
    }

    if (GATEWAY_STATUSES.has(res.status)) {
      throw new CommunicationError('connection_refused', `HTTP ${res.status}`, this.endpoint);
    }

    if (res.status < 200 || res.status >= 300) {
      throw new CommunicationError('protocol_error', `Unexpected HTTP ${res.status}`, this.endpoint);
    }

    if (!envelope) {
      throw new CommunicationError('protocol_error', 'Response does not match the delegation envelope', this.endpoint);
    }

    if (envelope.id !== null && envelope.id !== request.id) {
      throw new CommunicationError(
        'protocol_error',
        `Response id ${String(envelope.id)} does not match request id ${request.id}`,
        this.endpoint,
      );
    }

    return envelope.result.text;
  }

  private toCommunicationError(err: unknown, signal: AbortSignal | undefined, attempt: number): CommunicationError {
    if (err instanceof CallAbandonedError) return err;
    if (err instanceof CommunicationError) {
      return new CommunicationError(err.kind, err.detail, this.endpoint, attempt);
    }

    if (axios.isCancel(err) || this.isAborted(signal)) {
      return this.abandoned(signal, attempt);
    }

    if (axios.isAxiosError(err)) {
      const code = err.code ?? '';
      if (code === 'ECONNABORTED' || code === 'ETIMEDOUT') {
        return new CommunicationError('timeout', err.message, this.endpoint, attempt);
      }
      if (CONNECTION_ERROR_CODES.has(code)) {
        return new CommunicationError('connection_refused', `${code}: ${err.message}`, this.endpoint, attempt);
      }
      return new CommunicationError('protocol_error', err.message, this.endpoint, attempt);
    }

    const message = err instanceof Error ? err.message : String(err);
    return new CommunicationError('protocol_error', message, this.endpoint, attempt);
  }

  private abandoned(signal: AbortSignal | undefined, attempt: number): CommunicationError {
    if (this.shutdown.signal.aborted && !signal?.aborted) {
      return new CommunicationError('connection_refused', 'Transport client closed', this.endpoint, attempt);
    }
    return new CallAbandonedError(this.endpoint, attempt);
  }

  private throwIfAborted(signal: AbortSignal | undefined, attempt: number): void {
    if (this.isAborted(signal)) {
      throw this.abandoned(signal, attempt);
    }
  }

  private isAborted(signal: AbortSignal | undefined): boolean {
    return this.shutdown.signal.aborted || signal?.aborted === true;
  }

  /**
   * Abort when either the caller or the client shutdown aborts.
   * release() must run once the attempt or sleep settles.
   */
  private linkSignal(signal: AbortSignal | undefined): LinkedSignal {
    if (!signal) return { signal: this.shutdown.signal, release: () => undefined };

    const controller = new AbortController();
    if (signal.aborted || this.shutdown.signal.aborted) {
      controller.abort();
      return { signal: controller.signal, release: () => undefined };
    }

    const abort = () => controller.abort();
    signal.addEventListener('abort', abort, { once: true });
    this.shutdown.signal.addEventListener('abort', abort, { once: true });
    return {
      signal: controller.signal,
      release: () => {
        signal.removeEventListener('abort', abort);
        this.shutdown.signal.removeEventListener('abort', abort);
      },
    };
  }
}
