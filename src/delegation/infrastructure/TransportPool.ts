// src/delegation/infrastructure/TransportPool.ts

import { CommunicationError } from '../domain/Errors';
import { logger as defaultLogger, type AppLogger } from '../../shared/logging/Logger';
import { TransportClient, type TransportClientOptions } from './TransportClient';

/**
 * One TransportClient per distinct endpoint, created on first use and shared
 * by all callers. Endpoints differing only by a trailing slash or host case
 * share a client. Once closeAll() starts, no new clients are handed out.
 */
export class TransportPool {
  private readonly clients = new Map<string, TransportClient>();
  private readonly log: AppLogger;
  private closed = false;

  public constructor(private readonly clientOptions: TransportClientOptions = {}) {
    this.log = clientOptions.logger ?? defaultLogger;
  }

  public get size(): number {
    return this.clients.size;
  }

  public getClient(endpoint: string): TransportClient {
    const key = normalizeEndpoint(endpoint);
    if (this.closed) {
      throw new CommunicationError('connection_refused', 'Transport pool closed', key);
    }

    const existing = this.clients.get(key);
    if (existing && !existing.isClosed) return existing;

    const client = new TransportClient(key, this.clientOptions);
    this.clients.set(key, client);
    this.log.debug({ endpoint: key, poolSize: this.clients.size }, 'Transport client created');
    return client;
  }

  /**
   * Close every client, giving in-flight calls up to graceMs to finish.
   */
  public async closeAll(graceMs = 0): Promise<void> {
    this.closed = true;
    const clients = Array.from(this.clients.values());
    this.clients.clear();

    const active = clients.reduce((sum, c) => sum + c.activeCalls, 0);
    this.log.info({ clients: clients.length, active, graceMs }, 'Closing transport pool');

    await Promise.all(clients.map((c) => c.close(graceMs)));
  }
}

export function normalizeEndpoint(endpoint: string): string {
  const trimmed = endpoint.trim();
  try {
    const url = new URL(trimmed);
    const path = url.pathname.replace(/\/+$/, '');
    return `${url.protocol}//${url.host}${path}${url.search}`;
  } catch {
    return trimmed.replace(/\/+$/, '');
  }
}
