// src/delegation/application/AgentRegistry.ts

/**
 * AgentRegistry
 * -------------
 * In-memory directory of remote agent descriptors.
 *
 * - name -> descriptor map (insertion ordered, case-insensitive keys)
 * - capability -> names index, rebuilt on every mutation
 *
 * Instances are injected into the router and the orchestrator; there is no
 * module-level registry.
 */

import type { AgentDescriptor, IAgentDirectory } from '../domain/Agent';
import { normalizeAgentName } from '../domain/Agent';
import { AgentNotFoundError } from '../domain/Errors';
import {
  AgentDescriptorValidationError,
  assertValidDescriptor,
  parseAgentDescriptorDto,
} from '../dto/AgentDescriptorDto';
import { logger as defaultLogger, type AppLogger } from '../../shared/logging/Logger';

/**
 * Raw entries produced by a declarative source (file, environment).
 * Entries are validated by the registry, not by the source.
 */
export interface AgentSourceReadout {
  entries: unknown[];

  /**
   * Source-level problems (unreadable file, orphan env variables).
   */
  issues: string[];
}

export interface AgentSource {
  readonly description: string;
  read(): AgentSourceReadout;
}

export interface SkippedEntry {
  index: number | null;
  issues: string[];
}

export interface LoadReport {
  source: string;
  loaded: string[];
  skipped: SkippedEntry[];
}

export class AgentRegistry implements IAgentDirectory {
  private readonly agents = new Map<string, AgentDescriptor>();
  private capabilityIndex = new Map<string, string[]>();

  public constructor(private readonly log: AppLogger = defaultLogger) {}

  public get size(): number {
    return this.agents.size;
  }

  /**
   * Insert or overwrite by name. An overwrite keeps the original
   * registration position.
   */
  public register(descriptor: AgentDescriptor): void {
    assertValidDescriptor(descriptor);

    const key = normalizeAgentName(descriptor.name);
    const previous = this.agents.get(key);

    this.agents.set(key, descriptor);
    this.rebuildIndex();

    if (previous) {
      this.log.info(
        { agent: descriptor.name, previousEndpoint: previous.endpoint, endpoint: descriptor.endpoint },
        'Agent descriptor overwritten',
      );
    } else {
      this.log.debug({ agent: descriptor.name, endpoint: descriptor.endpoint }, 'Agent registered');
    }
  }

  /**
   * Idempotent. Returns whether an entry was removed.
   */
  public unregister(name: string): boolean {
    const removed = this.agents.delete(normalizeAgentName(name));
    if (removed) {
      this.rebuildIndex();
      this.log.debug({ agent: name }, 'Agent unregistered');
    }
    return removed;
  }

  public has(name: string): boolean {
    return this.agents.has(normalizeAgentName(name));
  }

  public findByName(name: string): AgentDescriptor | null {
    return this.agents.get(normalizeAgentName(name)) ?? null;
  }

  public requireByName(name: string): AgentDescriptor {
    const descriptor = this.findByName(name);
    if (!descriptor) {
      throw new AgentNotFoundError(name);
    }
    return descriptor;
  }

  /**
   * Agents declaring the capability, in registration order.
   */
  public findByCapability(capability: string): AgentDescriptor[] {
    const names = this.capabilityIndex.get(capability.trim().toLowerCase()) ?? [];
    return names
      .map((name) => this.agents.get(name))
      .filter((d): d is AgentDescriptor => d !== undefined);
  }

  public resolve(identifier: string): AgentDescriptor | null {
    return this.findByName(identifier) ?? this.findByCapability(identifier)[0] ?? null;
  }

  public list(): AgentDescriptor[] {
    return Array.from(this.agents.values());
  }

  public listCapabilities(): string[] {
    return Array.from(this.capabilityIndex.keys()).sort();
  }

  /**
   * Bulk load. Malformed entries are skipped with a warning; never throws.
   */
  public loadFromSource(source: AgentSource): LoadReport {
    const report: LoadReport = { source: source.description, loaded: [], skipped: [] };

    let readout: AgentSourceReadout;
    try {
      readout = source.read();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.warn({ source: source.description, err }, 'Agent source could not be read');
      report.skipped.push({ index: null, issues: [message] });
      return report;
    }

    if (readout.issues.length > 0) {
      this.log.warn({ source: source.description, issues: readout.issues }, 'Agent source reported issues');
      report.skipped.push({ index: null, issues: readout.issues });
    }

    readout.entries.forEach((entry, index) => {
      try {
        const descriptor = parseAgentDescriptorDto(entry);
        this.register(descriptor);
        report.loaded.push(descriptor.name);
      } catch (err) {
        if (!(err instanceof AgentDescriptorValidationError)) throw err;

        this.log.warn(
          { source: source.description, index, issues: err.issues },
          'Skipping malformed agent entry',
        );
        report.skipped.push({ index, issues: err.issues });
      }
    });

    this.log.info(
      { source: source.description, loaded: report.loaded.length, skipped: report.skipped.length },
      'Agent source loaded',
    );

    return report;
  }

  private rebuildIndex(): void {
    const index = new Map<string, string[]>();

    for (const [key, descriptor] of this.agents) {
      for (const capability of descriptor.capabilities) {
        const tag = capability.trim().toLowerCase();
        if (tag.length === 0) continue;

        const names = index.get(tag) ?? [];
        if (!names.includes(key)) names.push(key);
        index.set(tag, names);
      }
    }

    this.capabilityIndex = index;
  }
}
