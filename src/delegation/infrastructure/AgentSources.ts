// src/delegation/infrastructure/AgentSources.ts

/**
 * Declarative agent sources for AgentRegistry.loadFromSource().
 *
 * - JsonFileAgentSource: `{ "agents": [...] }` or a bare array
 * - EnvAgentSource: AGENT_<NAME>_URL / _CAPABILITIES / _DESCRIPTION / _VERSION
 *
 * Sources only collect raw entries; descriptor validation happens in the registry.
 */

import fs from 'fs';
import path from 'path';

import type { AgentSource, AgentSourceReadout } from '../application/AgentRegistry';
import { splitCapabilities } from '../dto/AgentDescriptorDto';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class JsonFileAgentSource implements AgentSource {
  public readonly description: string;

  public constructor(private readonly filePath: string) {
    this.description = `file:${filePath}`;
  }

  public read(): AgentSourceReadout {
    const resolved = path.resolve(this.filePath);

    if (!fs.existsSync(resolved)) {
      return { entries: [], issues: [`File not found: ${resolved}`] };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(resolved, 'utf8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { entries: [], issues: [`Invalid JSON in ${resolved}: ${message}`] };
    }

    if (Array.isArray(parsed)) {
      return { entries: parsed, issues: [] };
    }

    if (isRecord(parsed) && Array.isArray(parsed.agents)) {
      return { entries: parsed.agents, issues: [] };
    }

    return { entries: [], issues: ['Expected an "agents" array at the top level.'] };
  }
}

type EnvAgentFields = {
  url?: string;
  capabilities?: string[];
  description?: string;
  version?: string;
};

const ENV_KEY = /^AGENT_([A-Z0-9_]+?)_(URL|CAPABILITIES|DESCRIPTION|VERSION)$/;

export class EnvAgentSource implements AgentSource {
  public readonly description = 'env:AGENT_*';

  public constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  public read(): AgentSourceReadout {
    const byName = new Map<string, EnvAgentFields>();

    // Sorted so the registration order does not depend on the environment's ordering.
    for (const key of Object.keys(this.env).sort()) {
      const match = ENV_KEY.exec(key);
      const value = this.env[key];
      if (!match || value === undefined) continue;

      const name = match[1].toLowerCase();
      const fields = byName.get(name) ?? {};

      switch (match[2]) {
        case 'URL':
          fields.url = value.trim();
          break;
        case 'CAPABILITIES':
          fields.capabilities = splitCapabilities(value);
          break;
        case 'DESCRIPTION':
          fields.description = value;
          break;
        case 'VERSION':
          fields.version = value.trim();
          break;
      }

      byName.set(name, fields);
    }

    const entries: unknown[] = [];
    const issues: string[] = [];

    for (const [name, fields] of byName) {
      if (!fields.url) {
        issues.push(`AGENT_${name.toUpperCase()}_URL is missing; agent "${name}" skipped.`);
        continue;
      }

      entries.push({
        name,
        endpoint: fields.url,
        capabilities: fields.capabilities ?? [],
        description: fields.description ?? `Agent loaded from environment: ${name}`,
        ...(fields.version ? { version: fields.version } : {}),
      });
    }

    return { entries, issues };
  }
}
