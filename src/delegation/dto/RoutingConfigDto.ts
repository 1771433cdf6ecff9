// src/delegation/dto/RoutingConfigDto.ts

import type { RoutingRule, RoutingTable, TopicRoute } from '../domain/Routing';

export class RoutingConfigValidationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'RoutingConfigValidationError';
    this.issues = issues;
  }
}

const DEFAULT_MIN_CONFIDENCE = 0.5;
const DEFAULT_FALLBACK_REPLY = "I'm not sure how to help with that. Could you rephrase?";

/**
 * Parse and validate a routing table (config/routing.json).
 *
 * Expected shape:
 * {
 *   "minConfidence": 0.5,
 *   "fallbackReply": "...",
 *   "topics": [
 *     { "label": "payments", "keywords": ["invoice"], "route": { "kind": "remote", "capability": "billing" } },
 *     { "label": "general", "keywords": ["hello"], "route": { "kind": "local" }, "reply": "Hi!" }
 *   ]
 * }
 */
export function parseRoutingConfigDto(payload: unknown): RoutingTable {
  const issues: string[] = [];

  if (!isRecord(payload)) {
    throw new RoutingConfigValidationError('Invalid routing config', ['Config must be a JSON object.']);
  }

  let minConfidence = DEFAULT_MIN_CONFIDENCE;
  if (payload.minConfidence !== undefined) {
    const v = payload.minConfidence;
    if (typeof v !== 'number' || !Number.isFinite(v) || v < 0 || v > 1) {
      issues.push('"minConfidence" must be a number in [0..1] when provided.');
    } else {
      minConfidence = v;
    }
  }

  let fallbackReply = DEFAULT_FALLBACK_REPLY;
  if (payload.fallbackReply !== undefined) {
    if (typeof payload.fallbackReply !== 'string' || payload.fallbackReply.trim().length === 0) {
      issues.push('"fallbackReply" must be a non-empty string when provided.');
    } else {
      fallbackReply = payload.fallbackReply;
    }
  }

  const rules: RoutingRule[] = [];
  if (!Array.isArray(payload.topics)) {
    issues.push('"topics" must be an array.');
  } else {
    const seen = new Set<string>();
    payload.topics.forEach((item: unknown, index: number) => {
      const rule = readRule(item, `topics[${index}]`, issues);
      if (!rule) return;

      if (seen.has(rule.label)) {
        issues.push(`"topics[${index}].label" duplicates "${rule.label}".`);
        return;
      }
      seen.add(rule.label);
      rules.push(rule);
    });
  }

  if (issues.length > 0) {
    throw new RoutingConfigValidationError('Invalid routing config', issues);
  }

  return { minConfidence, rules, fallbackReply };
}

/* ------------------------- small internal helpers ------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRule(item: unknown, path: string, issues: string[]): RoutingRule | null {
  if (!isRecord(item)) {
    issues.push(`"${path}" must be an object.`);
    return null;
  }

  const startCount = issues.length;

  const label = typeof item.label === 'string' ? item.label.trim().toLowerCase() : '';
  if (label.length === 0) issues.push(`"${path}.label" must be a non-empty string.`);

  let keywords: string[] = [];
  if (item.keywords !== undefined) {
    if (!Array.isArray(item.keywords) || item.keywords.some((k) => typeof k !== 'string')) {
      issues.push(`"${path}.keywords" must be an array of strings when provided.`);
    } else {
      keywords = item.keywords
        .filter((k): k is string => typeof k === 'string')
        .map((k) => k.trim().toLowerCase())
        .filter((k) => k.length > 0);
    }
  }

  let reply: string | undefined;
  if (item.reply !== undefined) {
    if (typeof item.reply !== 'string') {
      issues.push(`"${path}.reply" must be a string when provided.`);
    } else {
      reply = item.reply;
    }
  }

  const route = readRoute(item.route, `${path}.route`, issues);

  if (issues.length > startCount || !route) return null;
  return { label, route, keywords, ...(reply !== undefined ? { reply } : {}) };
}

function readRoute(value: unknown, path: string, issues: string[]): TopicRoute | null {
  if (!isRecord(value)) {
    issues.push(`"${path}" must be an object.`);
    return null;
  }

  if (value.kind === 'local') {
    return { kind: 'local' };
  }

  if (value.kind !== 'remote') {
    issues.push(`"${path}.kind" must be "local" or "remote".`);
    return null;
  }

  const capability = typeof value.capability === 'string' ? value.capability.trim() : '';
  const agent = typeof value.agent === 'string' ? value.agent.trim() : '';

  if (capability.length === 0 && agent.length === 0) {
    issues.push(`"${path}" needs a "capability" or an "agent" for remote routes.`);
    return null;
  }

  return {
    kind: 'remote',
    ...(capability.length > 0 ? { capability } : {}),
    ...(agent.length > 0 ? { agent } : {}),
  };
}
