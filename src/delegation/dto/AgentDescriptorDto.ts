// src/delegation/dto/AgentDescriptorDto.ts

/**
 * AgentDescriptor DTO parser/validator
 *
 * Used at every boundary where descriptors enter the registry:
 * the JSON registry file, environment variables and PUT /v1/agents.
 */

import type { AgentDescriptor } from '../domain/Agent';

export class AgentDescriptorValidationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'AgentDescriptorValidationError';
    this.issues = issues;
  }
}

const DEFAULT_VERSION = '1.0.0';

export function parseAgentDescriptorDto(payload: unknown): AgentDescriptor {
  const issues: string[] = [];

  if (!isRecord(payload)) {
    throw new AgentDescriptorValidationError('Invalid agent descriptor', [
      'Descriptor must be a JSON object.',
    ]);
  }

  const name = readName(payload, issues);

  // "url" is accepted as an alias for older registry files.
  const endpointKey = payload.endpoint === undefined && payload.url !== undefined ? 'url' : 'endpoint';
  const endpoint = readEndpoint(payload, endpointKey, issues);

  const capabilities = readCapabilities(payload, issues);
  const description = readOptionalString(payload, 'description', issues) ?? '';
  const version = readOptionalNonEmptyString(payload, 'version', issues) ?? DEFAULT_VERSION;
  const metadata = readOptionalRecord(payload, 'metadata', issues) ?? {};

  if (issues.length > 0) {
    throw new AgentDescriptorValidationError('Invalid agent descriptor', issues);
  }

  return { name, endpoint, capabilities, description, version, metadata };
}

/**
 * Validate an already-typed descriptor (programmatic registration).
 */
export function assertValidDescriptor(descriptor: AgentDescriptor): void {
  const issues: string[] = [];
  if (descriptor.name.trim().length === 0) {
    issues.push('"name" must be a non-empty string.');
  }
  const endpointIssue = checkEndpoint(descriptor.endpoint);
  if (endpointIssue) issues.push(`"endpoint" ${endpointIssue}`);

  if (issues.length > 0) {
    throw new AgentDescriptorValidationError(`Invalid agent descriptor "${descriptor.name}"`, issues);
  }
}

/**
 * Split a comma-separated capability list, dropping blanks.
 */
export function splitCapabilities(raw: string): string[] {
  return raw
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

/* ------------------------- small internal helpers ------------------------- */

function checkEndpoint(value: string): string | null {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return 'must be an absolute URL.';
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return 'must use http or https.';
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readName(obj: Record<string, unknown>, issues: string[]) {
  const value = obj.name;
  if (typeof value !== 'string' || value.trim().length === 0) {
    issues.push('"name" must be a non-empty string.');
    return '';
  }
  if (/\s/.test(value.trim())) {
    issues.push('"name" must not contain whitespace.');
  }
  return value.trim();
}

function readEndpoint(obj: Record<string, unknown>, key: string, issues: string[]) {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    issues.push(`"${key}" must be a non-empty string.`);
    return '';
  }
  const problem = checkEndpoint(value.trim());
  if (problem) {
    issues.push(`"${key}" ${problem}`);
  }
  return value.trim();
}

function readCapabilities(obj: Record<string, unknown>, issues: string[]) {
  const value = obj.capabilities;
  if (value === undefined || value === null) return [];
  if (typeof value === 'string') return splitCapabilities(value);
  if (!Array.isArray(value) || value.some((v) => typeof v !== 'string')) {
    issues.push('"capabilities" must be an array of strings when provided.');
    return [];
  }
  return Array.from(new Set(value.map((v: string) => v.trim()).filter((v) => v.length > 0)));
}

function readOptionalString(obj: Record<string, unknown>, key: string, issues: string[]) {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    issues.push(`"${key}" must be a string when provided.`);
    return undefined;
  }
  return value;
}

function readOptionalNonEmptyString(obj: Record<string, unknown>, key: string, issues: string[]) {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim().length === 0) {
    issues.push(`"${key}" must be a non-empty string when provided.`);
    return undefined;
  }
  return value;
}

function readOptionalRecord(obj: Record<string, unknown>, key: string, issues: string[]) {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    issues.push(`"${key}" must be an object when provided.`);
    return undefined;
  }
  return value;
}
