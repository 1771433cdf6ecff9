// src/delegation/dto/WorkflowRequestDto.ts

/**
 * Workflow and message request parsers for the HTTP boundary.
 *
 * Shape checks only: dependency indices and cycles are validated by the
 * orchestrator, which owns those rules.
 */

import { MAX_TIMEOUT_MS, type WorkflowRunOptions, type WorkflowStepSpec } from '../domain/Workflow';
import { RequestDtoValidationError } from './RequestDtoValidationError';

export type SequentialWorkflowDto = {
  steps: WorkflowStepSpec[];
  options: WorkflowRunOptions;
};

export type ParallelWorkflowDto = {
  tasks: WorkflowStepSpec[];
  options: WorkflowRunOptions;
};

export type FallbackDto = {
  task: string;
  agents: string[];
  timeoutMs?: number;
};

export type MessageDto = {
  text: string;
  timeoutMs?: number;
};

export function parseSequentialWorkflowDto(payload: unknown): SequentialWorkflowDto {
  const issues: string[] = [];
  const body = requireRecord(payload, 'Invalid workflow payload');

  const steps = readStepList(body, 'steps', true, issues);
  const options = readRunOptions(body, issues);

  throwIfIssues('Invalid workflow payload', issues);
  return { steps, options };
}

export function parseParallelWorkflowDto(payload: unknown): ParallelWorkflowDto {
  const issues: string[] = [];
  const body = requireRecord(payload, 'Invalid workflow payload');

  const tasks = readStepList(body, 'tasks', false, issues);
  const options = readRunOptions(body, issues);

  throwIfIssues('Invalid workflow payload', issues);
  return { tasks, options };
}

export function parseFallbackDto(payload: unknown): FallbackDto {
  const issues: string[] = [];
  const body = requireRecord(payload, 'Invalid fallback payload');

  const task = readNonEmptyString(body, 'task', issues);
  const agents = readNonEmptyStringArray(body, 'agents', issues);
  const timeoutMs = readOptionalTimeout(body, issues);

  throwIfIssues('Invalid fallback payload', issues);
  return { task, agents, ...(timeoutMs !== undefined ? { timeoutMs } : {}) };
}

export function parseMessageDto(payload: unknown): MessageDto {
  const issues: string[] = [];
  const body = requireRecord(payload, 'Invalid message payload');

  const text = readNonEmptyString(body, 'text', issues);
  const timeoutMs = readOptionalTimeout(body, issues);

  throwIfIssues('Invalid message payload', issues);
  return { text, ...(timeoutMs !== undefined ? { timeoutMs } : {}) };
}

/* ------------------------- small internal helpers ------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireRecord(payload: unknown, message: string): Record<string, unknown> {
  if (!isRecord(payload)) {
    throw new RequestDtoValidationError(message, ['Payload must be a JSON object.']);
  }
  return payload;
}

function throwIfIssues(message: string, issues: string[]): void {
  if (issues.length > 0) {
    throw new RequestDtoValidationError(message, issues);
  }
}

function readStepList(
  obj: Record<string, unknown>,
  key: string,
  allowDependencies: boolean,
  issues: string[],
): WorkflowStepSpec[] {
  const value = obj[key];
  if (!Array.isArray(value) || value.length === 0) {
    issues.push(`"${key}" must be a non-empty array.`);
    return [];
  }

  return value.map((item: unknown, index: number): WorkflowStepSpec => {
    if (!isRecord(item)) {
      issues.push(`"${key}[${index}]" must be an object.`);
      return { agent: '', task: '' };
    }

    const agent = readNonEmptyString(item, 'agent', issues, `${key}[${index}].agent`);
    const task = readNonEmptyString(item, 'task', issues, `${key}[${index}].task`);

    if (!allowDependencies) {
      return { agent, task };
    }

    const dependsOn = item.dependsOn;
    if (dependsOn === undefined || dependsOn === null) {
      return { agent, task, dependsOn: [] };
    }
    if (!Array.isArray(dependsOn) || dependsOn.some((d) => !Number.isInteger(d))) {
      issues.push(`"${key}[${index}].dependsOn" must be an array of integers when provided.`);
      return { agent, task, dependsOn: [] };
    }
    return { agent, task, dependsOn: dependsOn.filter((d): d is number => typeof d === 'number') };
  });
}

function readRunOptions(obj: Record<string, unknown>, issues: string[]): WorkflowRunOptions {
  const timeoutMs = readOptionalTimeout(obj, issues);
  const maxParallel = readOptionalPositiveInt(obj, 'maxParallel', issues);

  return {
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    ...(maxParallel !== undefined ? { maxParallel } : {}),
  };
}

function readNonEmptyString(
  obj: Record<string, unknown>,
  key: string,
  issues: string[],
  label = key,
) {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    issues.push(`"${label}" must be a non-empty string.`);
    return '';
  }
  return value;
}

function readNonEmptyStringArray(obj: Record<string, unknown>, key: string, issues: string[]) {
  const value = obj[key];
  if (
    !Array.isArray(value) ||
    value.length === 0 ||
    value.some((v) => typeof v !== 'string' || v.trim().length === 0)
  ) {
    issues.push(`"${key}" must be a non-empty array of non-empty strings.`);
    return [];
  }
  return value.filter((v): v is string => typeof v === 'string');
}

function readOptionalPositiveInt(obj: Record<string, unknown>, key: string, issues: string[]) {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    issues.push(`"${key}" must be a positive integer when provided.`);
    return undefined;
  }
  return value;
}

function readOptionalTimeout(obj: Record<string, unknown>, issues: string[]) {
  const value = readOptionalPositiveInt(obj, 'timeoutMs', issues);
  if (value !== undefined && value > MAX_TIMEOUT_MS) {
    issues.push(`"timeoutMs" must not exceed ${MAX_TIMEOUT_MS}.`);
    return undefined;
  }
  return value;
}
