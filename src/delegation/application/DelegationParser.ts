// src/delegation/application/DelegationParser.ts

/**
 * Detects explicit hand-off requests such as
 * "ask the billing_agent to refund order 42".
 */

export const DELEGATION_PHRASES = [
  'ask the',
  'check with',
  'consult',
  'delegate to',
  'get help from',
  'forward to',
  'send to',
  'talk to',
] as const;

export type DelegationRequest = {
  /**
   * Lead-in phrase that matched, lower-cased.
   */
  phrase: string;

  /**
   * Name as written by the user, case-folded.
   */
  requestedName: string;

  /**
   * Registry names to try, in order.
   */
  candidates: string[];

  taskText: string;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const phraseAlternation = [...DELEGATION_PHRASES]
  .sort((a, b) => b.length - a.length)
  .map((p) => escapeRegExp(p).replace(/ /g, '\\s+'))
  .join('|');

const DELEGATION_PATTERN = new RegExp(
  `\\b(${phraseAlternation})\\s+(?:(?:the|a|an)\\s+)?([a-z0-9](?:[\\w.-]*[a-z0-9_])?)(\\s+agent\\b)?`,
  'i',
);

const LEADING_CONNECTOR = /^(?:(?:to|about|for)\b|[:,])\s*/i;

export function parseDelegation(text: string): DelegationRequest | null {
  const match = DELEGATION_PATTERN.exec(text);
  if (!match) return null;

  const phrase = match[1].toLowerCase().replace(/\s+/g, ' ');
  const name = match[2].toLowerCase();
  const hasAgentSuffix = match[3] !== undefined;

  const candidates = hasAgentSuffix ? [`${name}_agent`, `${name}-agent`, name] : [name];

  const remainder = text
    .slice(match.index + match[0].length)
    .trim()
    .replace(LEADING_CONNECTOR, '')
    .trim();

  return {
    phrase,
    requestedName: hasAgentSuffix ? `${name} agent` : name,
    candidates,
    taskText: remainder.length > 0 ? remainder : text.trim(),
  };
}
