// src/delegation/infrastructure/KeywordTopicClassifier.ts

import type { Classification, TopicClassifier } from '../domain/Ports';
import type { RoutingTable } from '../domain/Routing';

export const UNKNOWN_TOPIC = 'unknown';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Deterministic classifier over the routing table's keyword lists.
 *
 * Rules are checked in table order and the first rule with a whole-word
 * keyword hit wins. Confidence grows with the number of distinct hits:
 * 1 hit -> 0.75, 2 or more -> 1.
 */
export class KeywordTopicClassifier implements TopicClassifier {
  private readonly matchers: Array<{ label: string; patterns: RegExp[] }>;

  public constructor(table: RoutingTable) {
    this.matchers = table.rules
      .filter((rule) => rule.keywords.length > 0)
      .map((rule) => ({
        label: rule.label,
        patterns: rule.keywords.map((k) => new RegExp(`\\b${escapeRegExp(k)}\\b`, 'i')),
      }));
  }

  public classify(text: string): Classification {
    for (const matcher of this.matchers) {
      const hits = matcher.patterns.filter((p) => p.test(text)).length;
      if (hits > 0) {
        return { label: matcher.label, confidence: Math.min(1, 0.5 + 0.25 * hits) };
      }
    }
    return { label: UNKNOWN_TOPIC, confidence: 0 };
  }
}
