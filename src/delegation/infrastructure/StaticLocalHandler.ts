// src/delegation/infrastructure/StaticLocalHandler.ts

import type { LocalHandler } from '../domain/Ports';
import type { RoutingTable } from '../domain/Routing';

/**
 * Answers locally-routed messages with the reply configured for the topic.
 * Stands in for the front-end's own handlers.
 */
export class StaticLocalHandler implements LocalHandler {
  private readonly replies = new Map<string, string>();
  private readonly fallbackReply: string;

  public constructor(table: RoutingTable) {
    for (const rule of table.rules) {
      if (rule.reply !== undefined) this.replies.set(rule.label, rule.reply);
    }
    this.fallbackReply = table.fallbackReply;
  }

  public async handle(_taskText: string, topic?: string): Promise<string> {
    if (topic !== undefined) {
      const reply = this.replies.get(topic);
      if (reply !== undefined) return reply;
    }
    return this.fallbackReply;
  }
}
