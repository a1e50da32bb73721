/**
 * Conversation Store
 * Keeps recent exchanges per conversation for the lifetime of the process
 */

import type { ConversationTurn } from '../../domain/conversation/turn.js';
import { cloneHistory } from '../../domain/conversation/turn.js';

export interface IConversationStore {
  /** Copy of the stored turns, oldest first; empty for unknown ids */
  snapshot(conversationId: string): ConversationTurn[];
  appendExchange(conversationId: string, turns: readonly ConversationTurn[]): void;
  clear(conversationId: string): boolean;
  has(conversationId: string): boolean;
  listConversations(): string[];
}

/**
 * Bounded twice: each conversation keeps its last `maxStoredExchanges`
 * exchanges, and past `maxConversations` the least recently used
 * conversation is evicted. Map insertion order doubles as recency order.
 */
export class InMemoryConversationStore implements IConversationStore {
  private exchanges = new Map<string, ConversationTurn[][]>();

  constructor(
    private readonly maxStoredExchanges: number = 10,
    private readonly maxConversations: number = 1000
  ) {}

  snapshot(conversationId: string): ConversationTurn[] {
    const stored = this.exchanges.get(conversationId);
    if (!stored) {
      return [];
    }
    this.touch(conversationId, stored);
    return cloneHistory(stored.flat());
  }

  appendExchange(conversationId: string, turns: readonly ConversationTurn[]): void {
    if (turns.length === 0) {
      return;
    }
    const stored = this.exchanges.get(conversationId) ?? [];
    stored.push(cloneHistory(turns));
    if (stored.length > this.maxStoredExchanges) {
      stored.splice(0, stored.length - this.maxStoredExchanges);
    }
    this.touch(conversationId, stored);

    while (this.exchanges.size > this.maxConversations) {
      const oldest = this.exchanges.keys().next();
      if (oldest.done) {
        break;
      }
      this.exchanges.delete(oldest.value);
    }
  }

  clear(conversationId: string): boolean {
    return this.exchanges.delete(conversationId);
  }

  has(conversationId: string): boolean {
    return this.exchanges.has(conversationId);
  }

  /** Least recently used first */
  listConversations(): string[] {
    return [...this.exchanges.keys()];
  }

  private touch(conversationId: string, stored: ConversationTurn[][]): void {
    this.exchanges.delete(conversationId);
    this.exchanges.set(conversationId, stored);
  }
}
