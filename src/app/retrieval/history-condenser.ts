import type { ConversationTurn } from '../../domain/conversation/turn.js';

const ANAPHORA_PATTERN = /\b(it|its|that|this|they|them|their|those|these)\b/i;
const MAX_CONDENSED_TURN_CHARS = 200;

export function hasAnaphoricReference(text: string): boolean {
  return ANAPHORA_PATTERN.test(text);
}

/**
 * Builds the text that gets embedded for a query. Follow-up questions such as
 * "how long does it last?" are prefixed with the most recent user turns so the
 * pronoun resolves against what the user was talking about.
 */
export function buildEmbeddingText(
  query: string,
  history: readonly ConversationTurn[],
  maxTurns: number
): string {
  const trimmed = query.trim();
  if (maxTurns < 1 || !hasAnaphoricReference(trimmed)) {
    return trimmed;
  }

  const recent = history
    .filter(turn => turn.role === 'user' && turn.content.trim().length > 0)
    .slice(-maxTurns)
    .map(turn => turn.content.trim().replace(/\s+/g, ' ').slice(0, MAX_CONDENSED_TURN_CHARS));

  if (recent.length === 0) {
    return trimmed;
  }

  return `${recent.join(' ')}\n${trimmed}`;
}
