/**
 * Conversation Turn Types
 */

import type { ToolCallRequest } from '../tools/types.js';

export type TurnRole = 'user' | 'assistant' | 'tool';

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly content: string;
  /** Tool calls requested by an assistant turn */
  readonly toolCalls?: readonly ToolCallRequest[];
  /** Set on tool turns: the call this turn answers */
  readonly toolCallId?: string;
  readonly toolName?: string;
}

export function userTurn(content: string): ConversationTurn {
  return { role: 'user', content };
}

export function assistantTurn(content: string, toolCalls?: readonly ToolCallRequest[]): ConversationTurn {
  return toolCalls && toolCalls.length > 0
    ? { role: 'assistant', content, toolCalls: toolCalls.map((call) => ({ ...call })) }
    : { role: 'assistant', content };
}

export function toolTurn(callId: string, toolName: string, content: string): ConversationTurn {
  return { role: 'tool', content, toolCallId: callId, toolName };
}

/**
 * Copies a history so the receiver can never mutate the caller's array or turns.
 */
export function cloneHistory(history: readonly ConversationTurn[]): ConversationTurn[] {
  return history.map((turn) =>
    turn.toolCalls ? { ...turn, toolCalls: turn.toolCalls.map((call) => ({ ...call })) } : { ...turn }
  );
}

/**
 * Groups turns into units that must be kept or dropped together:
 * a user or assistant turn followed by the tool turns that answer it.
 * Leading orphan tool turns form their own unit.
 */
export function groupTurnUnits(history: readonly ConversationTurn[]): ConversationTurn[][] {
  const units: ConversationTurn[][] = [];
  for (const turn of history) {
    const current = units[units.length - 1];
    if (turn.role === 'tool' && current) {
      current.push(turn);
    } else {
      units.push([turn]);
    }
  }
  return units;
}
