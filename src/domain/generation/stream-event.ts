/**
 * Stream Event Types
 *
 * The ordered output of one generation session. A session emits any number of
 * non-terminal events followed by exactly one terminal event
 * (`completed` or `failed`).
 */

import type { ToolCallRequest } from '../tools/types.js';

export const ErrorKinds = {
  RETRIEVAL: 'RetrievalError',
  TOOL_LOOP_EXCEEDED: 'ToolLoopExceeded',
  PROVIDER_TRANSPORT: 'ProviderTransportError',
  PROMPT_BUDGET_EXCEEDED: 'PromptBudgetExceeded',
  CANCELLED: 'Cancelled',
  INTERNAL: 'InternalError',
} as const;

export type ErrorKind = (typeof ErrorKinds)[keyof typeof ErrorKinds];

export const ErrorMessages: Record<ErrorKind, string> = {
  [ErrorKinds.RETRIEVAL]: 'The medical knowledge base is unavailable, so no grounded answer can be given right now.',
  [ErrorKinds.TOOL_LOOP_EXCEEDED]: 'Too many tool calls were requested while answering. Please retry the question.',
  [ErrorKinds.PROVIDER_TRANSPORT]: 'The answer service could not be reached. Please try again in a moment.',
  [ErrorKinds.PROMPT_BUDGET_EXCEEDED]: 'The question is too long to answer. Please shorten it.',
  [ErrorKinds.CANCELLED]: 'The request was cancelled.',
  [ErrorKinds.INTERNAL]: 'An internal error occurred while answering.',
};

export interface Citation {
  marker: number;
  passageId: string;
  source: string;
}

export type StreamEvent =
  | { type: 'token_delta'; text: string }
  | { type: 'tool_call_requested'; request: ToolCallRequest }
  | { type: 'content_filtered'; reason: string; partialText: string }
  | { type: 'completed'; toolsUsed: string[]; citations: Citation[]; degraded: boolean }
  | { type: 'failed'; kind: ErrorKind; message: string };

export type TerminalEvent = Extract<StreamEvent, { type: 'completed' | 'failed' }>;

export function isTerminalEvent(event: StreamEvent): event is TerminalEvent {
  return event.type === 'completed' || event.type === 'failed';
}

export function failedEvent(kind: ErrorKind): TerminalEvent {
  return { type: 'failed', kind, message: ErrorMessages[kind] };
}

/**
 * Concatenates the visible answer text of a finished stream.
 */
export function collectVisibleText(events: readonly StreamEvent[]): string {
  return events
    .filter((event): event is Extract<StreamEvent, { type: 'token_delta' }> => event.type === 'token_delta')
    .map((event) => event.text)
    .join('');
}
