/**
 * Assistant Error Classes
 *
 * Every fatal problem inside a session is reduced to one ErrorKind before it
 * reaches the consumer. Tool-level problems never appear here: they travel back
 * to the model as error ToolResults.
 */

import { ErrorKinds, ErrorMessages } from './stream-event.js';
import type { ErrorKind } from './stream-event.js';

export class AssistantError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message?: string, options?: { cause?: unknown }) {
    super(message || ErrorMessages[kind], options);
    this.name = 'AssistantError';
    this.kind = kind;
  }

  static retrieval(details?: string, cause?: unknown): AssistantError {
    return new AssistantError(ErrorKinds.RETRIEVAL, details, { cause });
  }

  static toolLoop(maxRounds: number): AssistantError {
    return new AssistantError(
      ErrorKinds.TOOL_LOOP_EXCEEDED,
      `Tool call rounds exceeded the limit of ${maxRounds}`
    );
  }

  static internal(details?: string, cause?: unknown): AssistantError {
    return new AssistantError(ErrorKinds.INTERNAL, details, { cause });
  }
}

/**
 * Raised when knowledge-base retrieval cannot run (embedding or index failure).
 */
export class RetrievalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RetrievalError';
  }
}

export class PromptBudgetError extends Error {
  constructor(
    public readonly requiredSize: number,
    public readonly budget: number
  ) {
    super(`Required prompt sections need ${requiredSize} characters but the budget is ${budget}`);
    this.name = 'PromptBudgetError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function isAssistantError(error: unknown): error is AssistantError {
  return error instanceof AssistantError;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
