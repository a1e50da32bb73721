import type { ErrorKind } from '../../domain/generation/stream-event.js';
import { ErrorKinds } from '../../domain/generation/stream-event.js';
import {
  CancelledError,
  PromptBudgetError,
  RetrievalError,
  isAssistantError,
} from '../../domain/generation/errors.js';
import { isLLMProviderError } from '../../infra/llm/llm-provider.js';

/**
 * Reduces anything thrown inside a session to one stable ErrorKind.
 */
export function classifyError(error: unknown, signal?: AbortSignal): ErrorKind {
  if (signal?.aborted || error instanceof CancelledError) {
    return ErrorKinds.CANCELLED;
  }
  if (isAssistantError(error)) {
    return error.kind;
  }
  if (error instanceof RetrievalError) {
    return ErrorKinds.RETRIEVAL;
  }
  if (error instanceof PromptBudgetError) {
    return ErrorKinds.PROMPT_BUDGET_EXCEEDED;
  }
  if (isLLMProviderError(error)) {
    return ErrorKinds.PROVIDER_TRANSPORT;
  }
  return ErrorKinds.INTERNAL;
}

/**
 * Rejects with CancelledError as soon as the signal aborts, without waiting
 * for the wrapped operation to notice.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
