import { classifyError, raceAbort } from '../../../src/app/generation/classify-error.js';
import {
  AssistantError,
  CancelledError,
  PromptBudgetError,
  RetrievalError,
} from '../../../src/domain/generation/errors.js';
import { LLMProviderError } from '../../../src/infra/llm/llm-provider.js';

describe('classifyError', () => {
  it('should map each failure to its kind', () => {
    expect(classifyError(new RetrievalError('index down'))).toBe('RetrievalError');
    expect(classifyError(new PromptBudgetError(100, 50))).toBe('PromptBudgetExceeded');
    expect(classifyError(new LLMProviderError('503', 'openai:m'))).toBe('ProviderTransportError');
    expect(classifyError(AssistantError.toolLoop(4))).toBe('ToolLoopExceeded');
    expect(classifyError(new CancelledError())).toBe('Cancelled');
    expect(classifyError(new TypeError('x is undefined'))).toBe('InternalError');
    expect(classifyError('string failure')).toBe('InternalError');
  });

  it('should treat anything after an abort as cancellation', () => {
    const controller = new AbortController();
    controller.abort();

    expect(classifyError(new LLMProviderError('socket closed', 'openai:m'), controller.signal)).toBe('Cancelled');
  });
});

describe('raceAbort', () => {
  it('should pass through the settled value', async () => {
    await expect(raceAbort(Promise.resolve(42), new AbortController().signal)).resolves.toBe(42);
    await expect(raceAbort(Promise.reject(new Error('nope')), new AbortController().signal)).rejects.toThrow('nope');
  });

  it('should reject as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<number>(() => undefined), controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('should reject immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(raceAbort(Promise.resolve(1), controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
