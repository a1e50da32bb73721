/**
 * Generation Orchestrator
 *
 * Runs one user turn as a lazy sequence of StreamEvents:
 * retrieval -> prompt assembly -> streamed generation, with tool rounds
 * in between, ending in exactly one `completed` or `failed` event.
 */

import type { StreamEvent, TerminalEvent, Citation } from '../../domain/generation/stream-event.js';
import { ErrorKinds, failedEvent } from '../../domain/generation/stream-event.js';
import type { ConversationTurn } from '../../domain/conversation/turn.js';
import { assistantTurn, toolTurn, userTurn } from '../../domain/conversation/turn.js';
import type { RetrievalResult } from '../../domain/rag/passage.js';
import { describeSource } from '../../domain/rag/passage.js';
import type { ToolCallRequest } from '../../domain/tools/types.js';
import { parseToolArguments, serializeToolResult } from '../../domain/tools/types.js';
import { AssistantError, CancelledError, throwIfAborted } from '../../domain/generation/errors.js';
import type { GenerationProvider, GenerationRequest, ToolCall } from '../../infra/llm/llm-provider.js';
import { LLMProviderError } from '../../infra/llm/llm-provider.js';
import type { ToolRegistry } from '../../infra/tools/tool-registry.js';
import type { ToolInvoker } from '../../infra/tools/tool-invoker.js';
import { getRetryDelay, sleep } from '../../infra/retry/retry-policy.js';
import type { IRetriever } from '../retrieval/retriever.js';
import type { PromptAssembler, PromptPlan } from '../prompt/prompt-assembler.js';
import { renderMessages } from '../prompt/prompt-assembler.js';
import { FALLBACK_DISCLAIMER, splitSentences } from '../prompt/system-prompt.js';
import type { IConversationStore } from '../conversation/conversation-store.js';
import { GenerationSession } from './generation-session.js';
import type { StateChangeCallback } from './generation-session.js';
import { classifyError, raceAbort } from './classify-error.js';

export interface GenerationSettings {
  topK: number;
  minScore: number;
  budgetChars: number;
  maxToolRounds: number;
  /** Provider retries before the first chunk of a round */
  maxProviderRetries: number;
  retryBaseDelayMs: number;
}

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  topK: 7,
  minScore: 0.5,
  budgetChars: 24000,
  maxToolRounds: 4,
  maxProviderRetries: 2,
  retryBaseDelayMs: 500,
};

export interface GenerationOrchestratorDeps {
  retriever: IRetriever;
  assembler: PromptAssembler;
  provider: GenerationProvider;
  registry: ToolRegistry;
  invoker: ToolInvoker;
  store?: IConversationStore;
  settings?: Partial<GenerationSettings>;
  logger?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
  debug?: boolean;
}

export interface SubmitTurnOptions {
  signal?: AbortSignal;
  /** Prior turns; read from the conversation store when omitted */
  history?: readonly ConversationTurn[];
  /** Observes the session's state transitions */
  onStateChange?: StateChangeCallback;
}

type RoundOutcome =
  | { kind: 'stop' }
  | { kind: 'tool_calls'; calls: ToolCall[]; text: string }
  | { kind: 'filtered'; reason: string };

const CITATION_PATTERN = /\[(\d+)\]/g;

export class GenerationOrchestrator {
  private readonly settings: GenerationSettings;
  private readonly logger: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

  constructor(private readonly deps: GenerationOrchestratorDeps) {
    this.settings = { ...DEFAULT_GENERATION_SETTINGS, ...deps.settings };
    this.logger = deps.logger ?? console;
  }

  /**
   * Streams the events of one turn. Stopping iteration early ends the
   * session silently and aborts its in-flight I/O.
   */
  async *submitTurn(
    conversationId: string,
    queryText: string,
    options: SubmitTurnOptions = {}
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const history = options.history ?? this.deps.store?.snapshot(conversationId) ?? [];
    const session = new GenerationSession(conversationId, queryText, history, {
      logger: this.logger,
      debug: this.deps.debug,
    });
    if (options.onStateChange) {
      session.onStateChange(options.onStateChange);
    }

    const controller = new AbortController();
    const external = options.signal;
    const forwardAbort = (): void => controller.abort();
    if (external?.aborted) {
      controller.abort();
    } else {
      external?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      let terminal: TerminalEvent;
      try {
        terminal = yield* this.runSession(session, controller.signal);
      } catch (error) {
        terminal = this.fail(session, error, controller.signal);
      }

      if (terminal.type === 'completed') {
        this.deps.store?.appendExchange(conversationId, [
          userTurn(queryText),
          assistantTurn(session.visibleText),
        ]);
      }
      yield terminal;
    } finally {
      external?.removeEventListener('abort', forwardAbort);
      controller.abort();
    }
  }

  private async *runSession(
    session: GenerationSession,
    signal: AbortSignal
  ): AsyncGenerator<StreamEvent, TerminalEvent, undefined> {
    throwIfAborted(signal);

    session.transition('retrieving', 'query');
    const retrieval = await this.retrieve(session, signal);

    session.transition('assembling', 'retrieved');
    let plan = this.assemble(session, retrieval);

    session.transition('generating', 'plan');
    while (true) {
      const outcome = yield* this.generateRound(session, plan, signal);

      if (outcome.kind === 'tool_calls') {
        session.transition('tool_pending', 'tool_call_detected');
        session.toolRounds += 1;
        if (session.toolRounds > this.settings.maxToolRounds) {
          throw AssistantError.toolLoop(this.settings.maxToolRounds);
        }

        const requests = outcome.calls.map((call, index) => this.toRequest(call, session.toolRounds, index));
        session.turn.push(assistantTurn(outcome.text, requests));

        for (const request of requests) {
          yield { type: 'tool_call_requested', request: { ...request } };
          const result = await this.deps.invoker.invoke(request, { sessionId: session.id, signal });
          throwIfAborted(signal);
          session.turn.push(toolTurn(request.id, request.name, serializeToolResult(result)));
          if (!session.toolsUsed.includes(request.name)) {
            session.toolsUsed.push(request.name);
          }
        }

        plan = this.assemble(session, retrieval);
        session.transition('generating', 'tool_results');
        continue;
      }

      session.transition('completing', outcome.kind === 'filtered' ? 'content_filter' : 'stream_end');

      if (outcome.kind === 'filtered') {
        this.logger.warn(`[GenerationOrchestrator] ${session.id}: content filter triggered (${outcome.reason})`);
        yield { type: 'content_filtered', reason: outcome.reason, partialText: session.visibleText };
        for (const sentence of splitSentences(FALLBACK_DISCLAIMER)) {
          session.visibleText += sentence;
          yield { type: 'token_delta', text: sentence };
        }
      }

      session.transition('completed', 'done');
      return {
        type: 'completed',
        toolsUsed: [...session.toolsUsed],
        citations: this.collectCitations(session.visibleText, plan),
        degraded: outcome.kind === 'filtered',
      };
    }
  }

  private async retrieve(session: GenerationSession, signal: AbortSignal): Promise<RetrievalResult> {
    try {
      return await raceAbort(
        this.deps.retriever.retrieve(session.query, session.history, {
          k: this.settings.topK,
          minScore: this.settings.minScore,
          signal,
        }),
        signal
      );
    } catch (error) {
      if (error instanceof CancelledError || signal.aborted) {
        throw new CancelledError();
      }
      const message = error instanceof Error ? error.message : String(error);
      throw AssistantError.retrieval(message, error);
    }
  }

  private assemble(session: GenerationSession, retrieval: RetrievalResult): PromptPlan {
    const plan = this.deps.assembler.assemble({
      query: session.query,
      history: session.history,
      turn: session.turn,
      retrieval,
      tools: this.deps.registry.getSchemas(),
      budget: this.settings.budgetChars,
    });

    if (this.deps.debug) {
      this.logger.debug(
        `[GenerationOrchestrator] ${session.id}: plan ${plan.size}/${plan.budget} chars, ` +
          `${plan.grounding.length} passages, ${plan.history.length} history turns, ${plan.tools.length} tools`
      );
    }
    return plan;
  }

  /**
   * One provider request. Token deltas are yielded as they arrive; failures
   * before the first chunk are retried with backoff.
   */
  private async *generateRound(
    session: GenerationSession,
    plan: PromptPlan,
    signal: AbortSignal
  ): AsyncGenerator<StreamEvent, RoundOutcome, undefined> {
    const request: GenerationRequest = {
      messages: renderMessages(plan),
      tools: plan.tools.length > 0 ? plan.tools : undefined,
    };

    for (let attempt = 0; ; attempt++) {
      let received = false;
      const iterator = this.deps.provider.stream(request, signal)[Symbol.asyncIterator]();

      try {
        let text = '';
        while (true) {
          const result = await raceAbort(iterator.next(), signal);
          if (result.done) {
            throw new LLMProviderError('Stream ended without a terminal chunk', this.deps.provider.getName(), false);
          }

          const chunk = result.value;
          received = true;

          // A filter finish is terminal; tool calls cut off by it are never run
          const filtered = chunk.finishReason === 'content_filter';

          // Text arriving with a tool call is kept for the assistant turn but not streamed
          if (!filtered && chunk.toolCalls && chunk.toolCalls.length > 0) {
            return { kind: 'tool_calls', calls: chunk.toolCalls, text: text + (chunk.content ?? '') };
          }

          if (chunk.content) {
            text += chunk.content;
            session.visibleText += chunk.content;
            yield { type: 'token_delta', text: chunk.content };
          }

          if (filtered) {
            return { kind: 'filtered', reason: chunk.filterReason ?? 'content_filter' };
          }

          if (chunk.finishReason === 'error') {
            throw new LLMProviderError(
              'Stream finished with an unrecognized finish reason',
              this.deps.provider.getName(),
              false
            );
          }

          if (chunk.done) {
            return { kind: 'stop' };
          }
        }
      } catch (error) {
        if (error instanceof CancelledError || signal.aborted) {
          throw new CancelledError();
        }

        const providerError = this.toProviderError(error);
        if (received || attempt >= this.settings.maxProviderRetries || !providerError.recoverable) {
          throw providerError;
        }

        const delayMs = getRetryDelay(attempt, { baseDelayMs: this.settings.retryBaseDelayMs });
        this.logger.warn(
          `[GenerationOrchestrator] ${session.id}: provider attempt ${attempt + 1} failed (${providerError.message}), retrying in ${delayMs}ms`
        );
        await sleep(delayMs, signal);
      } finally {
        this.closeIterator(iterator);
      }
    }
  }

  private closeIterator(iterator: AsyncIterator<unknown>): void {
    const closing = iterator.return?.();
    if (closing) {
      closing.catch((error: unknown) => {
        this.logger.debug('[GenerationOrchestrator] Provider stream closed with error:', error);
      });
    }
  }

  private toProviderError(error: unknown): LLMProviderError {
    if (error instanceof LLMProviderError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new LLMProviderError(message, this.deps.provider.getName(), true);
  }

  private toRequest(call: ToolCall, round: number, index: number): ToolCallRequest {
    return {
      id: call.id || `call_${round}_${index}`,
      name: call.function.name,
      arguments: parseToolArguments(call.function.arguments),
      rawArguments: call.function.arguments,
    };
  }

  private collectCitations(text: string, plan: PromptPlan): Citation[] {
    const cited = new Set<number>();
    for (const match of text.matchAll(CITATION_PATTERN)) {
      cited.add(Number.parseInt(match[1], 10));
    }

    const citations: Citation[] = [];
    plan.grounding.forEach((block, index) => {
      const marker = index + 1;
      if (cited.has(marker)) {
        citations.push({ marker, passageId: block.passage.id, source: describeSource(block.passage.source) });
      }
    });
    return citations;
  }

  private fail(session: GenerationSession, error: unknown, signal: AbortSignal): TerminalEvent {
    const kind = classifyError(error, signal);
    if (!session.isTerminal()) {
      session.transition('failed', kind);
    }

    const message = error instanceof Error ? error.message : String(error);
    if (kind === ErrorKinds.CANCELLED) {
      this.logger.info(`[GenerationOrchestrator] ${session.id}: cancelled`);
    } else {
      this.logger.error(`[GenerationOrchestrator] ${session.id} failed (${kind}): ${message}`);
    }
    return failedEvent(kind);
  }
}
