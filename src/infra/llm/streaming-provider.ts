import type { GenerationProvider, GenerationRequest, StreamChunk } from './llm-provider.js';
import { LLMProviderError } from './llm-provider.js';
import type { IProtocolAdapter } from './protocols/index.js';
import { OpenAIProtocolAdapter } from './protocols/index.js';
import { CancelledError } from '../../domain/generation/errors.js';

export interface StreamingProviderOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  adapter?: IProtocolAdapter;
  fetchImpl?: typeof fetch;
  logger?: Pick<Console, 'debug' | 'warn'>;
  debug?: boolean;
}

/**
 * Streams chat completions from an OpenAI-compatible endpoint over SSE.
 * One call to `stream` is one HTTP request; retries belong to the caller.
 */
export class OpenAIStreamingProvider implements GenerationProvider {
  private readonly adapter: IProtocolAdapter;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Pick<Console, 'debug' | 'warn'>;

  constructor(private readonly options: StreamingProviderOptions) {
    this.adapter = options.adapter ?? new OpenAIProtocolAdapter();
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? console;
  }

  getName(): string {
    return `openai:${this.options.model}`;
  }

  async *stream(request: GenerationRequest, signal: AbortSignal): AsyncGenerator<StreamChunk> {
    const model = request.model ?? this.options.model;
    const timeoutMs = this.options.timeoutMs ?? 60000;
    const requestSignal = AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)]);

    const url = this.adapter.buildUrl(this.options.baseUrl, model);
    const body = this.adapter.formatRequest(request.messages, {
      model,
      maxTokens: request.maxTokens ?? this.options.maxTokens,
      temperature: request.temperature ?? this.options.temperature,
      tools: request.tools,
      tool_choice: request.tools && request.tools.length > 0 ? 'auto' : undefined,
      stream: true,
    });

    if (this.options.debug) {
      this.logger.debug(`[StreamingProvider] POST ${url} (${request.messages.length} messages, ${request.tools?.length ?? 0} tools)`);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: this.adapter.buildHeaders(this.options.apiKey),
        body: JSON.stringify(body),
        signal: requestSignal,
      });
    } catch (error) {
      throw this.toProviderError(error, signal, timeoutMs);
    }

    if (!response.ok) {
      const data: unknown = await response.json().catch(() => ({ error: { message: response.statusText } }));

      const filterReason = this.adapter.extractContentFilterReason(response.status, data);
      if (filterReason !== null) {
        yield { done: true, finishReason: 'content_filter', filterReason };
        return;
      }

      throw new LLMProviderError(
        `Streaming API error (${response.status}): ${this.adapter.extractErrorMessage(data)}`,
        this.getName(),
        this.adapter.isRecoverableError(response.status, data),
        response.status
      );
    }

    if (!response.body) {
      throw new LLMProviderError('No response body for streaming', this.getName(), false);
    }

    const parser = this.adapter.createStreamParser();
    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (true) {
        const result = await reader.read().catch((error: unknown) => {
          throw this.toProviderError(error, signal, timeoutMs);
        });
        if (result.done) break;

        buffer += decoder.decode(result.value, { stream: true });
        // Keep the trailing partial line for the next network chunk
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          const chunk = parser.parseLine(line.replace(/\r$/, ''));
          if (!chunk) continue;

          yield chunk;

          if (chunk.done) {
            return;
          }
        }
      }

      buffer += decoder.decode();
      if (buffer.trim()) {
        const chunk = parser.parseLine(buffer.trim());
        if (chunk) {
          yield chunk;
          if (chunk.done) return;
        }
      }
    } finally {
      await reader.cancel().catch((error: unknown) => {
        this.logger.warn('[StreamingProvider] Failed to cancel response body:', error);
      });
    }

    throw new LLMProviderError('Stream ended without a terminal marker', this.getName(), false);
  }

  private toProviderError(error: unknown, signal: AbortSignal, timeoutMs: number): Error {
    if (error instanceof LLMProviderError) {
      return error;
    }
    if (signal.aborted) {
      return new CancelledError();
    }
    if (error instanceof Error && error.name === 'TimeoutError') {
      return new LLMProviderError(`Request timed out after ${timeoutMs}ms`, this.getName(), true);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new LLMProviderError(`Request failed: ${message}`, this.getName(), true);
  }
}
