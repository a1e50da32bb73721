import type { LLMMessage, ToolCall, StreamChunk } from '../llm-provider.js';
import { LLMProviderError } from '../llm-provider.js';
import type { IStreamParser, ProtocolRequestConfig } from './protocol-adapter.js';
import { BaseProtocolAdapter, isRecord } from './protocol-adapter.js';

interface OpenAIStreamPayload {
  choices?: Array<{
    delta?: {
      content?: string | null;
      tool_calls?: Array<{
        index?: number;
        id?: string;
        type?: string;
        function?: {
          name?: string;
          arguments?: string;
        };
      }>;
    };
    finish_reason?: string | null;
    content_filter_results?: Record<string, { filtered?: boolean }>;
  }>;
}

/**
 * Names the filter categories that fired, e.g. `content_filter: self_harm`.
 */
function describeFilterResults(results: Record<string, { filtered?: boolean }> | undefined): string {
  const categories = results
    ? Object.keys(results).filter(category => results[category]?.filtered === true).sort()
    : [];
  return categories.length > 0 ? `content_filter: ${categories.join(', ')}` : 'content_filter';
}

/**
 * Parses one Chat Completions SSE stream. Tool call deltas arrive in
 * fragments keyed by index and are only emitted once a finish reason arrives.
 */
export class OpenAIStreamParser implements IStreamParser {
  private streamingToolCalls = new Map<number, { id: string; name: string; arguments: string }>();

  constructor(private readonly mapFinishReason: (reason: string | null | undefined) => StreamChunk['finishReason']) {}

  parseLine(line: string): StreamChunk | null {
    // Skip empty lines, comments and non-data fields
    if (!line.trim() || line.startsWith(':') || !line.startsWith('data:')) {
      return null;
    }

    const jsonStr = line.slice(5).trim();

    if (jsonStr === '[DONE]') {
      return this.finish('stop');
    }

    let data: OpenAIStreamPayload;
    try {
      data = JSON.parse(jsonStr) as OpenAIStreamPayload;
    } catch (error) {
      throw new LLMProviderError(
        `Malformed stream chunk: ${error instanceof Error ? error.message : String(error)}`,
        'openai',
        false
      );
    }

    // Azure sends prompt filter results with an empty choices array first
    const choice = data.choices?.[0];
    if (!choice) {
      return null;
    }

    const delta = choice.delta;

    if (delta?.tool_calls && delta.tool_calls.length > 0) {
      for (const tc of delta.tool_calls) {
        const index = tc.index ?? 0;
        const existing = this.streamingToolCalls.get(index);
        if (!existing) {
          this.streamingToolCalls.set(index, {
            id: tc.id || '',
            name: tc.function?.name || '',
            arguments: tc.function?.arguments || '',
          });
        } else {
          if (tc.id) existing.id = tc.id;
          if (tc.function?.name) existing.name = tc.function.name;
          if (tc.function?.arguments) existing.arguments += tc.function.arguments;
        }
      }
    }

    const content = delta?.content ? delta.content : undefined;

    if (choice.finish_reason) {
      const finishReason = this.mapFinishReason(choice.finish_reason);
      if (finishReason === 'content_filter') {
        // Calls cut off by the filter are incomplete
        this.streamingToolCalls.clear();
      }
      const chunk = this.finish(finishReason);
      if (content !== undefined) {
        chunk.content = content;
      }
      if (finishReason === 'content_filter') {
        chunk.filterReason = describeFilterResults(choice.content_filter_results);
      }
      return chunk;
    }

    if (content !== undefined) {
      return { content, done: false };
    }

    // Tool call fragments are held until the finish reason
    return null;
  }

  private finish(finishReason: StreamChunk['finishReason']): StreamChunk {
    if (this.streamingToolCalls.size === 0) {
      return { done: true, finishReason };
    }

    const toolCalls: ToolCall[] = [...this.streamingToolCalls.entries()]
      .sort((a, b) => a[0] - b[0])
      .map(([, tc]) => ({
        id: tc.id,
        type: 'function' as const,
        function: {
          name: tc.name,
          arguments: tc.arguments,
        },
      }));
    this.streamingToolCalls.clear();

    return { toolCalls, done: true, finishReason };
  }
}

/**
 * OpenAI Chat Completions API protocol adapter
 * Works against OpenAI, Azure OpenAI and Azure AI inference endpoints
 */
export class OpenAIProtocolAdapter extends BaseProtocolAdapter {
  readonly protocolId = 'openai' as const;

  formatRequest(messages: LLMMessage[], config: ProtocolRequestConfig): unknown {
    const openaiMessages = messages.map(m => {
      if (m.role === 'tool' && m.tool_call_id) {
        return {
          role: 'tool',
          tool_call_id: m.tool_call_id,
          content: m.content || '',
        };
      }

      if (m.role === 'assistant' && m.tool_calls && m.tool_calls.length > 0) {
        return {
          role: 'assistant',
          content: m.content,
          tool_calls: m.tool_calls.map(tc => ({
            id: tc.id,
            type: tc.type,
            function: {
              name: tc.function.name,
              arguments: tc.function.arguments,
            },
          })),
        };
      }

      return {
        role: m.role,
        content: m.content,
      };
    });

    const requestBody: Record<string, unknown> = {
      model: config.model,
      messages: openaiMessages,
      max_tokens: config.maxTokens || 1200,
      temperature: config.temperature ?? 0.3,
    };

    if (config.tools && config.tools.length > 0) {
      requestBody.tools = config.tools.map(tool => ({
        type: 'function',
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
        },
      }));
      if (config.tool_choice) {
        requestBody.tool_choice = config.tool_choice;
      }
    }

    if (config.stream) {
      requestBody.stream = true;
    }

    return requestBody;
  }

  buildHeaders(apiKey: string | undefined): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'text/event-stream',
    };

    if (apiKey) {
      headers['Authorization'] = `Bearer ${apiKey}`;
    }

    return headers;
  }

  buildUrl(baseUrl: string, model: string): string {
    const trimmed = baseUrl.replace(/\/+$/, '');
    // Azure OpenAI uses deployment-based URLs
    if (trimmed.includes('openai.azure.com')) {
      return `${trimmed}/openai/deployments/${encodeURIComponent(model)}/chat/completions?api-version=2024-02-15-preview`;
    }
    return `${trimmed}/chat/completions`;
  }

  extractContentFilterReason(status: number, response: unknown): string | null {
    if (status !== 400 || !isRecord(response) || !isRecord(response.error)) {
      return null;
    }
    const error = response.error;
    if (error.code !== 'content_filter') {
      return null;
    }
    const inner = isRecord(error.innererror) ? error.innererror : undefined;
    const results = inner && isRecord(inner.content_filter_result) ? inner.content_filter_result : undefined;
    if (!results) {
      return 'content_filter';
    }
    const filtered: Record<string, { filtered?: boolean }> = {};
    for (const [category, value] of Object.entries(results)) {
      filtered[category] = { filtered: isRecord(value) && value.filtered === true };
    }
    return describeFilterResults(filtered);
  }

  createStreamParser(): OpenAIStreamParser {
    return new OpenAIStreamParser(reason => this.mapFinishReason(reason));
  }
}
