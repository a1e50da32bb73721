import type { ToolSchema } from '../../domain/tools/types.js';

export interface ToolCall {
  id: string;              // Unique ID for the tool call
  type: 'function';
  function: {
    name: string;
    arguments: string;     // JSON string
  };
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;  // null when tool_calls present
  tool_calls?: ToolCall[];  // Assistant's tool calls
  tool_call_id?: string;    // For tool result messages
}

export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter' | 'error';

export interface StreamChunk {
  content?: string;              // Text content
  toolCalls?: ToolCall[];        // Completed tool calls
  done: boolean;                 // Whether streaming is complete
  finishReason?: FinishReason;
  filterReason?: string;         // Set when finishReason is content_filter
}

export interface GenerationRequest {
  messages: LLMMessage[];
  tools?: ToolSchema[];
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Streaming generation boundary. The returned iterable is finite and can be
 * consumed once; `content_filter` and a `done` chunk are both terminal.
 */
export interface GenerationProvider {
  stream(request: GenerationRequest, signal: AbortSignal): AsyncIterable<StreamChunk>;
  getName(): string;
}

export class LLMProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public recoverable: boolean = true,
    public status?: number
  ) {
    super(message);
    this.name = 'LLMProviderError';
  }
}

export function isLLMProviderError(error: unknown): error is LLMProviderError {
  return error instanceof LLMProviderError;
}
