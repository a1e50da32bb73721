// Core types and interfaces
export type {
  ToolCall,
  LLMMessage,
  FinishReason,
  StreamChunk,
  GenerationRequest,
  GenerationProvider,
} from './llm-provider.js';

export { LLMProviderError, isLLMProviderError } from './llm-provider.js';

// Protocol adapters
export type {
  ProtocolId,
  ProtocolRequestConfig,
  IProtocolAdapter,
  IStreamParser,
} from './protocols/index.js';
export { BaseProtocolAdapter, OpenAIProtocolAdapter, OpenAIStreamParser } from './protocols/index.js';

// Streaming provider
export type { StreamingProviderOptions } from './streaming-provider.js';
export { OpenAIStreamingProvider } from './streaming-provider.js';
