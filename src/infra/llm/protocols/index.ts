// Protocol types and interfaces
export type {
  ProtocolId,
  ProtocolRequestConfig,
  IProtocolAdapter,
  IStreamParser,
} from './protocol-adapter.js';

export { BaseProtocolAdapter } from './protocol-adapter.js';

export { OpenAIProtocolAdapter, OpenAIStreamParser } from './openai-protocol.js';
