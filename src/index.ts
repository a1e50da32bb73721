export { createAssistant, type Assistant, type AssistantOverrides } from './app/create-assistant.js';
export { VERSION } from './version.js';

export * from './app/generation/index.js';
export * from './app/retrieval/index.js';
export * from './app/prompt/index.js';
export * from './app/conversation/index.js';

export * from './domain/generation/errors.js';
export * from './domain/generation/stream-event.js';
export * from './domain/generation/state-machine-rules.js';
export * from './domain/rag/passage.js';
export * from './domain/tools/types.js';
export * from './domain/conversation/turn.js';

export * from './infra/config/index.js';
export * from './infra/embedding/index.js';
export * from './infra/llm/index.js';
export * from './infra/tools/index.js';
export * from './infra/vector-index/index.js';

export { ChatGatewayServer, GatewayError, formatSseEvent } from './gateway/index.js';
export type {
  ChatFailureBody,
  ChatGatewayDependencies,
  ChatGatewayOptions,
  ChatResponseBody,
  HealthReport,
} from './gateway/index.js';
