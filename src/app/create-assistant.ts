/**
 * Wires the configured clients, tools and orchestrator together.
 * Every collaborator can be replaced, which is how tests swap in fakes.
 */

import type { MedAssistConfig, MedAssistSecrets } from '../infra/config/runtime-config.js';
import type { Embedder } from '../infra/embedding/embedder.js';
import { HttpEmbedder } from '../infra/embedding/embedder.js';
import type { VectorIndexClient } from '../infra/vector-index/types.js';
import { HttpVectorIndexClient } from '../infra/vector-index/http-vector-index.js';
import { InMemoryVectorIndex } from '../infra/vector-index/in-memory-vector-index.js';
import type { GenerationProvider } from '../infra/llm/llm-provider.js';
import { OpenAIStreamingProvider } from '../infra/llm/streaming-provider.js';
import { ToolRegistry } from '../infra/tools/tool-registry.js';
import { ToolInvoker } from '../infra/tools/tool-invoker.js';
import type { HospitalDirectory } from '../infra/tools/implementations/hospital-directory.js';
import { OpenStreetMapHospitalDirectory } from '../infra/tools/implementations/hospital-directory.js';
import { FindHospitalsTool } from '../infra/tools/implementations/find-hospitals-tool.js';
import { KnowledgeSearchTool } from '../infra/tools/implementations/knowledge-search-tool.js';
import { PredictConditionsTool } from '../infra/tools/implementations/predict-conditions-tool.js';
import type { ServiceStatus } from '../gateway/http-server.js';
import { Retriever } from './retrieval/retriever.js';
import { PromptAssembler } from './prompt/prompt-assembler.js';
import type { IConversationStore } from './conversation/conversation-store.js';
import { InMemoryConversationStore } from './conversation/conversation-store.js';
import { GenerationOrchestrator } from './generation/generation-orchestrator.js';

export interface AssistantOverrides {
  embedder?: Embedder;
  vectorIndex?: VectorIndexClient;
  provider?: GenerationProvider;
  hospitalDirectory?: HospitalDirectory;
  store?: IConversationStore;
  logger?: Pick<Console, 'debug' | 'info' | 'log' | 'warn' | 'error'>;
}

export interface Assistant {
  orchestrator: GenerationOrchestrator;
  store: IConversationStore;
  registry: ToolRegistry;
  services: () => Record<string, ServiceStatus>;
}

export function createAssistant(
  config: MedAssistConfig,
  secrets: MedAssistSecrets,
  overrides: AssistantOverrides = {}
): Assistant {
  const logger = overrides.logger ?? console;
  const debug = config.debug.loggingEnabled;

  const embedder =
    overrides.embedder ??
    new HttpEmbedder({
      baseUrl: config.embedding.baseUrl,
      model: config.embedding.model,
      apiKey: secrets.embeddingApiKey,
      dimension: config.embedding.dimension,
      timeoutMs: config.embedding.timeoutMs,
      maxRetries: config.embedding.maxRetries,
      logger,
    });

  let vectorIndex = overrides.vectorIndex;
  let indexStatus: ServiceStatus = 'configured';
  if (!vectorIndex) {
    if (config.vectorIndex.host) {
      vectorIndex = new HttpVectorIndexClient({
        host: config.vectorIndex.host,
        apiKey: secrets.vectorIndexApiKey,
        namespace: config.vectorIndex.namespace,
        timeoutMs: config.vectorIndex.timeoutMs,
        logger,
      });
    } else {
      logger.warn('[Assistant] No vector index host configured; using an empty in-memory index');
      vectorIndex = new InMemoryVectorIndex();
      indexStatus = 'in-memory';
    }
  }

  const provider =
    overrides.provider ??
    new OpenAIStreamingProvider({
      baseUrl: config.provider.baseUrl,
      model: config.provider.model,
      apiKey: secrets.providerApiKey,
      temperature: config.provider.temperature,
      maxTokens: config.provider.maxTokens,
      timeoutMs: config.provider.timeoutMs,
      logger,
      debug,
    });

  const retriever = new Retriever(embedder, vectorIndex, {
    oversampleFactor: config.retrieval.oversampleFactor,
    historyFusionTurns: config.retrieval.historyFusionTurns,
    logger,
    debug,
  });

  const registry = new ToolRegistry();
  registry.register(new FindHospitalsTool(overrides.hospitalDirectory ?? new OpenStreetMapHospitalDirectory()));
  registry.register(new PredictConditionsTool());
  registry.register(
    new KnowledgeSearchTool(retriever, { k: config.retrieval.topK, minScore: config.retrieval.minScore })
  );

  const invoker = new ToolInvoker(registry, { timeoutMs: config.tools.timeoutMs, logger, debug });
  const store =
    overrides.store ??
    new InMemoryConversationStore(config.conversation.maxStoredExchanges, config.conversation.maxConversations);

  const orchestrator = new GenerationOrchestrator({
    retriever,
    assembler: new PromptAssembler({ historyWindowTurns: config.prompt.historyWindowTurns }),
    provider,
    registry,
    invoker,
    store,
    settings: {
      topK: config.retrieval.topK,
      minScore: config.retrieval.minScore,
      budgetChars: config.prompt.budgetChars,
      maxToolRounds: config.tools.maxRounds,
      maxProviderRetries: config.provider.maxRetries,
      retryBaseDelayMs: config.provider.retryBaseDelayMs,
    },
    logger,
    debug,
  });

  const services = (): Record<string, ServiceStatus> => ({
    provider: overrides.provider || secrets.providerApiKey ? 'configured' : 'missing',
    embedding: overrides.embedder || secrets.embeddingApiKey ? 'configured' : 'missing',
    vectorIndex: indexStatus,
  });

  return { orchestrator, store, registry, services };
}
