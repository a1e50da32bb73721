import * as fs from 'fs';
import { createValidator, describeIssues, toValidationIssues } from '../validation/schema-validator.js';
import { getRuntimeConfigPath } from './config-paths.js';

export interface MedAssistConfig {
  provider: {
    baseUrl: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
  };
  embedding: {
    baseUrl: string;
    model: string;
    dimension?: number;
    timeoutMs: number;
    maxRetries: number;
  };
  vectorIndex: {
    host?: string;
    namespace?: string;
    timeoutMs: number;
  };
  retrieval: {
    topK: number;
    minScore: number;
    oversampleFactor: number;
    historyFusionTurns: number;
  };
  prompt: {
    budgetChars: number;
    historyWindowTurns: number;
  };
  tools: {
    timeoutMs: number;
    maxRounds: number;
  };
  conversation: {
    maxStoredExchanges: number;
    maxConversations: number;
  };
  gateway: {
    host: string;
    port: number;
  };
  debug: {
    loggingEnabled: boolean;
  };
}

/**
 * Secrets are read from the environment only, never from the config file.
 */
export interface MedAssistSecrets {
  providerApiKey?: string;
  embeddingApiKey?: string;
  vectorIndexApiKey?: string;
}

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export const DEFAULT_RUNTIME_CONFIG: MedAssistConfig = {
  provider: {
    baseUrl: 'https://models.inference.ai.azure.com',
    model: 'gpt-4o-mini',
    temperature: 0.3,
    maxTokens: 1200,
    timeoutMs: 60000,
    maxRetries: 2,
    retryBaseDelayMs: 500,
  },
  embedding: {
    baseUrl: 'https://api.pinecone.io',
    model: 'multilingual-e5-large',
    dimension: 1024,
    timeoutMs: 15000,
    maxRetries: 2,
  },
  vectorIndex: {
    timeoutMs: 15000,
  },
  retrieval: {
    topK: 7,
    minScore: 0.5,
    oversampleFactor: 2,
    historyFusionTurns: 2,
  },
  prompt: {
    budgetChars: 24000,
    historyWindowTurns: 10,
  },
  tools: {
    timeoutMs: 15000,
    maxRounds: 4,
  },
  conversation: {
    maxStoredExchanges: 10,
    maxConversations: 1000,
  },
  gateway: {
    host: '127.0.0.1',
    port: 8000,
  },
  debug: {
    loggingEnabled: false,
  },
};

const positiveInteger = { type: 'integer', minimum: 1 } as const;
const nonNegativeInteger = { type: 'integer', minimum: 0 } as const;

const CONFIG_FILE_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'MedAssist Runtime Configuration',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    provider: {
      type: 'object',
      properties: {
        baseUrl: { type: 'string', format: 'uri' },
        model: { type: 'string', minLength: 1 },
        temperature: { type: 'number', minimum: 0, maximum: 2 },
        maxTokens: positiveInteger,
        timeoutMs: positiveInteger,
        maxRetries: nonNegativeInteger,
        retryBaseDelayMs: nonNegativeInteger,
      },
      additionalProperties: false,
    },
    embedding: {
      type: 'object',
      properties: {
        baseUrl: { type: 'string', format: 'uri' },
        model: { type: 'string', minLength: 1 },
        dimension: positiveInteger,
        timeoutMs: positiveInteger,
        maxRetries: nonNegativeInteger,
      },
      additionalProperties: false,
    },
    vectorIndex: {
      type: 'object',
      properties: {
        host: { type: 'string', format: 'uri' },
        namespace: { type: 'string' },
        timeoutMs: positiveInteger,
      },
      additionalProperties: false,
    },
    retrieval: {
      type: 'object',
      properties: {
        topK: positiveInteger,
        minScore: { type: 'number' },
        oversampleFactor: { type: 'number', minimum: 1 },
        historyFusionTurns: nonNegativeInteger,
      },
      additionalProperties: false,
    },
    prompt: {
      type: 'object',
      properties: {
        budgetChars: positiveInteger,
        historyWindowTurns: nonNegativeInteger,
      },
      additionalProperties: false,
    },
    tools: {
      type: 'object',
      properties: {
        timeoutMs: positiveInteger,
        maxRounds: nonNegativeInteger,
      },
      additionalProperties: false,
    },
    conversation: {
      type: 'object',
      properties: {
        maxStoredExchanges: nonNegativeInteger,
        maxConversations: positiveInteger,
      },
      additionalProperties: false,
    },
    gateway: {
      type: 'object',
      properties: {
        host: { type: 'string', minLength: 1 },
        port: { type: 'integer', minimum: 1, maximum: 65535 },
      },
      additionalProperties: false,
    },
    debug: {
      type: 'object',
      properties: {
        loggingEnabled: { type: 'boolean' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Section, key: string): Section {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function toPositiveInt(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
    return value;
  }

  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }

  return fallback;
}

function toNonNegativeInt(value: unknown, fallback: number): number {
  if (value === 0 || value === '0') {
    return 0;
  }
  return toPositiveInt(value, fallback);
}

function toFiniteNumber(value: unknown, fallback: number, min = -Infinity, max = Infinity): number {
  const parsed = typeof value === 'string' && value.trim() ? Number(value) : value;
  if (typeof parsed === 'number' && Number.isFinite(parsed) && parsed >= min && parsed <= max) {
    return parsed;
  }
  return fallback;
}

function toBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }

  return fallback;
}

function toStringValue(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback;
}

function toOptionalString(value: unknown, fallback: string | undefined): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback;
}

/**
 * Builds a complete config from any partially filled object, falling back to
 * the defaults for every missing or out-of-range value.
 */
export function normalizeConfig(raw: Section): MedAssistConfig {
  const defaults = DEFAULT_RUNTIME_CONFIG;
  const provider = section(raw, 'provider');
  const embedding = section(raw, 'embedding');
  const vectorIndex = section(raw, 'vectorIndex');
  const retrieval = section(raw, 'retrieval');
  const prompt = section(raw, 'prompt');
  const tools = section(raw, 'tools');
  const conversation = section(raw, 'conversation');
  const gateway = section(raw, 'gateway');
  const debug = section(raw, 'debug');

  return {
    provider: {
      baseUrl: toStringValue(provider.baseUrl, defaults.provider.baseUrl).replace(/\/+$/, ''),
      model: toStringValue(provider.model, defaults.provider.model),
      temperature: toFiniteNumber(provider.temperature, defaults.provider.temperature, 0, 2),
      maxTokens: toPositiveInt(provider.maxTokens, defaults.provider.maxTokens),
      timeoutMs: toPositiveInt(provider.timeoutMs, defaults.provider.timeoutMs),
      maxRetries: toNonNegativeInt(provider.maxRetries, defaults.provider.maxRetries),
      retryBaseDelayMs: toNonNegativeInt(provider.retryBaseDelayMs, defaults.provider.retryBaseDelayMs),
    },
    embedding: {
      baseUrl: toStringValue(embedding.baseUrl, defaults.embedding.baseUrl).replace(/\/+$/, ''),
      model: toStringValue(embedding.model, defaults.embedding.model),
      dimension: 'dimension' in embedding
        ? toPositiveInt(embedding.dimension, defaults.embedding.dimension ?? 0) || undefined
        : defaults.embedding.dimension,
      timeoutMs: toPositiveInt(embedding.timeoutMs, defaults.embedding.timeoutMs),
      maxRetries: toNonNegativeInt(embedding.maxRetries, defaults.embedding.maxRetries),
    },
    vectorIndex: {
      host: toOptionalString(vectorIndex.host, defaults.vectorIndex.host)?.replace(/\/+$/, ''),
      namespace: toOptionalString(vectorIndex.namespace, defaults.vectorIndex.namespace),
      timeoutMs: toPositiveInt(vectorIndex.timeoutMs, defaults.vectorIndex.timeoutMs),
    },
    retrieval: {
      topK: toPositiveInt(retrieval.topK, defaults.retrieval.topK),
      minScore: toFiniteNumber(retrieval.minScore, defaults.retrieval.minScore),
      oversampleFactor: toFiniteNumber(retrieval.oversampleFactor, defaults.retrieval.oversampleFactor, 1),
      historyFusionTurns: toNonNegativeInt(retrieval.historyFusionTurns, defaults.retrieval.historyFusionTurns),
    },
    prompt: {
      budgetChars: toPositiveInt(prompt.budgetChars, defaults.prompt.budgetChars),
      historyWindowTurns: toNonNegativeInt(prompt.historyWindowTurns, defaults.prompt.historyWindowTurns),
    },
    tools: {
      timeoutMs: toPositiveInt(tools.timeoutMs, defaults.tools.timeoutMs),
      maxRounds: toNonNegativeInt(tools.maxRounds, defaults.tools.maxRounds),
    },
    conversation: {
      maxStoredExchanges: toNonNegativeInt(
        conversation.maxStoredExchanges,
        defaults.conversation.maxStoredExchanges
      ),
      maxConversations: toPositiveInt(conversation.maxConversations, defaults.conversation.maxConversations),
    },
    gateway: {
      host: toStringValue(gateway.host, defaults.gateway.host),
      port: toPositiveInt(gateway.port, defaults.gateway.port),
    },
    debug: {
      loggingEnabled: toBoolean(debug.loggingEnabled, defaults.debug.loggingEnabled),
    },
  };
}

/**
 * Validate the contents of medassist.json against the embedded JSON Schema
 */
export function validateConfigFile(config: unknown): Section {
  const ajv = createValidator();
  const validate = ajv.compile(CONFIG_FILE_SCHEMA);

  if (!validate(config) || !isRecord(config)) {
    const errors = toValidationIssues(validate.errors);
    throw new ConfigValidationError(`Invalid configuration: ${describeIssues(errors)}`, errors);
  }

  return config;
}

export function applyEnvironment(
  config: MedAssistConfig,
  env: NodeJS.ProcessEnv = process.env
): MedAssistConfig {
  return {
    provider: {
      ...config.provider,
      baseUrl: toStringValue(env.MEDASSIST_PROVIDER_BASE_URL, config.provider.baseUrl).replace(/\/+$/, ''),
      model: toStringValue(env.MEDASSIST_MODEL, config.provider.model),
      temperature: toFiniteNumber(env.MEDASSIST_TEMPERATURE, config.provider.temperature, 0, 2),
      maxTokens: toPositiveInt(env.MEDASSIST_MAX_TOKENS, config.provider.maxTokens),
      timeoutMs: toPositiveInt(env.MEDASSIST_PROVIDER_TIMEOUT_MS, config.provider.timeoutMs),
      maxRetries: toNonNegativeInt(env.MEDASSIST_PROVIDER_MAX_RETRIES, config.provider.maxRetries),
    },
    embedding: {
      ...config.embedding,
      baseUrl: toStringValue(env.MEDASSIST_EMBEDDING_BASE_URL, config.embedding.baseUrl).replace(/\/+$/, ''),
      model: toStringValue(env.MEDASSIST_EMBEDDING_MODEL, config.embedding.model),
      dimension: env.MEDASSIST_EMBEDDING_DIMENSION !== undefined
        ? toPositiveInt(env.MEDASSIST_EMBEDDING_DIMENSION, 0) || undefined
        : config.embedding.dimension,
    },
    vectorIndex: {
      ...config.vectorIndex,
      host: toOptionalString(env.MEDASSIST_INDEX_HOST, config.vectorIndex.host)?.replace(/\/+$/, ''),
      namespace: toOptionalString(env.MEDASSIST_INDEX_NAMESPACE, config.vectorIndex.namespace),
    },
    retrieval: {
      ...config.retrieval,
      topK: toPositiveInt(env.MEDASSIST_TOP_K, config.retrieval.topK),
      minScore: toFiniteNumber(env.MEDASSIST_MIN_SCORE, config.retrieval.minScore),
    },
    prompt: {
      ...config.prompt,
      budgetChars: toPositiveInt(env.MEDASSIST_PROMPT_BUDGET_CHARS, config.prompt.budgetChars),
    },
    tools: {
      timeoutMs: toPositiveInt(env.MEDASSIST_TOOL_TIMEOUT_MS, config.tools.timeoutMs),
      maxRounds: toNonNegativeInt(env.MEDASSIST_MAX_TOOL_ROUNDS, config.tools.maxRounds),
    },
    conversation: {
      ...config.conversation,
      maxConversations: toPositiveInt(env.MEDASSIST_MAX_CONVERSATIONS, config.conversation.maxConversations),
    },
    gateway: {
      host: toStringValue(env.MEDASSIST_GATEWAY_HOST, config.gateway.host),
      port: toPositiveInt(env.MEDASSIST_GATEWAY_PORT, config.gateway.port),
    },
    debug: {
      loggingEnabled: toBoolean(env.MEDASSIST_DEBUG, config.debug.loggingEnabled),
    },
  };
}

/**
 * Defaults, then medassist.json, then MEDASSIST_* environment variables.
 * Throws ConfigValidationError when the file exists but does not match the schema.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): MedAssistConfig {
  const configPath = getRuntimeConfigPath(env);
  if (!fs.existsSync(configPath)) {
    return applyEnvironment(normalizeConfig({}), env);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigValidationError(
      `Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      [{ path: '/', message: 'invalid JSON' }]
    );
  }

  return applyEnvironment(normalizeConfig(validateConfigFile(parsed)), env);
}

export function resolveSecrets(env: NodeJS.ProcessEnv = process.env): MedAssistSecrets {
  return {
    providerApiKey: toOptionalString(
      env.MEDASSIST_PROVIDER_API_KEY,
      toOptionalString(env.GITHUB_TOKEN, toOptionalString(env.OPENAI_API_KEY, undefined))
    ),
    embeddingApiKey: toOptionalString(
      env.MEDASSIST_EMBEDDING_API_KEY,
      toOptionalString(env.PINECONE_API_KEY, undefined)
    ),
    vectorIndexApiKey: toOptionalString(
      env.MEDASSIST_INDEX_API_KEY,
      toOptionalString(env.PINECONE_API_KEY, undefined)
    ),
  };
}
