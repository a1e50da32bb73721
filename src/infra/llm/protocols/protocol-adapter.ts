import type { LLMMessage, StreamChunk, FinishReason } from '../llm-provider.js';
import type { ToolSchema } from '../../../domain/tools/types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Supported protocol identifiers
 */
export type ProtocolId = 'openai';

/**
 * Request configuration for protocol adapters
 */
export interface ProtocolRequestConfig {
  model: string;
  maxTokens?: number;
  temperature?: number;
  tools?: ToolSchema[];
  tool_choice?: 'auto' | 'none';
  stream?: boolean;
}

/**
 * Stateful parser for one streamed response. Tool call fragments are
 * accumulated here, so every stream needs its own parser.
 */
export interface IStreamParser {
  /**
   * Parse a single SSE line into a stream chunk
   * Returns null if the line should be skipped
   */
  parseLine(line: string): StreamChunk | null;
}

/**
 * Protocol adapter interface
 * Handles API format conversion between internal types and provider-specific formats
 */
export interface IProtocolAdapter {
  /** Protocol identifier */
  readonly protocolId: ProtocolId;

  /**
   * Format messages and config into provider-specific request body
   */
  formatRequest(messages: LLMMessage[], config: ProtocolRequestConfig): unknown;

  /**
   * Build headers for the request
   */
  buildHeaders(apiKey: string | undefined): Record<string, string>;

  /**
   * Build the full URL for the request
   */
  buildUrl(baseUrl: string, model: string): string;

  /**
   * Check if an error response is recoverable (worth retrying)
   */
  isRecoverableError(status: number, response?: unknown): boolean;

  /**
   * Extract error message from response
   */
  extractErrorMessage(response: unknown): string;

  /**
   * Returns the filter reason when an error response is a content-filter rejection
   */
  extractContentFilterReason(status: number, response: unknown): string | null;

  createStreamParser(): IStreamParser;
}

/**
 * Base class for protocol adapters with common functionality
 */
export abstract class BaseProtocolAdapter implements IProtocolAdapter {
  abstract readonly protocolId: ProtocolId;

  abstract formatRequest(messages: LLMMessage[], config: ProtocolRequestConfig): unknown;
  abstract buildHeaders(apiKey: string | undefined): Record<string, string>;
  abstract createStreamParser(): IStreamParser;

  buildUrl(baseUrl: string, _model: string): string {
    return baseUrl;
  }

  isRecoverableError(status: number, _response?: unknown): boolean {
    // Rate limiting and server errors are worth another attempt
    return status === 429 || status === 408 || status >= 500;
  }

  extractErrorMessage(response: unknown): string {
    if (isRecord(response)) {
      if (isRecord(response.error) && typeof response.error.message === 'string') {
        return response.error.message;
      }
      if (typeof response.message === 'string') {
        return response.message;
      }
    }
    return 'Unknown error';
  }

  extractContentFilterReason(_status: number, _response: unknown): string | null {
    return null;
  }

  /**
   * Map finish reason to standard format
   */
  protected mapFinishReason(reason: string | null | undefined): FinishReason {
    if (!reason) return 'stop';
    const normalized = reason.toLowerCase();
    if (normalized === 'stop' || normalized === 'end_turn') return 'stop';
    if (normalized === 'length' || normalized === 'max_tokens') return 'length';
    if (normalized === 'tool_calls' || normalized === 'tool_use' || normalized === 'function_call') return 'tool_calls';
    if (normalized === 'content_filter' || normalized === 'safety') return 'content_filter';
    return 'error';
  }
}
