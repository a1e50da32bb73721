/**
 * Tool calling domain types shared by the registry, the invoker and the orchestrator.
 */

export type ParameterSchema = {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';
  description?: string;
  enum?: Array<string | number>;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  items?: ParameterSchema;
  properties?: Record<string, ParameterSchema>;
  required?: string[];
};

export type ToolParametersSchema = {
  type: 'object';
  properties: Record<string, ParameterSchema>;
  required?: string[];
  additionalProperties?: boolean;
};

/**
 * Schema advertised to the generation provider.
 */
export interface ToolSchema {
  name: string;
  description: string;
  parameters: ToolParametersSchema;
}

export interface ToolCallRequest {
  id: string;
  name: string;
  /** Parsed JSON arguments, or the raw string when it was not valid JSON */
  arguments: unknown;
  rawArguments: string;
}

export type ToolErrorCode =
  | 'unknown_tool'
  | 'invalid_arguments'
  | 'timeout'
  | 'execution_failed'
  | 'cancelled';

export type ToolResult =
  | { callId: string; name: string; ok: true; payload: unknown }
  | { callId: string; name: string; ok: false; error: { code: ToolErrorCode; message: string } };

export function parseToolArguments(raw: string): unknown {
  if (!raw.trim()) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function serializeToolResult(result: ToolResult): string {
  if (result.ok) {
    return typeof result.payload === 'string' ? result.payload : JSON.stringify(result.payload);
  }
  return JSON.stringify({ error: result.error });
}
