import type { ValidateFunction } from 'ajv';
import type { ToolParametersSchema, ToolSchema } from '../../domain/tools/types.js';
import type { ValidationIssue } from '../validation/schema-validator.js';
import { createValidator, toValidationIssues } from '../validation/schema-validator.js';

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export interface ToolExecutionContext {
  callId: string;
  /** Aborted on timeout or session cancellation */
  signal: AbortSignal;
}

export interface ToolDefinition<TArgs = unknown, TResult = unknown> {
  name: string;
  description: string;
  parameters: ToolParametersSchema;
  execute(args: TArgs, context: ToolExecutionContext): Promise<TResult>;
}

export type PreparedCall =
  | { ok: true; run: (context: ToolExecutionContext) => Promise<unknown> }
  | { ok: false; issues: ValidationIssue[] };

/**
 * A registered tool with its argument validator compiled in.
 */
export interface RegisteredTool {
  readonly schema: ToolSchema;
  prepare(args: unknown): PreparedCall;
}

export class ToolRegistrationError extends Error {
  constructor(
    message: string,
    public readonly toolName: string
  ) {
    super(message);
    this.name = 'ToolRegistrationError';
  }
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();
  private readonly ajv = createValidator();

  /**
   * Validates the definition and compiles its argument schema.
   * Nothing about a tool is checked by reflection at call time.
   */
  register<TArgs, TResult>(tool: ToolDefinition<TArgs, TResult>): void {
    if (!TOOL_NAME_PATTERN.test(tool.name)) {
      throw new ToolRegistrationError(
        `Invalid tool name '${tool.name}': expected 1-64 letters, digits, '_' or '-'`,
        tool.name
      );
    }

    if (this.tools.has(tool.name)) {
      throw new ToolRegistrationError(`Tool '${tool.name}' is already registered`, tool.name);
    }

    if (tool.parameters?.type !== 'object') {
      throw new ToolRegistrationError(`Tool '${tool.name}' parameters must be an object schema`, tool.name);
    }

    let validate: ValidateFunction<TArgs>;
    try {
      validate = this.ajv.compile<TArgs>(tool.parameters);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ToolRegistrationError(`Tool '${tool.name}' has an invalid parameter schema: ${message}`, tool.name);
    }

    const schema: ToolSchema = {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    };

    this.tools.set(tool.name, {
      schema,
      prepare(args: unknown): PreparedCall {
        if (!validate(args)) {
          return { ok: false, issues: toValidationIssues(validate.errors) };
        }
        const value = args;
        return { ok: true, run: (context) => tool.execute(value, context) };
      },
    });
  }

  unregister(toolName: string): boolean {
    return this.tools.delete(toolName);
  }

  getTool(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Schemas in registration order
   */
  getSchemas(): ToolSchema[] {
    return Array.from(this.tools.values(), (tool) => tool.schema);
  }
}
