/**
 * Tool Invoker
 *
 * Runs model-requested tool calls against the registry. Every tool-level
 * problem becomes an error ToolResult so the model can adapt and retry.
 */

import type { ToolCallRequest, ToolErrorCode, ToolResult } from '../../domain/tools/types.js';
import { describeIssues } from '../validation/schema-validator.js';
import type { ToolRegistry } from './tool-registry.js';

export interface ToolInvokerOptions {
  timeoutMs?: number;
  logger?: Pick<Console, 'debug' | 'warn'>;
  debug?: boolean;
}

export interface InvokeOptions {
  /** Identifies the generation session; one call may be in flight per session */
  sessionId: string;
  signal?: AbortSignal;
}

export class ToolConcurrencyError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} already has a tool call in flight`);
    this.name = 'ToolConcurrencyError';
  }
}

function failure(request: ToolCallRequest, code: ToolErrorCode, message: string): ToolResult {
  return { callId: request.id, name: request.name, ok: false, error: { code, message } };
}

export class ToolInvoker {
  private readonly timeoutMs: number;
  private readonly logger: Pick<Console, 'debug' | 'warn'>;
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly registry: ToolRegistry,
    private readonly options: ToolInvokerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.logger = options.logger ?? console;
  }

  isBusy(sessionId: string): boolean {
    return this.inFlight.has(sessionId);
  }

  async invoke(request: ToolCallRequest, options: InvokeOptions): Promise<ToolResult> {
    const { sessionId, signal } = options;
    if (this.inFlight.has(sessionId)) {
      throw new ToolConcurrencyError(sessionId);
    }

    const tool = this.registry.getTool(request.name);
    if (!tool) {
      return failure(request, 'unknown_tool', `Unknown tool '${request.name}'`);
    }

    if (signal?.aborted) {
      return failure(request, 'cancelled', 'The request was cancelled');
    }

    // parseToolArguments leaves unparseable input as the raw string
    if (typeof request.arguments === 'string') {
      return failure(request, 'invalid_arguments', 'Arguments must be a JSON object');
    }

    const prepared = tool.prepare(request.arguments);
    if (!prepared.ok) {
      return failure(request, 'invalid_arguments', `Invalid arguments: ${describeIssues(prepared.issues)}`);
    }

    this.inFlight.add(sessionId);
    try {
      return await this.runWithTimeout(request, prepared.run, signal);
    } finally {
      this.inFlight.delete(sessionId);
    }
  }

  private runWithTimeout(
    request: ToolCallRequest,
    run: (context: { callId: string; signal: AbortSignal }) => Promise<unknown>,
    signal: AbortSignal | undefined
  ): Promise<ToolResult> {
    const controller = new AbortController();
    const startedAt = Date.now();

    return new Promise<ToolResult>((resolve) => {
      let settled = false;

      const settle = (result: ToolResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (this.options.debug) {
          this.logger.debug(
            `[ToolInvoker] ${request.name} finished in ${Date.now() - startedAt}ms (${result.ok ? 'ok' : result.error.code})`
          );
        }
        resolve(result);
      };

      // The handler is told to stop; its promise is not awaited any further
      const onAbort = (): void => {
        controller.abort();
        settle(failure(request, 'cancelled', 'The request was cancelled'));
      };

      const timer = setTimeout(() => {
        controller.abort();
        this.logger.warn(`[ToolInvoker] ${request.name} timed out after ${this.timeoutMs}ms`);
        settle(failure(request, 'timeout', `Tool '${request.name}' did not finish within ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });

      void Promise.resolve()
        .then(() => run({ callId: request.id, signal: controller.signal }))
        .then(
          (payload) => settle({ callId: request.id, name: request.name, ok: true, payload }),
          (error: unknown) => {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.warn(`[ToolInvoker] ${request.name} failed: ${message}`);
            settle(failure(request, 'execution_failed', message));
          }
        );
    });
  }
}
