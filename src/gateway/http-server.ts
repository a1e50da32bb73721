/**
 * Chat Gateway - HTTP server that streams answers as server-sent events,
 * or returns the whole answer as one JSON body.
 */

import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import { randomUUID } from 'crypto';
import type { ValidateFunction } from 'ajv';

import type { GenerationOrchestrator } from '../app/generation/generation-orchestrator.js';
import type { IConversationStore } from '../app/conversation/conversation-store.js';
import { isTerminalEvent } from '../domain/generation/stream-event.js';
import type { Citation, ErrorKind, TerminalEvent } from '../domain/generation/stream-event.js';
import { createValidator, describeIssues, toValidationIssues } from '../infra/validation/schema-validator.js';
import { VERSION } from '../version.js';
import { GatewayError, isGatewayError, statusForErrorKind } from './errors.js';
import { SSE_HEADERS, formatSseEvent } from './sse.js';

export type ServiceStatus = 'configured' | 'in-memory' | 'missing';

export interface HealthReport {
  status: 'ok' | 'degraded';
  version: string;
  services: Record<string, ServiceStatus>;
}

export interface ChatRequestBody {
  message: string;
  conversationId?: string;
}

export interface ChatResponseBody {
  conversationId: string;
  response: string;
  toolsUsed: string[];
  citations: Citation[];
  degraded: boolean;
  processingTimeMs: number;
}

export interface ChatFailureBody {
  conversationId: string;
  error: string;
  code: ErrorKind;
  processingTimeMs: number;
}

export interface ChatGatewayDependencies {
  orchestrator: Pick<GenerationOrchestrator, 'submitTurn'>;
  store: IConversationStore;
  services?: () => Record<string, ServiceStatus>;
}

export interface ChatGatewayOptions {
  host: string;
  port: number;
  maxBodyBytes?: number;
  logger?: Pick<Console, 'log' | 'warn' | 'error'>;
}

const CHAT_REQUEST_SCHEMA = {
  type: 'object',
  properties: {
    message: { type: 'string', minLength: 1, maxLength: 4000, pattern: '\\S' },
    conversationId: { type: 'string', pattern: '^[A-Za-z0-9_.:-]{1,128}$' },
  },
  required: ['message'],
  additionalProperties: false,
};

const CONVERSATION_PATH = /^\/conversations\/([^/]+)$/;

export class ChatGatewayServer {
  private server: ReturnType<typeof createServer> | null = null;
  private readonly validateChatRequest: ValidateFunction<ChatRequestBody>;
  private readonly logger: Pick<Console, 'log' | 'warn' | 'error'>;
  private readonly maxBodyBytes: number;

  constructor(
    private readonly deps: ChatGatewayDependencies,
    private readonly options: ChatGatewayOptions
  ) {
    this.validateChatRequest = createValidator().compile<ChatRequestBody>(CHAT_REQUEST_SCHEMA);
    this.logger = options.logger ?? console;
    this.maxBodyBytes = options.maxBodyBytes ?? 64 * 1024;
  }

  /**
   * Start listening. Resolves with the bound port (useful when port is 0).
   */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        void this.handleRequest(req, res);
      });
      this.server = server;

      server.once('error', (error) => {
        this.logger.error('[ChatGateway] Server error:', error);
        reject(error);
      });

      server.listen(this.options.port, this.options.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : this.options.port;
        this.logger.log(`[ChatGateway] Listening on http://${this.options.host}:${port}`);
        resolve(port);
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.log('[ChatGateway] Server stopped');
        resolve();
      });
      server.closeAllConnections();
    });
  }

  getHealth(): HealthReport {
    const services = this.deps.services ? this.deps.services() : {};
    const degraded = Object.values(services).some((status) => status === 'missing');
    return { status: degraded ? 'degraded' : 'ok', version: VERSION, services };
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;
    const method = req.method ?? 'GET';

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    try {
      if (method === 'OPTIONS') {
        res.writeHead(204);
        res.end();
        return;
      }

      if (path === '/chat') {
        if (method !== 'POST') throw GatewayError.methodNotAllowed(method, path);
        await this.handleChat(req, res);
        return;
      }

      if (path === '/chat/stream') {
        if (method !== 'POST') throw GatewayError.methodNotAllowed(method, path);
        await this.handleChatStream(req, res);
        return;
      }

      if (path === '/health') {
        if (method !== 'GET') throw GatewayError.methodNotAllowed(method, path);
        this.sendJson(res, 200, this.getHealth());
        return;
      }

      const conversationMatch = CONVERSATION_PATH.exec(path);
      if (conversationMatch) {
        this.handleConversation(method, path, decodeURIComponent(conversationMatch[1]), res);
        return;
      }

      throw GatewayError.notFound(path);
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private handleConversation(method: string, path: string, conversationId: string, res: ServerResponse): void {
    if (method === 'GET') {
      // Unknown ids read as an empty history
      this.sendJson(res, 200, { conversationId, turns: this.deps.store.snapshot(conversationId) });
      return;
    }

    if (method === 'DELETE') {
      const cleared = this.deps.store.clear(conversationId);
      this.sendJson(res, 200, { conversationId, cleared });
      return;
    }

    throw GatewayError.methodNotAllowed(method, path);
  }

  private async handleChat(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { conversationId, message } = await this.readChatRequest(req);
    const controller = this.abortOnClose(res);
    const startedAt = Date.now();

    let response = '';
    let terminal: TerminalEvent | null = null;
    for await (const event of this.deps.orchestrator.submitTurn(conversationId, message, {
      signal: controller.signal,
    })) {
      if (event.type === 'token_delta') {
        response += event.text;
      } else if (isTerminalEvent(event)) {
        terminal = event;
      }
    }
    const processingTimeMs = Date.now() - startedAt;

    if (!terminal) {
      throw GatewayError.internalError();
    }
    if (res.destroyed) {
      return;
    }

    if (terminal.type === 'failed') {
      const failure: ChatFailureBody = { conversationId, error: terminal.message, code: terminal.kind, processingTimeMs };
      this.sendJson(res, statusForErrorKind(terminal.kind), failure);
      return;
    }

    const answer: ChatResponseBody = {
      conversationId,
      response,
      toolsUsed: terminal.toolsUsed,
      citations: terminal.citations,
      degraded: terminal.degraded,
      processingTimeMs,
    };
    this.sendJson(res, 200, answer);
  }

  private async handleChatStream(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { conversationId, message } = await this.readChatRequest(req);
    const controller = this.abortOnClose(res);

    res.writeHead(200, { ...SSE_HEADERS, 'X-Conversation-Id': conversationId });

    for await (const event of this.deps.orchestrator.submitTurn(conversationId, message, {
      signal: controller.signal,
    })) {
      if (res.destroyed) {
        break;
      }
      res.write(formatSseEvent(event));
    }
    res.end();
  }

  private async readChatRequest(req: IncomingMessage): Promise<{ conversationId: string; message: string }> {
    const body = await this.readJsonBody(req);
    if (!this.validateChatRequest(body)) {
      throw GatewayError.invalidRequest(describeIssues(toValidationIssues(this.validateChatRequest.errors)));
    }
    return { conversationId: body.conversationId ?? randomUUID(), message: body.message.trim() };
  }

  /** The turn is aborted if the client goes away before the response is finished */
  private abortOnClose(res: ServerResponse): AbortController {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });
    return controller;
  }

  private readJsonBody(req: IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let rejected = false;

      req.on('data', (chunk: Buffer) => {
        if (rejected) return;
        size += chunk.length;
        if (size > this.maxBodyBytes) {
          rejected = true;
          reject(GatewayError.payloadTooLarge(this.maxBodyBytes));
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        if (rejected) return;
        const raw = Buffer.concat(chunks).toString('utf-8');
        try {
          resolve(JSON.parse(raw));
        } catch (error) {
          reject(GatewayError.parseError(error instanceof Error ? error.message : undefined));
        }
      });

      req.on('error', (error) => {
        if (!rejected) {
          rejected = true;
          reject(error);
        }
      });
    });
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }

  private sendError(res: ServerResponse, error: unknown): void {
    const gatewayError = isGatewayError(error) ? error : GatewayError.internalError();
    if (!isGatewayError(error)) {
      this.logger.error('[ChatGateway] Request failed:', error);
    }

    if (res.headersSent) {
      res.end();
      return;
    }
    this.sendJson(res, gatewayError.status, gatewayError.toBody());
  }
}
