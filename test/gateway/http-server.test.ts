import { ChatGatewayServer } from '../../src/gateway/http-server.js';
import type { ServiceStatus } from '../../src/gateway/http-server.js';
import { formatSseEvent } from '../../src/gateway/sse.js';
import { InMemoryConversationStore } from '../../src/app/conversation/conversation-store.js';
import type { SubmitTurnOptions } from '../../src/app/generation/generation-orchestrator.js';
import { ErrorMessages as TurnErrorMessages } from '../../src/domain/generation/stream-event.js';
import type { StreamEvent } from '../../src/domain/generation/stream-event.js';
import { VERSION } from '../../src/version.js';

class FakeOrchestrator {
  readonly turns: Array<{ conversationId: string; query: string; signal?: AbortSignal }> = [];

  constructor(private readonly events: StreamEvent[]) {}

  async *submitTurn(
    conversationId: string,
    query: string,
    options: SubmitTurnOptions = {}
  ): AsyncGenerator<StreamEvent, void, undefined> {
    this.turns.push({ conversationId, query, signal: options.signal });
    for (const event of this.events) {
      yield event;
    }
  }
}

const EVENTS: StreamEvent[] = [
  { type: 'token_delta', text: 'Dengue spreads ' },
  { type: 'token_delta', text: 'via mosquitoes [1].' },
  {
    type: 'completed',
    toolsUsed: [],
    citations: [{ marker: 1, passageId: 'who-dengue-2', source: 'WHO Dengue, p. 2' }],
    degraded: false,
  },
];

describe('ChatGatewayServer', () => {
  const logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
  let server: ChatGatewayServer;
  let orchestrator: FakeOrchestrator;
  let store: InMemoryConversationStore;
  let services: Record<string, ServiceStatus>;
  let baseUrl: string;

  async function startServer(maxBodyBytes?: number): Promise<void> {
    server = new ChatGatewayServer(
      { orchestrator, store, services: () => services },
      { host: '127.0.0.1', port: 0, maxBodyBytes, logger }
    );
    const port = await server.start();
    baseUrl = `http://127.0.0.1:${port}`;
  }

  function postChat(body: string): Promise<Response> {
    return fetch(`${baseUrl}/chat/stream`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  beforeEach(async () => {
    orchestrator = new FakeOrchestrator(EVENTS);
    store = new InMemoryConversationStore();
    services = { provider: 'configured', embedding: 'configured', vectorIndex: 'configured' };
    await startServer();
  });

  afterEach(async () => {
    await server.stop();
  });

  describe('POST /chat', () => {
    function postAnswer(body: unknown): Promise<Response> {
      return fetch(`${baseUrl}/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
    }

    it('should return the whole answer as JSON', async () => {
      const response = await postAnswer({ message: '  How does dengue spread?  ', conversationId: 'conv-1' });

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('application/json');
      expect(await response.json()).toEqual({
        conversationId: 'conv-1',
        response: 'Dengue spreads via mosquitoes [1].',
        toolsUsed: [],
        citations: [{ marker: 1, passageId: 'who-dengue-2', source: 'WHO Dengue, p. 2' }],
        degraded: false,
        processingTimeMs: expect.any(Number),
      });
      expect(orchestrator.turns).toMatchObject([{ conversationId: 'conv-1', query: 'How does dengue spread?' }]);
    });

    it('should map a failed turn to its status', async () => {
      orchestrator = new FakeOrchestrator([
        { type: 'failed', kind: 'RetrievalError', message: TurnErrorMessages.RetrievalError },
      ]);
      await server.stop();
      await startServer();

      const response = await postAnswer({ message: 'What is dengue?', conversationId: 'conv-2' });

      expect(response.status).toBe(503);
      expect(await response.json()).toMatchObject({
        conversationId: 'conv-2',
        error: TurnErrorMessages.RetrievalError,
        code: 'RetrievalError',
      });
    });

    it('should validate the body like the streaming route', async () => {
      const response = await postAnswer({ conversationId: 'conv-1' });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: "Invalid request: /message: must have required property 'message'",
        code: 'invalid_request',
      });
      expect(orchestrator.turns).toEqual([]);
    });
  });

  describe('POST /chat/stream', () => {
    it('should stream every event as SSE', async () => {
      const response = await postChat(JSON.stringify({ message: '  How does dengue spread?  ', conversationId: 'conv-1' }));

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/event-stream; charset=utf-8');
      expect(response.headers.get('x-conversation-id')).toBe('conv-1');
      expect(await response.text()).toBe(EVENTS.map(formatSseEvent).join(''));
      expect(orchestrator.turns).toMatchObject([{ conversationId: 'conv-1', query: 'How does dengue spread?' }]);
    });

    it('should assign a conversation id when none is given', async () => {
      const response = await postChat(JSON.stringify({ message: 'Hi' }));
      await response.text();

      const conversationId = response.headers.get('x-conversation-id');
      expect(conversationId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(orchestrator.turns[0].conversationId).toBe(conversationId);
    });

    it('should reject a body without a message', async () => {
      const response = await postChat(JSON.stringify({ conversationId: 'conv-1' }));

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: "Invalid request: /message: must have required property 'message'",
        code: 'invalid_request',
      });
      expect(orchestrator.turns).toEqual([]);
    });

    it('should reject unknown fields and bad conversation ids', async () => {
      const extra = await postChat(JSON.stringify({ message: 'Hi', stream: false }));
      expect(extra.status).toBe(400);
      expect(await extra.json()).toEqual({
        error: 'Invalid request: /stream: must NOT have additional properties',
        code: 'invalid_request',
      });

      const badId = await postChat(JSON.stringify({ message: 'Hi', conversationId: 'has spaces' }));
      expect(badId.status).toBe(400);
      expect(await badId.json()).toMatchObject({ code: 'invalid_request' });
    });

    it('should reject malformed JSON', async () => {
      const response = await postChat('{"message": ');

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ code: 'parse_error' });
    });

    it('should reject oversized bodies', async () => {
      await server.stop();
      await startServer(32);

      const response = await postChat(JSON.stringify({ message: 'x'.repeat(100) }));

      expect(response.status).toBe(413);
      expect(await response.json()).toEqual({ error: 'Request body exceeds 32 bytes', code: 'payload_too_large' });
    });

    it('should only accept POST', async () => {
      const response = await fetch(`${baseUrl}/chat/stream`);

      expect(response.status).toBe(405);
      expect(await response.json()).toEqual({
        error: 'Method GET not allowed on /chat/stream',
        code: 'method_not_allowed',
      });
    });
  });

  describe('GET /health', () => {
    it('should report version and services', async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        status: 'ok',
        version: VERSION,
        services: { provider: 'configured', embedding: 'configured', vectorIndex: 'configured' },
      });
    });

    it('should be degraded when a service is missing', async () => {
      services = { provider: 'missing', embedding: 'configured', vectorIndex: 'in-memory' };

      const response = await fetch(`${baseUrl}/health`);

      expect(await response.json()).toMatchObject({ status: 'degraded' });
    });
  });

  describe('/conversations/:id', () => {
    it('should return an empty history for unknown conversations', async () => {
      const response = await fetch(`${baseUrl}/conversations/conv-9`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ conversationId: 'conv-9', turns: [] });
      expect(store.has('conv-9')).toBe(false);
    });

    it('should return and clear stored turns', async () => {
      store.appendExchange('conv-1', [
        { role: 'user', content: 'What is dengue?' },
        { role: 'assistant', content: 'A mosquito-borne infection.' },
      ]);

      const read = await fetch(`${baseUrl}/conversations/conv-1`);
      expect(await read.json()).toEqual({
        conversationId: 'conv-1',
        turns: [
          { role: 'user', content: 'What is dengue?' },
          { role: 'assistant', content: 'A mosquito-borne infection.' },
        ],
      });

      const cleared = await fetch(`${baseUrl}/conversations/conv-1`, { method: 'DELETE' });
      expect(await cleared.json()).toEqual({ conversationId: 'conv-1', cleared: true });
      expect(store.has('conv-1')).toBe(false);
    });
  });

  it('should answer CORS preflight requests', async () => {
    const response = await fetch(`${baseUrl}/chat/stream`, { method: 'OPTIONS' });

    expect(response.status).toBe(204);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('should return 404 for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found: /nope', code: 'not_found' });
  });
});
