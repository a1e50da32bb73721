import { OpenAIStreamingProvider } from '../../../src/infra/llm/streaming-provider.js';
import { LLMProviderError } from '../../../src/infra/llm/llm-provider.js';
import type { GenerationRequest, StreamChunk } from '../../../src/infra/llm/llm-provider.js';
import { CancelledError } from '../../../src/domain/generation/errors.js';

function sseResponse(pieces: string[]): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const piece of pieces) {
        controller.enqueue(encoder.encode(piece));
      }
      controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function mockFetch(response: Response | Error) {
  return jest.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
}

async function collect(iterable: AsyncIterable<StreamChunk>): Promise<StreamChunk[]> {
  const chunks: StreamChunk[] = [];
  for await (const chunk of iterable) {
    chunks.push(chunk);
  }
  return chunks;
}

const request: GenerationRequest = {
  messages: [
    { role: 'system', content: 'Answer from passages.' },
    { role: 'user', content: 'What is dengue?' },
  ],
};

const silentLogger = { debug: jest.fn(), warn: jest.fn() };

describe('OpenAIStreamingProvider', () => {
  it('should report its name from the model', () => {
    const provider = new OpenAIStreamingProvider({ baseUrl: 'http://llm.test/v1', model: 'gpt-4o-mini' });

    expect(provider.getName()).toBe('openai:gpt-4o-mini');
  });

  it('should post a streaming request with credentials', async () => {
    const fetchImpl = mockFetch(sseResponse(['data: [DONE]\n\n']));
    const provider = new OpenAIStreamingProvider({
      baseUrl: 'http://llm.test/v1',
      model: 'gpt-4o-mini',
      apiKey: 'test-secret',
      temperature: 0.2,
      fetchImpl,
      logger: silentLogger,
    });

    await collect(provider.stream(request, new AbortController().signal));

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://llm.test/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: 'gpt-4o-mini',
      stream: true,
      temperature: 0.2,
      max_tokens: 1200,
    });
  });

  it('should reassemble lines split across network chunks', async () => {
    const fetchImpl = mockFetch(
      sseResponse([
        'data: {"choices":[{"delta":{"content":"Hel',
        'lo"}}]}\r\n\r\ndata: {"choices":[{"delta":{"content":" there"},"finish_reason":"stop"}]}\n\n',
      ])
    );
    const provider = new OpenAIStreamingProvider({ baseUrl: 'http://llm.test/v1', model: 'm', fetchImpl, logger: silentLogger });

    const chunks = await collect(provider.stream(request, new AbortController().signal));

    expect(chunks).toEqual([
      { content: 'Hello', done: false },
      { content: ' there', done: true, finishReason: 'stop' },
    ]);
  });

  it('should parse a final line without a trailing newline', async () => {
    const fetchImpl = mockFetch(sseResponse(['data: {"choices":[{"delta":{"content":"Hi"}}]}\n', 'data: [DONE]']));
    const provider = new OpenAIStreamingProvider({ baseUrl: 'http://llm.test/v1', model: 'm', fetchImpl, logger: silentLogger });

    const chunks = await collect(provider.stream(request, new AbortController().signal));

    expect(chunks).toEqual([
      { content: 'Hi', done: false },
      { done: true, finishReason: 'stop' },
    ]);
  });

  it('should fail when the stream ends without a terminal marker', async () => {
    const fetchImpl = mockFetch(sseResponse(['data: {"choices":[{"delta":{"content":"Hi"}}]}\n\n']));
    const provider = new OpenAIStreamingProvider({ baseUrl: 'http://llm.test/v1', model: 'm', fetchImpl, logger: silentLogger });

    const chunks: StreamChunk[] = [];
    let caught: unknown;
    try {
      for await (const chunk of provider.stream(request, new AbortController().signal)) {
        chunks.push(chunk);
      }
    } catch (error) {
      caught = error;
    }

    expect(chunks).toEqual([{ content: 'Hi', done: false }]);
    expect(caught).toBeInstanceOf(LLMProviderError);
    expect(caught).toMatchObject({ message: 'Stream ended without a terminal marker', recoverable: false });
  });

  it('should turn a content filter rejection into a terminal chunk', async () => {
    const fetchImpl = mockFetch(
      jsonResponse(400, {
        error: {
          code: 'content_filter',
          message: 'The prompt was filtered',
          innererror: { content_filter_result: { self_harm: { filtered: true } } },
        },
      })
    );
    const provider = new OpenAIStreamingProvider({ baseUrl: 'http://llm.test/v1', model: 'm', fetchImpl, logger: silentLogger });

    const chunks = await collect(provider.stream(request, new AbortController().signal));

    expect(chunks).toEqual([{ done: true, finishReason: 'content_filter', filterReason: 'content_filter: self_harm' }]);
  });

  it('should mark server errors as recoverable', async () => {
    const fetchImpl = mockFetch(jsonResponse(503, { error: { message: 'Overloaded' } }));
    const provider = new OpenAIStreamingProvider({ baseUrl: 'http://llm.test/v1', model: 'm', fetchImpl, logger: silentLogger });

    await expect(collect(provider.stream(request, new AbortController().signal))).rejects.toMatchObject({
      name: 'LLMProviderError',
      message: 'Streaming API error (503): Overloaded',
      recoverable: true,
      status: 503,
    });
  });

  it('should mark authentication errors as not recoverable', async () => {
    const fetchImpl = mockFetch(jsonResponse(401, { error: { message: 'Invalid key' } }));
    const provider = new OpenAIStreamingProvider({ baseUrl: 'http://llm.test/v1', model: 'm', fetchImpl, logger: silentLogger });

    await expect(collect(provider.stream(request, new AbortController().signal))).rejects.toMatchObject({
      recoverable: false,
      status: 401,
    });
  });

  it('should wrap network failures as recoverable', async () => {
    const fetchImpl = mockFetch(new TypeError('fetch failed'));
    const provider = new OpenAIStreamingProvider({ baseUrl: 'http://llm.test/v1', model: 'm', fetchImpl, logger: silentLogger });

    await expect(collect(provider.stream(request, new AbortController().signal))).rejects.toMatchObject({
      name: 'LLMProviderError',
      message: 'Request failed: fetch failed',
      recoverable: true,
    });
  });

  it('should report cancellation when the caller aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchImpl = mockFetch(new Error('This operation was aborted'));
    const provider = new OpenAIStreamingProvider({ baseUrl: 'http://llm.test/v1', model: 'm', fetchImpl, logger: silentLogger });

    await expect(collect(provider.stream(request, controller.signal))).rejects.toBeInstanceOf(CancelledError);
  });
});
