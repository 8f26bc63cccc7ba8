/**
 * Generation Client Tests - SSE streaming
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { GenerationClient, type GenerationConfig, type GenerationDelta, type GenerationRequest } from '../generation';
import { chatEvents, silentLogger, sseResponse } from './fixtures';

// ============================================================================
// Setup
// ============================================================================

const baseConfig: GenerationConfig = {
  apiKey: 'test-secret',
  baseUrl: 'https://api.test/v1',
  chatModel: 'chat-test',
  generationTimeoutMs: 1000,
  retry: { maxRetries: 0, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 2 },
  quiet: true,
};

const request: GenerationRequest = {
  systemPrompt: 'sys',
  userMessage: 'question',
  maxTokens: 100,
  temperature: 0.5,
  topP: 0.9,
};

const usage = { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 };

const encoder = new TextEncoder();

function streamResponse(parts: readonly string[], close: boolean = true): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) controller.enqueue(encoder.encode(part));
      if (close) controller.close();
    },
  });
  return new Response(body, { status: 200 });
}

function createClient(fetchImpl: (url: string, init: RequestInit) => Promise<Response>, config: Partial<GenerationConfig> = {}) {
  const fetch = jest.fn<Promise<Response>, [string, RequestInit]>(fetchImpl);
  const client = new GenerationClient({ ...baseConfig, ...config }, { fetch, logger: silentLogger });
  return { client, fetch };
}

async function collect(stream: AsyncIterable<GenerationDelta>): Promise<GenerationDelta[]> {
  const deltas: GenerationDelta[] = [];
  for await (const delta of stream) deltas.push(delta);
  return deltas;
}

// ============================================================================
// Tests
// ============================================================================

describe('GenerationClient', () => {
  it('should collect streamed text and reported usage', async () => {
    const { client } = createClient(async () => sseResponse(chatEvents('Hello there', usage)));

    expect(await client.complete(request)).toEqual({
      text: 'Hello there',
      tokensUsed: 15,
      finishReason: 'stop',
      model: 'chat-test',
      usageReported: true,
    });
  });

  it('should stream deltas in order', async () => {
    const { client } = createClient(async () => sseResponse(chatEvents('Hello there', usage)));

    expect(await collect(client.stream(request))).toEqual([
      { type: 'text', text: 'Hell' },
      { type: 'text', text: 'o there' },
      { type: 'finish', reason: 'stop' },
      { type: 'usage', usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 } },
    ]);
  });

  it('should request a streamed completion with usage', async () => {
    const { client, fetch } = createClient(async () => sseResponse(chatEvents('ok', usage)));
    await client.complete(request);

    const [url, init] = fetch.mock.calls[0];
    const body = z
      .object({
        model: z.string(),
        messages: z.array(z.object({ role: z.string(), content: z.string() })),
        max_tokens: z.number(),
        stream: z.boolean(),
        stream_options: z.object({ include_usage: z.boolean() }),
      })
      .parse(JSON.parse(String(init.body)));

    expect(url).toBe('https://api.test/v1/chat/completions');
    expect(body).toEqual({
      model: 'chat-test',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'question' },
      ],
      max_tokens: 100,
      stream: true,
      stream_options: { include_usage: true },
    });
  });

  it('should estimate tokens when the API reports no usage', async () => {
    const { client } = createClient(async () => sseResponse(chatEvents('Hello there', null)));

    const result = await client.complete(request);

    // "sys question Hello there": 4 words × 1.3
    expect(result.tokensUsed).toBe(5);
    expect(result.usageReported).toBe(false);
  });

  it('should reassemble events split across reads and skip bad payloads', async () => {
    const { client } = createClient(async () =>
      streamResponse([
        'data: not-json\n\ndata: {"choices":[{"delta":{"con',
        'tent":"Hi"}}]}\n\n',
        'data: [DONE]\n\n',
      ])
    );

    expect((await client.complete(request)).text).toBe('Hi');
  });

  it('should close the connection once [DONE] arrives', async () => {
    const cancel = jest.fn();
    const { client } = createClient(async () => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(encoder.encode('data: {"choices":[{"delta":{"content":"Hi"}}]}\n\ndata: [DONE]\n\n'));
        },
        cancel,
      });
      return new Response(body, { status: 200 });
    });

    expect((await client.complete(request)).text).toBe('Hi');
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  // ============================================================================
  // Failures
  // ============================================================================

  it('should fail with ConfigurationError when no key is set', async () => {
    const { client, fetch } = createClient(async () => sseResponse([]), { apiKey: undefined });

    await expect(client.complete(request)).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('should report a rate limit as retryable', async () => {
    const { client } = createClient(async () => new Response('slow down', { status: 429 }));

    await expect(client.complete(request)).rejects.toMatchObject({
      message: 'Generation request failed with status 429',
      statusCode: 429,
      retryable: true,
    });
  });

  it('should retry a server error and then succeed', async () => {
    let calls = 0;
    const { client, fetch } = createClient(
      async () => (++calls === 1 ? new Response('boom', { status: 502 }) : sseResponse(chatEvents('Recovered', usage))),
      { retry: { maxRetries: 1, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 2 } }
    );

    expect((await client.complete(request)).text).toBe('Recovered');
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('should stop reading when the caller aborts', async () => {
    const { client } = createClient(async () =>
      streamResponse(['data: {"choices":[{"delta":{"content":"partial"}}]}\n\n'], false)
    );
    const controller = new AbortController();
    const iterator = client.stream({ ...request, signal: controller.signal })[Symbol.asyncIterator]();

    expect(await iterator.next()).toEqual({ done: false, value: { type: 'text', text: 'partial' } });

    controller.abort();

    await expect(iterator.next()).rejects.toMatchObject({
      message: 'Generation was cancelled',
      retryable: false,
    });
  });
});
