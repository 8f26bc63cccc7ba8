/**
 * Shared test doubles: a fake OpenAI-compatible API, deterministic
 * embeddings and a service wired to in-memory storage.
 */

import { z } from 'zod';
import { InMemoryFileSystem } from '../../storage';
import type { RAGConfigOverrides } from '../config';
import type { Logger } from '../logger';
import { PortfolioRAGService } from '../PortfolioRAGService';
import { SimpleTokenizer } from '../tokenizer';
import type { Chunk, SourceType } from '../types';

// ============================================================================
// Embeddings
// ============================================================================

export const KEYWORDS = ['typescript', 'react', 'golang', 'kubernetes', 'education', 'music'] as const;

/**
 * One dimension per keyword occurrence count, plus a catch-all dimension
 * for text that mentions none of them
 */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  const counts = KEYWORDS.map(keyword => lower.split(keyword).length - 1);
  const matched = counts.some(count => count > 0);
  return [...counts, matched ? 0 : 1];
}

export const words = (count: number, prefix: string = 'w'): string =>
  Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(' ');

// ============================================================================
// Fake API
// ============================================================================

export interface FakeUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface FakeApiState {
  answer: string;
  usage: FakeUsage | null;
  embeddingStatus: number;
  chatStatus: number;
  hangEmbeddings: boolean;
  hangChat: boolean;

  /** Embedding inputs containing this text fail with 500 */
  failInputsContaining: string | null;
}

const EmbeddingRequestSchema = z.object({ model: z.string(), input: z.string() });

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function sseResponse(events: readonly object[]): Response {
  const body = events.map(event => `data: ${JSON.stringify(event)}\n\n`).join('') + 'data: [DONE]\n\n';
  return new Response(body, {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

/**
 * Stream events for `answer`, split in two deltas, then finish and usage
 */
export function chatEvents(answer: string, usage: FakeUsage | null): object[] {
  const events: object[] = [answer.slice(0, 4), answer.slice(4)]
    .filter(part => part.length > 0)
    .map(part => ({ choices: [{ delta: { content: part }, finish_reason: null }] }));

  events.push({ choices: [{ delta: {}, finish_reason: 'stop' }] });
  if (usage) {
    events.push({ choices: [], usage });
  }
  return events;
}

/** Never settles until the request's signal fires */
export function waitForAbort(signal: AbortSignal | null | undefined): Promise<Response> {
  return new Promise<Response>((_, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')), { once: true });
  });
}

export function createFakeApi(initial: Partial<FakeApiState> = {}) {
  const state: FakeApiState = {
    answer: 'Alex has used TypeScript and React.',
    usage: { prompt_tokens: 100, completion_tokens: 50, total_tokens: 150 },
    embeddingStatus: 200,
    chatStatus: 200,
    hangEmbeddings: false,
    hangChat: false,
    failInputsContaining: null,
    ...initial,
  };

  const fetch = jest.fn<Promise<Response>, [string, RequestInit]>(async (url, init) => {
    if (url.endsWith('/embeddings')) {
      if (state.hangEmbeddings) return waitForAbort(init.signal);

      const { input } = EmbeddingRequestSchema.parse(JSON.parse(String(init.body)));
      if (state.embeddingStatus !== 200) {
        return new Response('upstream failure', { status: state.embeddingStatus });
      }
      if (state.failInputsContaining !== null && input.includes(state.failInputsContaining)) {
        return new Response('upstream failure', { status: 500 });
      }
      return jsonResponse({ data: [{ embedding: keywordVector(input) }] });
    }

    if (url.endsWith('/chat/completions')) {
      if (state.hangChat) return waitForAbort(init.signal);
      if (state.chatStatus !== 200) {
        return new Response('upstream failure', { status: state.chatStatus });
      }
      return sseResponse(chatEvents(state.answer, state.usage));
    }

    return new Response('not found', { status: 404 });
  });

  const callsTo = (suffix: string): number =>
    fetch.mock.calls.filter(([url]) => url.endsWith(suffix)).length;

  return { fetch, state, callsTo };
}

export type FakeApi = ReturnType<typeof createFakeApi>;

// ============================================================================
// Wiring
// ============================================================================

export const silentLogger: Logger = {
  info: () => undefined,
  debug: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function testConfig(overrides: RAGConfigOverrides = {}): RAGConfigOverrides {
  return {
    apiKey: 'test-secret',
    baseUrl: 'https://api.test/v1',
    dataDir: '/data',
    tokenizer: 'simple',
    quiet: true,
    retry: { maxRetries: 0, initialDelayMs: 0 },
    ...overrides,
  };
}

export function createTestService(
  overrides: RAGConfigOverrides = {},
  api: FakeApi = createFakeApi(),
  now?: () => number
) {
  const fs = new InMemoryFileSystem();
  const service = new PortfolioRAGService(testConfig(overrides), {
    fs,
    fetch: api.fetch,
    tokenizer: new SimpleTokenizer(),
    logger: silentLogger,
    now,
  });
  return { service, fs, api };
}

export function makeChunk(
  id: string,
  content: string,
  options: { sourceType?: SourceType; sourceTitle?: string; embeddingVector?: number[]; createdAt?: string } = {}
): Chunk {
  const createdAt = options.createdAt ?? '2026-01-01T00:00:00.000Z';
  return {
    id,
    content,
    sourceType: options.sourceType ?? 'project',
    sourceId: `source-${id}`,
    sourceTitle: options.sourceTitle ?? 'Portfolio Site',
    chunkIndex: 0,
    embeddingVector: options.embeddingVector ?? [1, 0],
    tokenCount: content.split(' ').length,
    metadata: {},
    isActive: true,
    createdAt,
    updatedAt: createdAt,
  };
}

/**
 * Silence console output from components under test
 */
export function muteConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
