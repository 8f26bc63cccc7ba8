/**
 * Generation Client
 * Chat completions against an OpenAI-compatible API, streamed over SSE.
 */

import { TextDecoder } from 'util';
import { z } from 'zod';
import { RequestDeadline } from './cancellation';
import { estimateTokenCount } from './chunker';
import type { RAGConfig } from './config';
import { ConfigurationError, UpstreamError } from './errors';
import type { FetchLike } from './embeddings';
import { createLogger, type Logger } from './logger';
import { withRetry } from './retry';

// ============================================================================
// Types
// ============================================================================

export type GenerationConfig = Pick<
    RAGConfig,
    'apiKey' | 'baseUrl' | 'chatModel' | 'generationTimeoutMs' | 'retry' | 'quiet'
>;

export interface GenerationRequest {
    systemPrompt: string;
    userMessage: string;
    maxTokens: number;
    temperature: number;
    topP: number;
    signal?: AbortSignal;
}

export interface GenerationUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
}

export type GenerationDelta =
    | { type: 'text'; text: string }
    | { type: 'finish'; reason: string }
    | { type: 'usage'; usage: GenerationUsage };

export interface GenerationResult {
    text: string;
    tokensUsed: number;
    finishReason: string | null;
    model: string;

    /** False when the API sent no usage and tokensUsed is an estimate */
    usageReported: boolean;
}

// ============================================================================
// OpenAI stream chunk
// ============================================================================

const StreamChunkSchema = z.object({
    choices: z
        .array(
            z.object({
                delta: z.object({ content: z.string().nullish() }).partial().optional(),
                finish_reason: z.string().nullish(),
            })
        )
        .default([]),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            total_tokens: z.number(),
        })
        .nullish(),
});

type StreamChunk = z.infer<typeof StreamChunkSchema>;

// ============================================================================
// Generation Client
// ============================================================================

export class GenerationClient {
    private fetchImpl: FetchLike;
    private logger: Logger;

    constructor(
        private config: GenerationConfig,
        deps: { fetch?: FetchLike; logger?: Logger } = {}
    ) {
        this.fetchImpl = deps.fetch ?? ((url, init) => fetch(url, init));
        this.logger = deps.logger ?? createLogger('Generation', { quiet: config.quiet });
    }

    getModel(): string {
        return this.config.chatModel;
    }

    /**
     * Run a completion to the end and collect the text.
     * Throws ConfigurationError or UpstreamError.
     */
    async complete(request: GenerationRequest): Promise<GenerationResult> {
        return withRetry(() => this.collect(request), this.config.retry, {
            signal: request.signal,
            onRetry: (error, attempt, delayMs) =>
                this.logger.warn(`Retry ${attempt} in ${delayMs}ms: ${error.message}`),
        });
    }

    /**
     * Stream deltas as they arrive. Reading stops as soon as the request's
     * signal fires or the generation timeout passes.
     */
    async *stream(request: GenerationRequest): AsyncIterable<GenerationDelta> {
        if (!this.config.apiKey) {
            throw new ConfigurationError('Generation API key is not configured');
        }

        const deadline = new RequestDeadline(this.config.generationTimeoutMs, request.signal);

        try {
            let response: Response;
            try {
                response = await this.fetchImpl(`${this.config.baseUrl}/chat/completions`, {
                    method: 'POST',
                    headers: this.getHeaders(),
                    body: JSON.stringify(this.buildRequestBody(request)),
                    signal: deadline.signal,
                });
            } catch (error) {
                throw this.transportError(error, deadline);
            }

            if (!response.ok) {
                throw new UpstreamError(
                    `Generation request failed with status ${response.status}`,
                    'generation',
                    response.status
                );
            }
            if (!response.body) {
                throw new UpstreamError('Generation response had no body', 'generation', response.status);
            }

            try {
                yield* this.parseSSEStream(response.body, deadline.signal);
            } catch (error) {
                if (error instanceof UpstreamError) throw error;
                throw this.transportError(error, deadline);
            }
        } finally {
            deadline.dispose();
        }
    }

    // ============================================================================
    // Request Building
    // ============================================================================

    private buildRequestBody(request: GenerationRequest): object {
        return {
            model: this.config.chatModel,
            messages: [
                { role: 'system', content: request.systemPrompt },
                { role: 'user', content: request.userMessage },
            ],
            max_tokens: request.maxTokens,
            temperature: request.temperature,
            top_p: request.topP,
            stream: true,
            stream_options: { include_usage: true },
        };
    }

    private getHeaders(): Record<string, string> {
        return {
            'Content-Type': 'application/json',
            'Authorization': `Bearer ${this.config.apiKey}`,
        };
    }

    // ============================================================================
    // SSE Stream Parsing
    // ============================================================================

    private async *parseSSEStream(
        stream: NonNullable<Response['body']>,
        signal: AbortSignal
    ): AsyncIterable<GenerationDelta> {
        const reader = stream.getReader();
        const decoder = new TextDecoder();
        let buffer = '';

        const onAbort = () => {
            reader.cancel().catch((error: unknown) => this.logger.debug('Stream cancel failed', error));
        };
        signal.addEventListener('abort', onAbort, { once: true });

        // Set once the body has been read to its end
        let drained = false;

        try {
            while (!signal.aborted) {
                const { done, value } = await reader.read();
                if (done) {
                    drained = true;
                    break;
                }

                buffer += decoder.decode(value, { stream: true });
                const lines = buffer.split('\n');
                buffer = lines.pop() ?? '';

                for (const line of lines) {
                    const chunk = this.parseLine(line);
                    if (chunk === 'done') return;
                    if (chunk) yield* this.convertChunkToDeltas(chunk);
                }
            }

            if (signal.aborted) {
                throw new Error('Stream aborted');
            }

            const tail = this.parseLine(buffer);
            if (tail && tail !== 'done') yield* this.convertChunkToDeltas(tail);
        } finally {
            signal.removeEventListener('abort', onAbort);
            if (!drained && !signal.aborted) {
                // [DONE] arrived, or the consumer stopped early: close the connection
                await reader.cancel().catch((error: unknown) => this.logger.debug('Stream cancel failed', error));
            }
            reader.releaseLock();
        }
    }

    private parseLine(line: string): StreamChunk | 'done' | null {
        const trimmed = line.trim();
        if (!trimmed.startsWith('data:')) return null;

        const data = trimmed.slice(5).trim();
        if (data === '[DONE]') return 'done';

        let json: unknown;
        try {
            json = JSON.parse(data);
        } catch {
            this.logger.debug(`Skipping invalid SSE payload: ${data.slice(0, 100)}`);
            return null;
        }

        const parsed = StreamChunkSchema.safeParse(json);
        return parsed.success ? parsed.data : null;
    }

    private *convertChunkToDeltas(chunk: StreamChunk): Iterable<GenerationDelta> {
        const choice = chunk.choices[0];

        if (choice?.delta?.content) {
            yield { type: 'text', text: choice.delta.content };
        }
        if (choice?.finish_reason) {
            yield { type: 'finish', reason: choice.finish_reason };
        }
        if (chunk.usage) {
            yield {
                type: 'usage',
                usage: {
                    promptTokens: chunk.usage.prompt_tokens,
                    completionTokens: chunk.usage.completion_tokens,
                    totalTokens: chunk.usage.total_tokens,
                },
            };
        }
    }

    // ============================================================================
    // Helpers
    // ============================================================================

    private async collect(request: GenerationRequest): Promise<GenerationResult> {
        let text = '';
        let finishReason: string | null = null;
        let usage: GenerationUsage | null = null;

        for await (const delta of this.stream(request)) {
            switch (delta.type) {
                case 'text':
                    text += delta.text;
                    break;
                case 'finish':
                    finishReason = delta.reason;
                    break;
                case 'usage':
                    usage = delta.usage;
                    break;
            }
        }

        const tokensUsed =
            usage?.totalTokens ??
            Math.round(estimateTokenCount(`${request.systemPrompt} ${request.userMessage} ${text}`));

        return {
            text: text.trim(),
            tokensUsed,
            finishReason,
            model: this.config.chatModel,
            usageReported: usage !== null,
        };
    }

    private transportError(error: unknown, deadline: RequestDeadline): UpstreamError {
        if (deadline.timedOut) {
            return new UpstreamError(
                `Generation timed out after ${deadline.timeoutMs}ms`,
                'generation',
                undefined,
                { cause: error }
            );
        }
        if (deadline.cancelled) {
            return new UpstreamError('Generation was cancelled', 'generation', undefined, {
                cause: error,
                retryable: false,
            });
        }
        return new UpstreamError('Generation request failed', 'generation', undefined, { cause: error });
    }
}
