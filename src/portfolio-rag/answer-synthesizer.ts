/**
 * Answer Synthesizer
 *
 * Packs ranked chunks into a bounded context window and asks the
 * generation model for an answer. Never throws: every failure comes back
 * as a fallback result carrying a fixed message.
 */

import { estimateTokenCount } from './chunker';
import type { RAGConfig } from './config';
import { ConfigurationError, toRagError } from './errors';
import type { GenerationClient } from './generation';
import { createLogger, type Logger } from './logger';
import { FALLBACK_MESSAGES, SYSTEM_PROMPT, contextInstruction, userMessage } from './prompts';
import { SOURCE_TYPE_LABELS, type Chunk, type ScoredChunk } from './types';

// =============================================================================
// Types
// =============================================================================

export type SynthesisConfig = Pick<
    RAGConfig,
    'maxContextTokens' | 'maxOutputTokens' | 'temperature' | 'topP' | 'quiet'
>;

export type SynthesisFailureReason = 'aborted' | 'upstream' | 'configuration' | 'no_context';

export type SynthesisResult =
    | { ok: true; answer: string; tokensUsed: number; chunkIdsUsed: string[]; model: string }
    | {
          ok: false;
          answer: string;
          tokensUsed: 0;
          chunkIdsUsed: string[];
          reason: SynthesisFailureReason;
      };

export interface BuiltContext {
    /** Instruction-wrapped context, ready for the user message */
    context: string;
    chunkIds: string[];
    estimatedTokens: number;
}

// =============================================================================
// Context Building
// =============================================================================

/**
 * `[Source: <label> - <title>]` followed by the chunk content
 */
export function formatSourceBlock(chunk: Chunk): string {
    let header = `[Source: ${SOURCE_TYPE_LABELS[chunk.sourceType]}`;
    if (chunk.sourceTitle) {
        header += ` - ${chunk.sourceTitle}`;
    }
    return `${header}]\n${chunk.content}\n`;
}

/**
 * Add blocks in rank order until the next one would push the estimate
 * over `maxTokens`.
 */
export function buildContext(ranked: readonly ScoredChunk[], maxTokens: number): BuiltContext {
    const blocks: string[] = [];
    const chunkIds: string[] = [];
    let total = 0;

    for (const { chunk } of ranked) {
        const tokens = estimateTokenCount(chunk.content);
        if (total + tokens > maxTokens) break;

        blocks.push(formatSourceBlock(chunk));
        chunkIds.push(chunk.id);
        total += tokens;
    }

    return {
        context: blocks.length > 0 ? contextInstruction(blocks.join('\n')) : '',
        chunkIds,
        estimatedTokens: total,
    };
}

// =============================================================================
// Synthesizer
// =============================================================================

export class AnswerSynthesizer {
    private logger: Logger;

    constructor(
        private generation: GenerationClient,
        private config: SynthesisConfig,
        logger?: Logger
    ) {
        this.logger = logger ?? createLogger('Synthesizer', { quiet: config.quiet });
    }

    async synthesize(
        question: string,
        ranked: readonly ScoredChunk[],
        signal?: AbortSignal
    ): Promise<SynthesisResult> {
        const built = buildContext(ranked, this.config.maxContextTokens);
        if (built.chunkIds.length === 0) {
            return this.fallback('no_context', built.chunkIds);
        }

        this.logger.debug(`Prepared context with ${built.chunkIds.length} chunks, ~${Math.round(built.estimatedTokens)} tokens`);

        try {
            const result = await this.generation.complete({
                systemPrompt: SYSTEM_PROMPT,
                userMessage: userMessage(built.context, question),
                maxTokens: this.config.maxOutputTokens,
                temperature: this.config.temperature,
                topP: this.config.topP,
                signal,
            });

            if (signal?.aborted) {
                return this.fallback('aborted', built.chunkIds);
            }
            if (result.text.length === 0) {
                this.logger.warn('Generation returned an empty answer');
                return this.fallback('upstream', built.chunkIds);
            }

            this.logger.info(`Generated answer using ${result.tokensUsed} tokens`);
            return {
                ok: true,
                answer: result.text,
                tokensUsed: result.tokensUsed,
                chunkIdsUsed: built.chunkIds,
                model: result.model,
            };
        } catch (error) {
            if (signal?.aborted) {
                return this.fallback('aborted', built.chunkIds);
            }

            const ragError = toRagError(error, 'generation');
            this.logger.error(`Generation failed: ${ragError.code} ${ragError.message}`);

            return this.fallback(
                ragError instanceof ConfigurationError ? 'configuration' : 'upstream',
                built.chunkIds
            );
        }
    }

    private fallback(reason: SynthesisFailureReason, chunkIdsUsed: string[]): SynthesisResult {
        return {
            ok: false,
            answer: fallbackMessage(reason),
            tokensUsed: 0,
            chunkIdsUsed,
            reason,
        };
    }
}

export function fallbackMessage(reason: SynthesisFailureReason): string {
    switch (reason) {
        case 'aborted':
            return FALLBACK_MESSAGES.aborted;
        case 'configuration':
            return FALLBACK_MESSAGES.serviceUnavailable;
        case 'no_context':
            return FALLBACK_MESSAGES.noContext;
        case 'upstream':
            return FALLBACK_MESSAGES.generationFailed;
    }
}
