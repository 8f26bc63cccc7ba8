/**
 * Prompt templates for answer synthesis
 */

export const SYSTEM_PROMPT = `You are an AI assistant representing a developer's portfolio. Your role is to answer questions about the developer's skills, experience, and projects based on the provided context.

Guidelines:
- Answer based only on the information provided in the context
- Be helpful, professional, and accurate
- If you don't have enough information, say so clearly
- Highlight relevant skills, experience, and achievements
- Keep responses concise but informative
- Use a friendly, professional tone`;

export function contextInstruction(blocks: string): string {
    return `Based on the following information about the developer's portfolio:

${blocks}

Please answer the following question using only the information provided above. If the information doesn't contain enough detail to answer the question, please say so.`;
}

export function userMessage(context: string, question: string): string {
    return `${context}\n\nQuestion: ${question}`;
}

// ============================================================================
// Fixed user-facing messages
// ============================================================================

export const FALLBACK_MESSAGES = {
    noContext: "I couldn't find relevant information to answer your question.",
    generationFailed: "I'm sorry, I encountered an error while generating a response. Please try again.",
    serviceUnavailable: "I'm sorry, but the AI service is not available at the moment. Please try again later.",
    processingFailed: "I'm sorry, I encountered an error while processing your question. Please try again.",
    timeout: "I'm taking a bit longer to process your question. Please try again or rephrase your question.",
    aborted: 'The request was cancelled before an answer was generated.',
} as const;
