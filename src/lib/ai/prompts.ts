import { IndexedChunk } from '../../types/chunk';

export const NO_ANSWER =
    "I don't have any relevant information to answer this question.";

export const EMPTY_CONTEXT_PLACEHOLDER =
    'No relevant context was found in the knowledge base.';

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

export const SYSTEM_PROMPT = [
    'You are a helpful assistant that answers questions using only the context provided from the user\'s knowledge base.',
    'Do not use outside knowledge and do not state facts the context does not support.',
    'When you use a source, refer to it by its label, for example [Source 1].',
    `If the context is empty or does not contain the answer, reply with exactly: "${NO_ANSWER}"`,
].join('\n');

/**
 * One labelled context block, e.g. "[Source 1] note (relevance: 0.83)"
 */
export function formatContextBlock(
    position: number,
    chunk: IndexedChunk,
    score: number
): string {
    const origin =
        chunk.source.kind === 'url' ? `url ${chunk.source.originUrl}` : 'note';
    return `[Source ${position}] ${origin} (relevance: ${score.toFixed(2)})\n${chunk.text}`;
}

export function buildUserPrompt(question: string, context: string): string {
    return `Context:\n${context || EMPTY_CONTEXT_PLACEHOLDER}\n\nQuestion: ${question}`;
}
