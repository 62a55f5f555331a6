/**
 * RAG Service
 * Answers a question from the chunks most similar to it
 */

import { IndexedChunk } from '../../types/chunk';
import { ChatMessage } from '../../types/llm';
import { InvalidQueryError } from '../errors';
import { ddl } from '../dd';
import {
    EmbeddingService,
    MAX_EMBEDDING_INPUT_LENGTH,
} from './embeddingService';
import { LLMService } from './LLMService';
import { ScoredChunk, VectorIndex } from './vectorIndex';
import {
    CONTEXT_SEPARATOR,
    SYSTEM_PROMPT,
    buildUserPrompt,
    formatContextBlock,
} from './prompts';

export type Citation = IndexedChunk & { relevanceScore: number };

export interface RAGAnswer {
    question: string;
    answer: string;
    citations: Citation[];
    model: string;
}

export interface RAGContext {
    content: string;
    citations: Citation[];
}

export interface RAGServiceOptions {
    /**
     * Context budget; 1 token ≈ 4 characters
     */
    maxContextTokens: number;
    separator?: string;
}

export class RAGService {
    private readonly separator: string;

    constructor(
        private readonly embeddingService: EmbeddingService,
        private readonly index: VectorIndex,
        private readonly llmService: LLMService,
        private readonly options: RAGServiceOptions
    ) {
        this.separator = options.separator ?? CONTEXT_SEPARATOR;
    }

    async answer(question: string, maxResults = 5): Promise<RAGAnswer> {
        const trimmed = question.trim();
        if (!trimmed) {
            throw new InvalidQueryError('Question must not be empty');
        }
        if (trimmed.length > MAX_EMBEDDING_INPUT_LENGTH) {
            throw new InvalidQueryError(
                `Question must be at most ${MAX_EMBEDDING_INPUT_LENGTH} characters`
            );
        }
        if (!Number.isInteger(maxResults) || maxResults < 1) {
            throw new InvalidQueryError(
                `maxResults must be a positive integer, got ${maxResults}`
            );
        }

        const results = await this.search(trimmed, maxResults);
        const context = this.buildContext(results);

        const messages: ChatMessage[] = [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildUserPrompt(trimmed, context.content) },
        ];

        const completion = await this.llmService.complete(messages);

        return {
            question: trimmed,
            answer: completion.content,
            citations: context.citations,
            model: completion.model,
        };
    }

    /**
     * Embed the query and return the top-k chunks, best first
     */
    async search(query: string, k: number): Promise<ScoredChunk[]> {
        const startTime = Date.now();
        const queryVector = await this.embeddingService.embedOne(query);
        const results = this.index.search(queryVector, k);

        ddl(
            `search (k=${k}) ->`,
            `${results.length} chunks in ${Date.now() - startTime}ms`
        );

        return results;
    }

    /**
     * Labelled context blocks in score order, cut at the token budget
     */
    buildContext(results: ScoredChunk[]): RAGContext {
        // Rough estimate: 1 token ≈ 4 characters
        const maxChars = this.options.maxContextTokens * 4;

        let totalChars = 0;
        const blocks: string[] = [];
        const citations: Citation[] = [];

        for (const { chunk, score } of results) {
            const block = formatContextBlock(blocks.length + 1, chunk, score);
            const blockLength = block.length + this.separator.length;
            if (totalChars + blockLength > maxChars) {
                break;
            }
            blocks.push(block);
            citations.push({ ...chunk, relevanceScore: score });
            totalChars += blockLength;
        }

        return { content: blocks.join(this.separator), citations };
    }
}
