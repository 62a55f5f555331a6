/**
 * Embedding Service
 * High-level service for generating embeddings with provider abstraction
 */

import { EmbeddingProvider } from '../../types/embedding';
import { EmbeddingUnavailableError } from '../errors';
import helpers from '../helpers';

/**
 * Longest input sent to a provider, in characters
 */
export const MAX_EMBEDDING_INPUT_LENGTH = 8000;

export class EmbeddingService {
    constructor(private readonly provider: EmbeddingProvider) {}

    /**
     * Get the provider name
     */
    get providerName(): string {
        return this.provider.name;
    }

    /**
     * Get embedding dimensions for this provider
     */
    get dimensions(): number {
        return this.provider.dimensions;
    }

    /**
     * Embed texts in one provider call; the i-th vector belongs to texts[i].
     * Any provider failure surfaces as EmbeddingUnavailableError.
     */
    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const inputs = texts.map((text) => this.normalizeText(text) || text);

        try {
            const response = await this.provider.embedBatch(inputs);

            if (response.embeddings.length !== texts.length) {
                throw new EmbeddingUnavailableError({
                    message: `Provider returned ${response.embeddings.length} embeddings for ${texts.length} texts`,
                    provider: this.provider.name,
                    reason: 'INCOMPLETE_RESPONSE',
                    retryable: true,
                });
            }

            const ordered = [...response.embeddings].sort(
                (a, b) => a.index - b.index
            );
            if (ordered.some((result, position) => result.index !== position)) {
                throw new EmbeddingUnavailableError({
                    message: `Provider returned indices [${ordered.map((r) => r.index).join(', ')}] for ${texts.length} texts`,
                    provider: this.provider.name,
                    reason: 'INCOMPLETE_RESPONSE',
                    retryable: true,
                });
            }

            return ordered.map((result) => result.embedding);
        } catch (error) {
            if (error instanceof EmbeddingUnavailableError) {
                throw error;
            }
            throw new EmbeddingUnavailableError({
                message: `Embedding failed: ${helpers.errorMessage(error)}`,
                provider: this.provider.name,
                reason: 'PROVIDER_ERROR',
                retryable: false,
                cause: error,
            });
        }
    }

    /**
     * Generate embedding for a single text
     */
    async embedOne(text: string): Promise<number[]> {
        const [embedding] = await this.embed([text]);
        return embedding;
    }

    /**
     * Normalize text before embedding
     */
    private normalizeText(text: string): string {
        return text
            .trim()
            .replace(/\s+/g, ' ') // Collapse whitespace
            .slice(0, MAX_EMBEDDING_INPUT_LENGTH);
    }
}
