/**
 * Base Embedding Provider
 * Abstract class with common functionality for all providers
 *
 * Providers never retry: every failure becomes an EmbeddingUnavailableError
 * and retry policy is left to the caller.
 */

import {
    EmbeddingProvider,
    EmbeddingProviderConfig,
    EmbeddingResponse,
} from '../types/embedding';
import { EmbeddingUnavailableError } from '../lib/errors';
import helpers from '../lib/helpers';

export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
    abstract readonly name: string;

    constructor(protected readonly config: EmbeddingProviderConfig) {}

    get dimensions(): number {
        return this.config.dimensions;
    }

    abstract embedBatch(texts: string[]): Promise<EmbeddingResponse>;

    protected unavailable(
        message: string,
        reason: string,
        retryable: boolean,
        cause?: unknown
    ): EmbeddingUnavailableError {
        return new EmbeddingUnavailableError({
            message,
            provider: this.name,
            reason,
            retryable,
            cause,
        });
    }

    /**
     * Fetch with timeout wrapper; the body is read inside the time limit
     */
    protected async fetchJson(url: string, options: RequestInit): Promise<unknown> {
        const controller = new AbortController();
        const timeoutId = setTimeout(
            () => controller.abort(),
            this.config.timeoutMs
        );

        try {
            const response = await fetch(url, {
                ...options,
                signal: controller.signal,
            });

            if (!response.ok) {
                throw await this.errorFromResponse(response);
            }

            return await response.json();
        } catch (error) {
            if (error instanceof EmbeddingUnavailableError) {
                throw error;
            }
            if (error instanceof Error && error.name === 'AbortError') {
                throw this.unavailable(
                    `[${this.name}] Embedding request timed out after ${this.config.timeoutMs}ms`,
                    'TIMEOUT',
                    true,
                    error
                );
            }
            throw this.unavailable(
                `[${this.name}] Embedding request failed: ${helpers.errorMessage(error)}`,
                'NETWORK_ERROR',
                true,
                error
            );
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Map a non-2xx response to a typed failure
     */
    protected async errorFromResponse(
        response: Response
    ): Promise<EmbeddingUnavailableError> {
        const errorText = await response.text().catch(() => '');
        const detail = errorText ? ` - ${errorText.slice(0, 500)}` : '';

        if (response.status === 429) {
            return this.unavailable(
                `[${this.name}] Rate limit exceeded${detail}`,
                'RATE_LIMIT',
                true
            );
        }

        if (response.status === 401 || response.status === 403) {
            return this.unavailable(
                `[${this.name}] Authentication error${detail}`,
                'AUTH_ERROR',
                false
            );
        }

        return this.unavailable(
            `[${this.name}] API error: ${response.status}${detail}`,
            `HTTP_${response.status}`,
            response.status >= 500
        );
    }

    /**
     * Process batch in chunks respecting maxBatchSize
     */
    protected async processBatches(
        texts: string[],
        processor: (batch: string[]) => Promise<EmbeddingResponse>
    ): Promise<EmbeddingResponse> {
        const results: EmbeddingResponse[] = [];

        for (let i = 0; i < texts.length; i += this.config.maxBatchSize) {
            results.push(
                await processor(texts.slice(i, i + this.config.maxBatchSize))
            );
        }

        return this.mergeResponses(results);
    }

    /**
     * Merge batch responses, shifting each batch's indices by its offset
     */
    protected mergeResponses(responses: EmbeddingResponse[]): EmbeddingResponse {
        if (responses.length === 1) {
            return responses[0];
        }

        let offset = 0;
        const embeddings = responses.flatMap((response) => {
            const shifted = response.embeddings.map((e) => ({
                ...e,
                index: e.index + offset,
            }));
            offset += response.embeddings.length;
            return shifted;
        });

        const usage = responses.reduce(
            (acc, r) => ({
                promptTokens: acc.promptTokens + (r.usage?.promptTokens || 0),
                totalTokens: acc.totalTokens + (r.usage?.totalTokens || 0),
            }),
            { promptTokens: 0, totalTokens: 0 }
        );

        return {
            embeddings,
            model: responses[0]?.model ?? this.config.defaultModel,
            dimensions: responses[0]?.dimensions ?? this.config.dimensions,
            usage,
        };
    }

    protected emptyResponse(): EmbeddingResponse {
        return {
            embeddings: [],
            model: this.config.defaultModel,
            dimensions: this.config.dimensions,
        };
    }
}
