/**
 * Ollama Embedding Provider
 * For local development and self-hosted deployments
 */

import { z } from 'zod';
import env from '../config/env';
import { BaseEmbeddingProvider } from './baseEmbeddingProvider';
import { OllamaConfig, EmbeddingResponse } from '../types/embedding';

const ollamaEmbedResponseSchema = z.object({
    model: z.string().optional(),
    embeddings: z.array(z.array(z.number())),
    prompt_eval_count: z.number().optional(),
});

export class OllamaEmbeddingProvider extends BaseEmbeddingProvider {
    readonly name = 'ollama';
    private readonly baseUrl: string;
    private readonly model: string;

    constructor(config: OllamaConfig) {
        super(config);
        this.baseUrl = config.baseUrl.replace(/\/$/, ''); // Remove trailing slash
        this.model = config.defaultModel;
    }

    async embedBatch(texts: string[]): Promise<EmbeddingResponse> {
        if (texts.length === 0) {
            return this.emptyResponse();
        }

        if (texts.length > this.config.maxBatchSize) {
            return this.processBatches(texts, (batch) =>
                this.embedBatchNative(batch)
            );
        }

        return this.embedBatchNative(texts);
    }

    /**
     * Native batch embedding (Ollama v0.1.44+)
     */
    private async embedBatchNative(
        texts: string[]
    ): Promise<EmbeddingResponse> {
        const body = await this.fetchJson(`${this.baseUrl}/api/embed`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({
                model: this.model,
                input: texts,
            }),
        });

        const parsed = ollamaEmbedResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw this.unavailable(
                '[ollama] Malformed embedding response',
                'MALFORMED_RESPONSE',
                false,
                parsed.error
            );
        }

        const { embeddings, prompt_eval_count } = parsed.data;

        return {
            embeddings: embeddings.map((embedding, index) => ({
                embedding,
                index,
            })),
            model: parsed.data.model ?? this.model,
            dimensions: embeddings[0]?.length || this.config.dimensions,
            usage:
                prompt_eval_count === undefined
                    ? undefined
                    : {
                          promptTokens: prompt_eval_count,
                          totalTokens: prompt_eval_count,
                      },
        };
    }
}

/**
 * Default Ollama config for local development
 */
export const defaultOllamaConfig: OllamaConfig = {
    provider: 'ollama',
    baseUrl: env.OLLAMA_BASE_URL,
    defaultModel: env.OLLAMA_EMBEDDING_MODEL,
    dimensions: env.EMBEDDING_DIMENSIONS,
    maxBatchSize: 64,
    timeoutMs: env.EMBEDDING_TIMEOUT_MS,
};
