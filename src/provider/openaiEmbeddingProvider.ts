/**
 * OpenAI Embedding Provider
 * For production deployments using OpenAI's API
 */

import { z } from 'zod';
import env from '../config/env';
import { BaseEmbeddingProvider } from './baseEmbeddingProvider';
import { OpenAIConfig, EmbeddingResponse } from '../types/embedding';

const openAIEmbeddingResponseSchema = z.object({
    data: z.array(
        z.object({
            index: z.number().int().nonnegative(),
            embedding: z.array(z.number()),
        })
    ),
    model: z.string(),
    usage: z
        .object({
            prompt_tokens: z.number(),
            total_tokens: z.number(),
        })
        .optional(),
});

export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
    readonly name = 'openai';
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;

    constructor(config: OpenAIConfig) {
        super(config);
        this.apiKey = config.apiKey;
        this.baseUrl = (config.baseUrl || 'https://api.openai.com/v1').replace(
            /\/$/,
            ''
        );
        this.model = config.defaultModel;
    }

    /**
     * Generate embeddings for multiple texts
     * OpenAI natively supports batch embeddings
     */
    async embedBatch(texts: string[]): Promise<EmbeddingResponse> {
        if (texts.length === 0) {
            return this.emptyResponse();
        }

        // Process in chunks if exceeding max batch size
        if (texts.length > this.config.maxBatchSize) {
            return this.processBatches(texts, (batch) =>
                this.embedBatchInternal(batch)
            );
        }

        return this.embedBatchInternal(texts);
    }

    private async embedBatchInternal(
        texts: string[]
    ): Promise<EmbeddingResponse> {
        const body = await this.fetchJson(`${this.baseUrl}/embeddings`, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                Authorization: `Bearer ${this.apiKey}`,
            },
            body: JSON.stringify({
                model: this.model,
                input: texts,
                encoding_format: 'float',
            }),
        });

        const parsed = openAIEmbeddingResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw this.unavailable(
                '[openai] Malformed embedding response',
                'MALFORMED_RESPONSE',
                false,
                parsed.error
            );
        }

        const data = parsed.data;

        return {
            embeddings: data.data.map((item) => ({
                embedding: item.embedding,
                index: item.index,
            })),
            model: data.model,
            dimensions: data.data[0]?.embedding.length || this.config.dimensions,
            usage: data.usage && {
                promptTokens: data.usage.prompt_tokens,
                totalTokens: data.usage.total_tokens,
            },
        };
    }
}

/**
 * Default OpenAI config for production
 */
export const defaultOpenAIConfig: OpenAIConfig = {
    provider: 'openai',
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
    defaultModel: env.OPENAI_EMBEDDING_MODEL,
    dimensions: env.EMBEDDING_DIMENSIONS,
    maxBatchSize: 2048, // OpenAI supports up to 2048 texts per request
    timeoutMs: env.EMBEDDING_TIMEOUT_MS,
};
