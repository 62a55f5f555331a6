/**
 * Embedding Gateway Types
 * Contracts for embedding providers
 */

export type EmbeddingProviderType = 'openai' | 'ollama';

export interface EmbeddingResult {
    embedding: number[];
    index: number;
}

export interface EmbeddingResponse {
    embeddings: EmbeddingResult[];
    model: string;
    dimensions: number;
    usage?: {
        promptTokens: number;
        totalTokens: number;
    };
}

export interface EmbeddingProviderConfig {
    provider: EmbeddingProviderType;
    apiKey?: string;
    baseUrl?: string;
    defaultModel: string;
    dimensions: number;
    maxBatchSize: number;
    timeoutMs: number;
}

export interface OllamaConfig extends EmbeddingProviderConfig {
    provider: 'ollama';
    baseUrl: string; // e.g. 'http://localhost:11434'
}

export interface OpenAIConfig extends EmbeddingProviderConfig {
    provider: 'openai';
    apiKey: string;
    baseUrl?: string; // defaults to OpenAI API
}

export interface EmbeddingProvider {
    readonly name: string;
    readonly dimensions: number;

    /**
     * Embed a batch of texts; `index` in the response points back into `texts`
     */
    embedBatch(texts: string[]): Promise<EmbeddingResponse>;
}

export type AnyEmbeddingProviderConfig = OpenAIConfig | OllamaConfig;
