/**
 * Embedding Provider Factory
 * Creates the appropriate provider based on configuration
 */

import env from '../config/env';
import { EmbeddingUnavailableError } from '../lib/errors';
import {
    AnyEmbeddingProviderConfig,
    EmbeddingProvider,
} from '../types/embedding';
import {
    OllamaEmbeddingProvider,
    defaultOllamaConfig,
} from './ollamaEmbeddingProvider';
import {
    OpenAIEmbeddingProvider,
    defaultOpenAIConfig,
} from './openaiEmbeddingProvider';

export class EmbeddingProviderFactory {
    /**
     * Create a provider instance from config
     */
    static create(config: AnyEmbeddingProviderConfig): EmbeddingProvider {
        switch (config.provider) {
            case 'ollama':
                return new OllamaEmbeddingProvider(config);

            case 'openai':
                if (!config.apiKey) {
                    throw new EmbeddingUnavailableError({
                        message:
                            'OPENAI_API_KEY environment variable is required for OpenAI provider',
                        provider: 'factory',
                        reason: 'MISSING_API_KEY',
                        retryable: false,
                    });
                }
                return new OpenAIEmbeddingProvider(config);
        }
    }

    /**
     * Create provider from EMBEDDING_PROVIDER
     */
    static createFromEnv(): EmbeddingProvider {
        return env.EMBEDDING_PROVIDER === 'ollama'
            ? this.create(defaultOllamaConfig)
            : this.create(defaultOpenAIConfig);
    }
}
