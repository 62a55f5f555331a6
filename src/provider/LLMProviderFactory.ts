/**
 * LLM Provider Factory
 * Creates the appropriate LLM provider based on configuration
 */

import env from '../config/env';
import { GenerationUnavailableError } from '../lib/errors';
import { AnyLLMProviderConfig, LLMProvider } from '../types/llm';
import { OpenAILLMProvider, defaultOpenAILLMConfig } from './openaiLLMProvider';
import { OllamaLLMProvider, defaultOllamaLLMConfig } from './ollamaLLMProvider';

export class LLMProviderFactory {
    /**
     * Create a provider instance from config
     */
    static create(config: AnyLLMProviderConfig): LLMProvider {
        switch (config.provider) {
            case 'openai':
                if (!config.apiKey) {
                    throw new GenerationUnavailableError({
                        message: 'OPENAI_API_KEY is required for OpenAI provider',
                        provider: 'factory',
                        reason: 'MISSING_API_KEY',
                        retryable: false,
                    });
                }
                return new OpenAILLMProvider(config);

            case 'ollama':
                // Ollama doesn't need API key
                return new OllamaLLMProvider(config);
        }
    }

    /**
     * Create provider from LLM_PROVIDER
     */
    static createFromEnv(): LLMProvider {
        return env.LLM_PROVIDER === 'ollama'
            ? this.create(defaultOllamaLLMConfig)
            : this.create(defaultOpenAILLMConfig);
    }
}
