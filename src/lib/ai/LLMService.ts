/**
 * LLM Service
 * High-level service for chat completions
 */

import {
    LLMProvider,
    ChatMessage,
    ChatCompletionOptions,
    ChatCompletionResponse,
} from '../../types/llm';
import { GenerationUnavailableError } from '../errors';
import helpers from '../helpers';
import { ddl } from '../dd';

export interface LLMServiceDefaults {
    temperature: number;
    maxTokens: number;
}

// ============================================
// LLM Service
// ============================================

export class LLMService {
    constructor(
        private readonly provider: LLMProvider,
        private readonly defaults: LLMServiceDefaults
    ) {}

    get providerName(): string {
        return this.provider.name;
    }

    get model(): string {
        return this.provider.defaultModel;
    }

    /**
     * Single-turn completion; failures surface as GenerationUnavailableError
     */
    async complete(
        messages: ChatMessage[],
        options: ChatCompletionOptions = {}
    ): Promise<ChatCompletionResponse> {
        const startTime = Date.now();

        try {
            const response = await this.provider.complete(messages, {
                ...options,
                temperature: options.temperature ?? this.defaults.temperature,
                maxTokens: options.maxTokens ?? this.defaults.maxTokens,
            });

            ddl(
                `llm completion (${this.provider.name}/${response.model}) ->`,
                `${response.usage.totalTokens} tokens in ${Date.now() - startTime}ms`
            );

            return response;
        } catch (error) {
            if (error instanceof GenerationUnavailableError) {
                throw error;
            }
            throw new GenerationUnavailableError({
                message: `Generation failed: ${helpers.errorMessage(error)}`,
                provider: this.provider.name,
                reason: 'PROVIDER_ERROR',
                retryable: false,
                cause: error,
            });
        }
    }
}
