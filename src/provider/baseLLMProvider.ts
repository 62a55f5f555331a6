/**
 * Base LLM Provider
 * Abstract class with common functionality for all LLM providers
 */

import {
    LLMProvider,
    LLMProviderConfig,
    LLMProviderType,
    ChatMessage,
    ChatCompletionOptions,
    ChatCompletionResponse,
} from '../types/llm';
import { GenerationUnavailableError } from '../lib/errors';
import helpers from '../lib/helpers';

export abstract class BaseLLMProvider implements LLMProvider {
    abstract readonly name: LLMProviderType;

    constructor(protected readonly config: LLMProviderConfig) {}

    get defaultModel(): string {
        return this.config.defaultModel;
    }

    abstract complete(
        messages: ChatMessage[],
        options?: ChatCompletionOptions
    ): Promise<ChatCompletionResponse>;

    protected unavailable(
        message: string,
        reason: string,
        retryable: boolean,
        cause?: unknown
    ): GenerationUnavailableError {
        return new GenerationUnavailableError({
            message,
            provider: this.name,
            reason,
            retryable,
            cause,
        });
    }

    /**
     * POST a JSON body and return the parsed JSON reply within the timeout
     */
    protected async postJson(url: string, init: RequestInit): Promise<unknown> {
        const controller = new AbortController();
        const timeoutId = setTimeout(
            () => controller.abort(),
            this.config.timeoutMs
        );

        try {
            const response = await fetch(url, {
                ...init,
                method: 'POST',
                signal: controller.signal,
            });

            if (!response.ok) {
                throw await this.errorFromResponse(response);
            }

            return await response.json();
        } catch (error) {
            if (error instanceof GenerationUnavailableError) {
                throw error;
            }
            if (error instanceof Error && error.name === 'AbortError') {
                throw this.unavailable(
                    `[${this.name}] Request timed out after ${this.config.timeoutMs}ms`,
                    'TIMEOUT',
                    true,
                    error
                );
            }
            throw this.unavailable(
                `[${this.name}] Request failed: ${helpers.errorMessage(error)}`,
                'NETWORK_ERROR',
                true,
                error
            );
        } finally {
            clearTimeout(timeoutId);
        }
    }

    protected async errorFromResponse(
        response: Response
    ): Promise<GenerationUnavailableError> {
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
     * Get default model
     */
    protected getModel(options?: ChatCompletionOptions): string {
        return options?.model || this.config.defaultModel;
    }
}
