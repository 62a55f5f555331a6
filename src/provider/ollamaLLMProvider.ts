/**
 * Ollama LLM Provider
 * For local models (llama3.1, mistral, ...) served by Ollama
 */

import { z } from 'zod';
import env from '../config/env';
import { BaseLLMProvider } from './baseLLMProvider';
import {
    OllamaLLMConfig,
    ChatMessage,
    ChatCompletionOptions,
    ChatCompletionResponse,
} from '../types/llm';

const ollamaChatResponseSchema = z.object({
    model: z.string(),
    message: z
        .object({
            content: z.string(),
        })
        .optional(),
    done_reason: z.string().optional(),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
});

// ============================================
// Provider Implementation
// ============================================

export class OllamaLLMProvider extends BaseLLMProvider {
    readonly name = 'ollama' as const;
    private readonly baseUrl: string;

    constructor(config: OllamaLLMConfig) {
        super(config);
        this.baseUrl = config.baseUrl.replace(/\/$/, '');
    }

    /**
     * Generate a chat completion
     */
    async complete(
        messages: ChatMessage[],
        options?: ChatCompletionOptions
    ): Promise<ChatCompletionResponse> {
        const body = await this.postJson(`${this.baseUrl}/api/chat`, {
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(this.buildRequestBody(messages, options)),
        });

        const parsed = ollamaChatResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw this.unavailable(
                '[ollama] Malformed chat response',
                'MALFORMED_RESPONSE',
                false,
                parsed.error
            );
        }

        const data = parsed.data;

        return {
            content: data.message?.content || '',
            model: data.model,
            finishReason: this.mapFinishReason(data.done_reason),
            usage: {
                promptTokens: data.prompt_eval_count || 0,
                completionTokens: data.eval_count || 0,
                totalTokens:
                    (data.prompt_eval_count || 0) + (data.eval_count || 0),
            },
        };
    }

    private buildRequestBody(
        messages: ChatMessage[],
        options?: ChatCompletionOptions
    ): Record<string, unknown> {
        const body: Record<string, unknown> = {
            model: this.getModel(options),
            messages,
            stream: false,
        };

        const ollamaOptions: Record<string, unknown> = {};

        if (options?.temperature !== undefined) {
            ollamaOptions.temperature = options.temperature;
        }

        if (options?.maxTokens !== undefined) {
            ollamaOptions.num_predict = options.maxTokens;
        }

        if (Object.keys(ollamaOptions).length > 0) {
            body.options = ollamaOptions;
        }

        return body;
    }

    private mapFinishReason(
        reason?: string
    ): 'stop' | 'length' | null {
        switch (reason) {
            case 'stop':
                return 'stop';
            case 'length':
                return 'length';
            default:
                return null;
        }
    }
}

/**
 * Default Ollama LLM config for local development
 */
export const defaultOllamaLLMConfig: OllamaLLMConfig = {
    provider: 'ollama',
    baseUrl: env.OLLAMA_BASE_URL,
    defaultModel: env.OLLAMA_LLM_MODEL,
    timeoutMs: env.LLM_TIMEOUT_MS,
};
