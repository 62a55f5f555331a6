/**
 * OpenAI LLM Provider
 * Supports GPT-4o, GPT-4o-mini and compatible chat completion APIs
 */

import { z } from 'zod';
import env from '../config/env';
import { BaseLLMProvider } from './baseLLMProvider';
import {
    OpenAILLMConfig,
    ChatMessage,
    ChatCompletionOptions,
    ChatCompletionResponse,
} from '../types/llm';

const openAIChatResponseSchema = z.object({
    model: z.string(),
    choices: z.array(
        z.object({
            message: z.object({
                content: z.string().nullable(),
            }),
            finish_reason: z.string().nullable(),
        })
    ),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            total_tokens: z.number(),
        })
        .optional(),
});

export class OpenAILLMProvider extends BaseLLMProvider {
    readonly name = 'openai' as const;
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly organization?: string;

    constructor(config: OpenAILLMConfig) {
        super(config);
        this.apiKey = config.apiKey;
        this.baseUrl = (config.baseUrl || 'https://api.openai.com/v1').replace(
            /\/$/,
            ''
        );
        this.organization = config.organization;
    }

    /**
     * Generate a chat completion
     */
    async complete(
        messages: ChatMessage[],
        options?: ChatCompletionOptions
    ): Promise<ChatCompletionResponse> {
        const body = await this.postJson(`${this.baseUrl}/chat/completions`, {
            headers: this.getHeaders(),
            body: JSON.stringify(this.buildRequestBody(messages, options)),
        });

        const parsed = openAIChatResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw this.unavailable(
                '[openai] Malformed chat completion response',
                'MALFORMED_RESPONSE',
                false,
                parsed.error
            );
        }

        const data = parsed.data;
        const choice = data.choices[0];

        return {
            content: choice?.message.content ?? '',
            model: data.model,
            finishReason: this.mapFinishReason(choice?.finish_reason),
            usage: {
                promptTokens: data.usage?.prompt_tokens || 0,
                completionTokens: data.usage?.completion_tokens || 0,
                totalTokens: data.usage?.total_tokens || 0,
            },
        };
    }

    private getHeaders(): Record<string, string> {
        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiKey}`,
        };

        if (this.organization) {
            headers['OpenAI-Organization'] = this.organization;
        }

        return headers;
    }

    private buildRequestBody(
        messages: ChatMessage[],
        options?: ChatCompletionOptions
    ): Record<string, unknown> {
        const body: Record<string, unknown> = {
            model: this.getModel(options),
            messages: messages.map(({ role, content }) => ({ role, content })),
            stream: false,
        };

        if (options?.temperature !== undefined) {
            body.temperature = options.temperature;
        }

        if (options?.maxTokens !== undefined) {
            body.max_tokens = options.maxTokens;
        }

        return body;
    }

    private mapFinishReason(
        reason: string | null | undefined
    ): ChatCompletionResponse['finishReason'] {
        switch (reason) {
            case 'stop':
            case 'length':
            case 'content_filter':
                return reason;
            default:
                return null;
        }
    }
}

/**
 * Default OpenAI LLM config
 */
export const defaultOpenAILLMConfig: OpenAILLMConfig = {
    provider: 'openai',
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
    defaultModel: env.OPENAI_LLM_MODEL,
    timeoutMs: env.LLM_TIMEOUT_MS,
};
