/**
 * LLM Service Types
 * Defines contracts for LLM providers and service interfaces
 */

// ============================================
// Provider Configuration
// ============================================

export type LLMProviderType = 'openai' | 'ollama';

export interface LLMProviderConfig {
    provider: LLMProviderType;
    apiKey?: string;
    baseUrl?: string;
    defaultModel: string;
    timeoutMs: number;
}

export interface OpenAILLMConfig extends LLMProviderConfig {
    provider: 'openai';
    apiKey: string;
    organization?: string;
}

export interface OllamaLLMConfig extends LLMProviderConfig {
    provider: 'ollama';
    baseUrl: string;
}

export type AnyLLMProviderConfig = OpenAILLMConfig | OllamaLLMConfig;

// ============================================
// Message Types
// ============================================

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
    role: MessageRole;
    content: string;
}

export interface ChatCompletionOptions {
    /**
     * Model to use (overrides default)
     */
    model?: string;

    /**
     * Temperature (0-2)
     */
    temperature?: number;

    /**
     * Maximum tokens to generate
     */
    maxTokens?: number;
}

// ============================================
// Response Types
// ============================================

export type FinishReason = 'stop' | 'length' | 'content_filter' | 'error' | null;

export interface ChatCompletionResponse {
    content: string;
    model: string;
    finishReason: FinishReason;
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

// ============================================
// Provider Interface
// ============================================

export interface LLMProvider {
    readonly name: LLMProviderType;
    readonly defaultModel: string;

    /**
     * Generate a chat completion
     */
    complete(
        messages: ChatMessage[],
        options?: ChatCompletionOptions
    ): Promise<ChatCompletionResponse>;
}
