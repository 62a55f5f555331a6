import { EmbeddingProvider, EmbeddingResponse } from '../types/embedding';
import {
    ChatCompletionOptions,
    ChatCompletionResponse,
    ChatMessage,
    LLMProvider,
} from '../types/llm';
import { PageExtractor } from '../lib/parsers/urlParser';
import { ExtractionFailedError } from '../lib/errors';

const tokenize = (text: string): string[] =>
    text
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .filter(Boolean);

/**
 * Bag-of-words embeddings: every distinct word gets its own dimension,
 * so texts sharing words are similar and texts sharing none score 0
 */
export class VocabularyEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'vocabulary';
    readonly dimensions: number;
    readonly calls: string[][] = [];
    private readonly vocabulary = new Map<string, number>();
    private failure: Error | null = null;

    constructor(dimensions = 256) {
        this.dimensions = dimensions;
    }

    failWith(error: Error | null): void {
        this.failure = error;
    }

    vectorFor(text: string): number[] {
        const vector = new Array<number>(this.dimensions).fill(0);
        for (const word of tokenize(text)) {
            let slot = this.vocabulary.get(word);
            if (slot === undefined) {
                slot = this.vocabulary.size % this.dimensions;
                this.vocabulary.set(word, slot);
            }
            vector[slot] += 1;
        }
        return vector;
    }

    async embedBatch(texts: string[]): Promise<EmbeddingResponse> {
        this.calls.push([...texts]);
        if (this.failure) {
            throw this.failure;
        }
        return {
            embeddings: texts.map((text, index) => ({
                embedding: this.vectorFor(text),
                index,
            })),
            model: 'vocabulary',
            dimensions: this.dimensions,
        };
    }
}

/**
 * Records prompts and replies with a fixed answer
 */
export class FakeLLMProvider implements LLMProvider {
    readonly name = 'openai' as const;
    readonly defaultModel = 'fake-model';
    readonly requests: Array<{
        messages: ChatMessage[];
        options?: ChatCompletionOptions;
    }> = [];
    private failure: Error | null = null;

    constructor(private reply = 'The sky is blue.') {}

    failWith(error: Error | null): void {
        this.failure = error;
    }

    replyWith(reply: string): void {
        this.reply = reply;
    }

    get lastUserPrompt(): string {
        const last = this.requests[this.requests.length - 1];
        return last?.messages.find((m) => m.role === 'user')?.content ?? '';
    }

    async complete(
        messages: ChatMessage[],
        options?: ChatCompletionOptions
    ): Promise<ChatCompletionResponse> {
        this.requests.push({ messages, options });
        if (this.failure) {
            throw this.failure;
        }
        return {
            content: this.reply,
            model: this.defaultModel,
            finishReason: 'stop',
            usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
        };
    }
}

/**
 * Serves page text from a map; unknown URLs fail extraction
 */
export class FakePageExtractor implements PageExtractor {
    readonly requested: string[] = [];

    constructor(private readonly pages: Record<string, string> = {}) {}

    async extract(url: string): Promise<string> {
        this.requested.push(url);
        const text = this.pages[url];
        if (text === undefined) {
            throw new ExtractionFailedError(url, 'HTTP 404');
        }
        return text;
    }
}
