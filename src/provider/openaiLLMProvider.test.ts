import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAILLMProvider } from './openaiLLMProvider';
import { OllamaLLMProvider } from './ollamaLLMProvider';
import { GenerationUnavailableError } from '../lib/errors';

const jsonResponse = (body: unknown, status = 200): Response =>
    new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });

const messages = [
    { role: 'system' as const, content: 'Answer from context.' },
    { role: 'user' as const, content: 'What color is the sky?' },
];

describe('OpenAILLMProvider', () => {
    const fetchMock = vi.fn<typeof fetch>();
    const provider = new OpenAILLMProvider({
        provider: 'openai',
        apiKey: 'test-secret',
        baseUrl: 'https://chat.test/v1',
        defaultModel: 'chat-mini',
        timeoutMs: 1000,
    });

    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('sends a non-streaming chat completion and maps the reply', async () => {
        fetchMock.mockResolvedValueOnce(
            jsonResponse({
                model: 'chat-mini-2024',
                choices: [
                    {
                        index: 0,
                        message: { role: 'assistant', content: 'Blue.' },
                        finish_reason: 'stop',
                    },
                ],
                usage: { prompt_tokens: 20, completion_tokens: 2, total_tokens: 22 },
            })
        );

        const response = await provider.complete(messages, {
            temperature: 0.7,
            maxTokens: 800,
        });

        expect(response).toEqual({
            content: 'Blue.',
            model: 'chat-mini-2024',
            finishReason: 'stop',
            usage: { promptTokens: 20, completionTokens: 2, totalTokens: 22 },
        });

        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('https://chat.test/v1/chat/completions');
        expect(init?.method).toBe('POST');
        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'chat-mini',
            messages,
            stream: false,
            temperature: 0.7,
            max_tokens: 800,
        });
    });

    it('turns a rate limit into a retryable generation failure', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({}, 429));

        const error = await provider.complete(messages).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(GenerationUnavailableError);
        expect(error).toMatchObject({
            reason: 'RATE_LIMIT',
            retryable: true,
            errorCode: 'GENERATION_UNAVAILABLE',
            data: {
                stage: 'generation',
                provider: 'openai',
                reason: 'RATE_LIMIT',
                retryable: true,
            },
        });
    });

    it('turns a network error into a generation failure', async () => {
        fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

        const error = await provider.complete(messages).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(GenerationUnavailableError);
        expect(error).toMatchObject({ reason: 'NETWORK_ERROR' });
    });
});

describe('OllamaLLMProvider', () => {
    const fetchMock = vi.fn<typeof fetch>();
    const provider = new OllamaLLMProvider({
        provider: 'ollama',
        baseUrl: 'http://ollama.test:11434/',
        defaultModel: 'llama3.1',
        timeoutMs: 1000,
    });

    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('calls /api/chat with generation options', async () => {
        fetchMock.mockResolvedValueOnce(
            jsonResponse({
                model: 'llama3.1',
                message: { role: 'assistant', content: 'Blue.' },
                done: true,
                done_reason: 'stop',
                prompt_eval_count: 30,
                eval_count: 3,
            })
        );

        const response = await provider.complete(messages, {
            temperature: 0.2,
            maxTokens: 100,
        });

        expect(response.content).toBe('Blue.');
        expect(response.usage).toEqual({
            promptTokens: 30,
            completionTokens: 3,
            totalTokens: 33,
        });

        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('http://ollama.test:11434/api/chat');
        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'llama3.1',
            messages,
            stream: false,
            options: { temperature: 0.2, num_predict: 100 },
        });
    });

    it('maps HTTP errors', async () => {
        fetchMock.mockResolvedValueOnce(new Response('model not found', { status: 404 }));

        const error = await provider.complete(messages).catch((e: unknown) => e);

        expect(error).toMatchObject({
            reason: 'HTTP_404',
            retryable: false,
            message: '[ollama] API error: 404 - model not found',
        });
    });
});
