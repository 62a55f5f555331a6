import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OllamaEmbeddingProvider } from './ollamaEmbeddingProvider';
import { EmbeddingUnavailableError } from '../lib/errors';

describe('OllamaEmbeddingProvider', () => {
    const fetchMock = vi.fn<typeof fetch>();
    const provider = new OllamaEmbeddingProvider({
        provider: 'ollama',
        baseUrl: 'http://ollama.test:11434/',
        defaultModel: 'nomic-embed-text',
        dimensions: 3,
        maxBatchSize: 64,
        timeoutMs: 1000,
    });

    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('uses the batch /api/embed endpoint', async () => {
        fetchMock.mockResolvedValueOnce(
            new Response(
                JSON.stringify({
                    model: 'nomic-embed-text',
                    embeddings: [
                        [1, 0, 0],
                        [0, 0, 1],
                    ],
                })
            )
        );

        const response = await provider.embedBatch(['first', 'second']);

        expect(response.embeddings).toEqual([
            { embedding: [1, 0, 0], index: 0 },
            { embedding: [0, 0, 1], index: 1 },
        ]);
        expect(response.dimensions).toBe(3);

        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('http://ollama.test:11434/api/embed');
        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'nomic-embed-text',
            input: ['first', 'second'],
        });
    });

    it('reports an unreachable server as unavailable', async () => {
        fetchMock.mockRejectedValueOnce(new TypeError('connect ECONNREFUSED'));

        const error = await provider.embedBatch(['x']).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(EmbeddingUnavailableError);
        expect(error).toMatchObject({
            provider: 'ollama',
            reason: 'NETWORK_ERROR',
            retryable: true,
        });
    });
});
