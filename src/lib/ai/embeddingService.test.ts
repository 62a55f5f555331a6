import { describe, it, expect } from 'vitest';
import { EmbeddingService } from './embeddingService';
import { EmbeddingUnavailableError } from '../errors';
import { EmbeddingProvider, EmbeddingResponse } from '../../types/embedding';
import { VocabularyEmbeddingProvider } from '../../test-utils/fakeProviders';

const stubProvider = (
    embedBatch: (texts: string[]) => Promise<EmbeddingResponse>
): EmbeddingProvider => ({
    name: 'stub',
    dimensions: 2,
    embedBatch,
});

describe('EmbeddingService', () => {
    it('returns an empty result without calling the provider', async () => {
        const provider = new VocabularyEmbeddingProvider();
        const service = new EmbeddingService(provider);

        expect(await service.embed([])).toEqual([]);
        expect(provider.calls).toEqual([]);
    });

    it('embeds a batch in a single provider call', async () => {
        const provider = new VocabularyEmbeddingProvider(4);
        const service = new EmbeddingService(provider);

        const vectors = await service.embed(['red apple', 'green apple']);

        expect(provider.calls).toHaveLength(1);
        expect(vectors).toEqual([
            [1, 1, 0, 0],
            [0, 1, 1, 0],
        ]);
    });

    it('collapses whitespace before embedding', async () => {
        const provider = new VocabularyEmbeddingProvider();
        const service = new EmbeddingService(provider);

        await service.embed(['  two\n\nwords  ']);

        expect(provider.calls).toEqual([['two words']]);
    });

    it('orders vectors by the index the provider reports', async () => {
        const service = new EmbeddingService(
            stubProvider(async () => ({
                embeddings: [
                    { embedding: [0, 1], index: 1 },
                    { embedding: [1, 0], index: 0 },
                ],
                model: 'stub',
                dimensions: 2,
            }))
        );

        expect(await service.embed(['first', 'second'])).toEqual([
            [1, 0],
            [0, 1],
        ]);
    });

    it('treats a short response as unavailable', async () => {
        const service = new EmbeddingService(
            stubProvider(async () => ({
                embeddings: [{ embedding: [1, 0], index: 0 }],
                model: 'stub',
                dimensions: 2,
            }))
        );

        const error = await service.embed(['a', 'b']).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(EmbeddingUnavailableError);
        expect(error).toMatchObject({
            reason: 'INCOMPLETE_RESPONSE',
            provider: 'stub',
        });
    });

    it('rejects duplicate or out-of-range indices', async () => {
        const service = new EmbeddingService(
            stubProvider(async () => ({
                embeddings: [
                    { embedding: [1, 0], index: 0 },
                    { embedding: [0, 1], index: 0 },
                    { embedding: [1, 1], index: 3 },
                ],
                model: 'stub',
                dimensions: 2,
            }))
        );

        const error = await service
            .embed(['a', 'b', 'c'])
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(EmbeddingUnavailableError);
        expect(error).toMatchObject({
            message: 'Provider returned indices [0, 0, 3] for 3 texts',
            reason: 'INCOMPLETE_RESPONSE',
            retryable: true,
        });
    });

    it('wraps unexpected provider errors', async () => {
        const provider = new VocabularyEmbeddingProvider();
        provider.failWith(new TypeError('socket hang up'));
        const service = new EmbeddingService(provider);

        const error = await service.embed(['text']).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(EmbeddingUnavailableError);
        expect(error).toMatchObject({
            message: 'Embedding failed: socket hang up',
            reason: 'PROVIDER_ERROR',
            statusCode: 503,
            errorCode: 'EMBEDDING_UNAVAILABLE',
        });
    });

    it('passes provider failures through unchanged', async () => {
        const failure = new EmbeddingUnavailableError({
            message: 'rate limited',
            provider: 'stub',
            reason: 'RATE_LIMIT',
            retryable: true,
        });
        const service = new EmbeddingService(
            stubProvider(async () => {
                throw failure;
            })
        );

        await expect(service.embed(['text'])).rejects.toBe(failure);
    });

    it('embeds a single text', async () => {
        const service = new EmbeddingService(new VocabularyEmbeddingProvider(3));

        expect(await service.embedOne('sky sky blue')).toEqual([2, 1, 0]);
    });
});
