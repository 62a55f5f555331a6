import { describe, it, expect } from 'vitest';
import { IndexInvariantError } from '../errors';
import { IndexedChunk } from '../../types/chunk';
import { VectorIndex, cosineSimilarity } from './vectorIndex';

const chunk = (itemId: string, chunkIndex: number): IndexedChunk => ({
    chunkId: `${itemId}:${chunkIndex}`,
    itemId,
    chunkIndex,
    text: `${itemId} chunk ${chunkIndex}`,
    startOffset: 0,
    endOffset: 10,
    source: { kind: 'note' },
});

describe('cosineSimilarity', () => {
    it('is 1 for a vector against itself', () => {
        expect(cosineSimilarity([1, 2, 3], [1, 2, 3])).toBeCloseTo(1, 10);
    });

    it('is 0 for orthogonal vectors', () => {
        expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it('is -1 for opposite vectors', () => {
        expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1, 10);
    });

    it('is 0 when either vector has zero norm', () => {
        expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
        expect(cosineSimilarity([1, 1], [0, 0])).toBe(0);
    });

    it('ignores magnitude', () => {
        expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    });

    it('rejects vectors of different lengths', () => {
        expect(() => cosineSimilarity([1], [1, 2])).toThrow(IndexInvariantError);
    });
});

describe('VectorIndex', () => {
    it('returns nothing from an empty index', () => {
        expect(new VectorIndex().search([1, 0], 5)).toEqual([]);
    });

    it('returns nothing for k <= 0', () => {
        const index = new VectorIndex();
        index.insert(chunk('a', 0), [1, 0]);

        expect(index.search([1, 0], 0)).toEqual([]);
        expect(index.search([1, 0], -3)).toEqual([]);
    });

    it('ranks by cosine similarity, best first', () => {
        const index = new VectorIndex();
        index.insertMany([
            { chunk: chunk('a', 0), embedding: [0, 1] },
            { chunk: chunk('b', 0), embedding: [1, 0] },
            { chunk: chunk('c', 0), embedding: [1, 1] },
        ]);

        const results = index.search([1, 0], 2);

        expect(results.map((r) => r.chunk.chunkId)).toEqual(['b:0', 'c:0']);
        expect(results[0].score).toBeCloseTo(1, 10);
        expect(results[1].score).toBeCloseTo(Math.SQRT1_2, 10);
    });

    it('returns every entry when k exceeds the index size', () => {
        const index = new VectorIndex();
        index.insert(chunk('a', 0), [1, 0]);
        index.insert(chunk('b', 0), [0, 1]);

        expect(index.search([1, 0], 10)).toHaveLength(2);
    });

    it('breaks ties by insertion order', () => {
        const index = new VectorIndex();
        index.insert(chunk('first', 0), [2, 0]);
        index.insert(chunk('second', 0), [1, 0]);
        index.insert(chunk('third', 0), [3, 0]);

        expect(index.search([1, 0], 3).map((r) => r.chunk.itemId)).toEqual([
            'first',
            'second',
            'third',
        ]);
    });

    it('scores a zero query vector as 0 against everything', () => {
        const index = new VectorIndex();
        index.insert(chunk('a', 0), [1, 0]);

        expect(index.search([0, 0], 1)[0].score).toBe(0);
    });

    it('removes every chunk of an item and nothing else', () => {
        const index = new VectorIndex();
        index.insertMany([
            { chunk: chunk('a', 0), embedding: [1, 0] },
            { chunk: chunk('a', 1), embedding: [0, 1] },
            { chunk: chunk('b', 0), embedding: [1, 1] },
        ]);

        expect(index.removeByItem('a')).toBe(2);
        expect(index.size).toBe(1);
        expect(index.has('a:0')).toBe(false);
        expect(index.search([1, 0], 5).map((r) => r.chunk.chunkId)).toEqual([
            'b:0',
        ]);
    });

    it('treats removal of an unknown item as a no-op', () => {
        const index = new VectorIndex();
        index.insert(chunk('a', 0), [1, 0]);

        expect(index.removeByItem('missing')).toBe(0);
        expect(index.size).toBe(1);
    });

    it('allows a removed chunk id to be inserted again', () => {
        const index = new VectorIndex();
        index.insert(chunk('a', 0), [1, 0]);
        index.removeByItem('a');

        expect(() => index.insert(chunk('a', 0), [1, 0])).not.toThrow();
    });

    it('rejects duplicate chunk ids', () => {
        const index = new VectorIndex();
        index.insert(chunk('a', 0), [1, 0]);

        expect(() => index.insert(chunk('a', 0), [0, 1])).toThrow(
            IndexInvariantError
        );
    });

    it('fixes dimensionality on first insert', () => {
        const index = new VectorIndex();
        index.insert(chunk('a', 0), [1, 0, 0]);

        expect(index.dimensions).toBe(3);
        expect(() => index.insert(chunk('b', 0), [1, 0])).toThrow(
            IndexInvariantError
        );
        expect(() => index.search([1, 0], 1)).toThrow(IndexInvariantError);
    });

    it('rejects non-finite and empty embeddings', () => {
        const index = new VectorIndex();

        expect(() => index.insert(chunk('a', 0), [Number.NaN, 1])).toThrow(
            IndexInvariantError
        );
        expect(() => index.insert(chunk('b', 0), [])).toThrow(
            IndexInvariantError
        );
    });

    it('inserts nothing from a batch with one bad entry', () => {
        const index = new VectorIndex({ dimensions: 2 });

        expect(() =>
            index.insertMany([
                { chunk: chunk('a', 0), embedding: [1, 0] },
                { chunk: chunk('a', 1), embedding: [1, 0, 0] },
            ])
        ).toThrow(IndexInvariantError);
        expect(index.size).toBe(0);
        expect(index.has('a:0')).toBe(false);
    });

    it('rejects a batch that repeats a chunk id', () => {
        const index = new VectorIndex();

        expect(() =>
            index.insertMany([
                { chunk: chunk('a', 0), embedding: [1, 0] },
                { chunk: chunk('a', 0), embedding: [0, 1] },
            ])
        ).toThrow(IndexInvariantError);
        expect(index.size).toBe(0);
    });

    it('reports entries, items and dimensions', () => {
        const index = new VectorIndex();
        index.insertMany([
            { chunk: chunk('a', 0), embedding: [1, 0] },
            { chunk: chunk('a', 1), embedding: [0, 1] },
            { chunk: chunk('b', 0), embedding: [1, 1] },
        ]);

        expect(index.stats()).toEqual({ entries: 3, items: 2, dimensions: 2 });

        index.clear();
        expect(index.stats()).toEqual({ entries: 0, items: 0, dimensions: 2 });
    });
});
