/**
 * Vector Index
 * In-process store of chunk embeddings with exact cosine top-k search.
 *
 * Every operation is synchronous. Node runs one handler at a time between
 * awaits, so each insert, removal or search completes before any other
 * request can touch the index: a search never observes a half-inserted or
 * half-removed item.
 */

import { IndexedChunk } from '../../types/chunk';
import { IndexInvariantError } from '../errors';

export interface IndexEntry {
    chunk: IndexedChunk;
    embedding: number[];
}

export interface ScoredChunk {
    chunk: IndexedChunk;
    score: number;
}

export interface VectorIndexStats {
    entries: number;
    items: number;
    dimensions: number | null;
}

export interface VectorIndexOptions {
    /**
     * Fix the dimensionality up front; otherwise the first insert sets it
     */
    dimensions?: number;
}

interface StoredEntry {
    chunk: IndexedChunk;
    embedding: number[];
    norm: number;
    sequence: number;
}

export function vectorNorm(vector: number[]): number {
    let sum = 0;
    for (const value of vector) {
        sum += value * value;
    }
    return Math.sqrt(sum);
}

function dot(a: number[], b: number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

/**
 * Cosine similarity; 0 when either vector has zero norm
 */
export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
        throw new IndexInvariantError(
            `Cannot compare vectors of dimension ${a.length} and ${b.length}`
        );
    }
    const normA = vectorNorm(a);
    const normB = vectorNorm(b);
    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot(a, b) / (normA * normB);
}

export class VectorIndex {
    private entries: StoredEntry[] = [];
    private readonly chunkIds = new Set<string>();
    private fixedDimensions: number | null;
    private nextSequence = 0;

    constructor(options: VectorIndexOptions = {}) {
        this.fixedDimensions = options.dimensions ?? null;
    }

    get size(): number {
        return this.entries.length;
    }

    get dimensions(): number | null {
        return this.fixedDimensions;
    }

    has(chunkId: string): boolean {
        return this.chunkIds.has(chunkId);
    }

    insert(chunk: IndexedChunk, embedding: number[]): void {
        this.insertMany([{ chunk, embedding }]);
    }

    /**
     * Validate the whole batch, then append it; nothing is added on failure
     */
    insertMany(batch: IndexEntry[]): void {
        const batchIds = new Set<string>();
        let dimensions = this.fixedDimensions;

        for (const { chunk, embedding } of batch) {
            if (this.chunkIds.has(chunk.chunkId) || batchIds.has(chunk.chunkId)) {
                throw new IndexInvariantError(
                    `Duplicate chunk id ${chunk.chunkId}`
                );
            }
            if (embedding.length === 0) {
                throw new IndexInvariantError(
                    `Empty embedding for chunk ${chunk.chunkId}`
                );
            }
            if (dimensions !== null && embedding.length !== dimensions) {
                throw new IndexInvariantError(
                    `Embedding for chunk ${chunk.chunkId} has dimension ${embedding.length}, index expects ${dimensions}`
                );
            }
            if (!embedding.every(Number.isFinite)) {
                throw new IndexInvariantError(
                    `Embedding for chunk ${chunk.chunkId} has non-finite components`
                );
            }
            dimensions = embedding.length;
            batchIds.add(chunk.chunkId);
        }

        for (const { chunk, embedding } of batch) {
            this.entries.push({
                chunk,
                embedding,
                norm: vectorNorm(embedding),
                sequence: this.nextSequence++,
            });
            this.chunkIds.add(chunk.chunkId);
        }
        this.fixedDimensions = dimensions;
    }

    /**
     * Remove every chunk of an item; returns how many were removed
     */
    removeByItem(itemId: string): number {
        const kept: StoredEntry[] = [];
        let removed = 0;

        for (const entry of this.entries) {
            if (entry.chunk.itemId === itemId) {
                this.chunkIds.delete(entry.chunk.chunkId);
                removed++;
            } else {
                kept.push(entry);
            }
        }

        this.entries = kept;
        return removed;
    }

    /**
     * Top-k chunks by cosine similarity, best first.
     * Equal scores keep insertion order.
     */
    search(queryEmbedding: number[], k: number): ScoredChunk[] {
        if (this.entries.length === 0 || k <= 0) {
            return [];
        }
        if (
            this.fixedDimensions !== null &&
            queryEmbedding.length !== this.fixedDimensions
        ) {
            throw new IndexInvariantError(
                `Query embedding has dimension ${queryEmbedding.length}, index expects ${this.fixedDimensions}`
            );
        }

        const queryNorm = vectorNorm(queryEmbedding);

        const scored = this.entries.map((entry) => ({
            entry,
            score:
                queryNorm === 0 || entry.norm === 0
                    ? 0
                    : dot(queryEmbedding, entry.embedding) /
                      (queryNorm * entry.norm),
        }));

        scored.sort(
            (a, b) => b.score - a.score || a.entry.sequence - b.entry.sequence
        );

        return scored.slice(0, Math.floor(k)).map(({ entry, score }) => ({
            chunk: entry.chunk,
            score,
        }));
    }

    clear(): void {
        this.entries = [];
        this.chunkIds.clear();
    }

    stats(): VectorIndexStats {
        return {
            entries: this.entries.length,
            items: new Set(this.entries.map((e) => e.chunk.itemId)).size,
            dimensions: this.fixedDimensions,
        };
    }
}
