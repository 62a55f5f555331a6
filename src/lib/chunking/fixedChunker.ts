// lib/chunking/fixedChunker.ts
import { ChunkSpan, IChunkingOptions } from '../../types/chunk';

export const DEFAULT_CHUNKING_OPTIONS: IChunkingOptions = {
    chunkSize: 500,
    chunkOverlap: 50,
};

/**
 * Split text into fixed-size character windows.
 * Each window starts `chunkSize - chunkOverlap` characters after the previous
 * one and is truncated at the end of the text.
 */
export function fixedChunk(
    text: string,
    options: IChunkingOptions = DEFAULT_CHUNKING_OPTIONS
): ChunkSpan[] {
    const { chunkSize, chunkOverlap } = options;

    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
        throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (
        !Number.isInteger(chunkOverlap) ||
        chunkOverlap < 0 ||
        chunkOverlap >= chunkSize
    ) {
        throw new RangeError(
            `chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`
        );
    }

    if (text.length === 0) {
        return [];
    }

    if (text.length <= chunkSize) {
        return [{ text, startOffset: 0, endOffset: text.length }];
    }

    const step = chunkSize - chunkOverlap;
    const chunks: ChunkSpan[] = [];

    for (let start = 0; start < text.length; start += step) {
        const end = Math.min(start + chunkSize, text.length);
        chunks.push({
            text: text.slice(start, end),
            startOffset: start,
            endOffset: end,
        });
    }

    return chunks;
}
