// types/chunk.ts
import { Document, Types } from 'mongoose';
import { ItemSource } from './item';

export interface IChunkingOptions {
    chunkSize: number; // Window size in characters
    chunkOverlap: number; // Overlap in characters
}

/**
 * A window of an item's raw text. Offsets are [start, end)
 */
export interface ChunkSpan {
    text: string;
    startOffset: number;
    endOffset: number;
}

export interface ChunkRecord extends ChunkSpan {
    chunkId: string;
    itemId: string;
    chunkIndex: number;
}

/**
 * Chunk metadata held by the vector index; carries the owning item's
 * source so citations need no store lookup
 */
export interface IndexedChunk extends ChunkRecord {
    source: ItemSource;
}

// Persistence shape
export interface IChunk {
    itemId: Types.ObjectId;
    chunkId: string;
    chunkIndex: number;
    text: string;
    startOffset: number;
    endOffset: number;
    createdAt: Date;
    updatedAt: Date;
}

export interface IChunkDocument extends IChunk, Document {
    _id: Types.ObjectId;
}
