// models/chunk.ts
import { Schema, model } from 'mongoose';
import { IChunkDocument } from '../types/chunk';

const chunkSchema = new Schema<IChunkDocument>(
    {
        itemId: {
            type: Schema.Types.ObjectId,
            ref: 'Item',
            required: true,
            index: true,
        },
        chunkId: {
            type: String,
            required: true,
            unique: true,
        },
        chunkIndex: {
            type: Number,
            required: true,
        },
        text: {
            type: String,
            required: true,
        },
        startOffset: {
            type: Number,
            required: true,
        },
        endOffset: {
            type: Number,
            required: true,
        },
    },
    {
        timestamps: true,
    }
);

chunkSchema.index({ itemId: 1, chunkIndex: 1 });

export const ChunkModel = model<IChunkDocument>('Chunk', chunkSchema, 'chunks');
