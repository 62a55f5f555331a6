// models/item.ts
import { Schema, model } from 'mongoose';
import { IItemDocument } from '../types/item';

const itemSchema = new Schema<IItemDocument>(
    {
        sourceKind: {
            type: String,
            enum: ['note', 'url'],
            required: true,
            index: true,
        },
        // Only set for url items
        originUrl: {
            type: String,
            trim: true,
        },
        rawText: {
            type: String,
            required: true,
        },
    },
    {
        timestamps: true,
    }
);

itemSchema.index({ createdAt: -1 });

export const ItemModel = model<IItemDocument>('Item', itemSchema, 'items');
