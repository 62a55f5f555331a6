import { z } from 'zod';

const sourceKind = z.enum(['note', 'url']);

export const createItemSchema = z.object({
    body: z.object({
        sourceKind,
        content: z.string().min(1, 'Content is required'),
    }),
});

export const listItemsSchema = z.object({
    query: z.object({
        sourceKind: sourceKind.optional(),
    }),
});

export const itemParamsSchema = z.object({
    params: z.object({
        itemId: z.string().min(1, 'Item ID is required'),
    }),
});
