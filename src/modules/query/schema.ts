import { z } from 'zod';
import { MAX_EMBEDDING_INPUT_LENGTH } from '../../lib/ai/embeddingService';

export const querySchema = z.object({
    body: z.object({
        question: z
            .string()
            .trim()
            .min(1, 'Question is required')
            .max(
                MAX_EMBEDDING_INPUT_LENGTH,
                `Question must be at most ${MAX_EMBEDDING_INPUT_LENGTH} characters`
            ),
        maxResults: z.number().int().min(1).max(10).optional(),
    }),
});
