import { Request } from 'express';
import { z } from 'zod';

/**
 * Parse the request parts a route schema describes
 * A ZodError thrown here is rendered as 400 VALIDATION_ERROR by errorHandler
 */
export const validate = <TSchema extends z.ZodType>(
    schema: TSchema,
    req: Request
): z.output<TSchema> =>
    schema.parse({
        body: req.body,
        query: req.query,
        params: req.params,
    });
