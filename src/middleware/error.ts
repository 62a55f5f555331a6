import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { sendError } from '../lib/apiResponse';
import { APIError } from '../lib/APIError';
import { ddl } from '../lib/dd';

const isJsonSyntaxError = (error: Error): boolean =>
    error instanceof SyntaxError && 'body' in error && 'status' in error;

export const errorHandler = (
    error: Error,
    req: Request,
    res: Response,
    // Express only treats 4-argument middleware as an error handler
    _next: NextFunction
) => {
    // Handle custom APIError instances
    if (error instanceof APIError) {
        if (error.statusCode >= 500) {
            console.error(`❌ ${error.name}:`, error.message, error.cause ?? '');
        } else {
            ddl(`${error.name}:`, error.message);
        }

        return sendError(
            req,
            res,
            error.statusCode,
            error.errorCode,
            error.message,
            error.data,
            error.meta
        );
    }

    if (error instanceof ZodError) {
        const messages = error.issues.map(
            (issue) => `${issue.path.join('.')}: ${issue.message}`
        );
        return sendError(
            req,
            res,
            400,
            'VALIDATION_ERROR',
            'Validation failed',
            { errors: messages }
        );
    }

    if (isJsonSyntaxError(error)) {
        return sendError(
            req,
            res,
            400,
            'INVALID_JSON',
            'Request body is not valid JSON'
        );
    }

    console.error('❌ Unhandled error:', error);

    return sendError(
        req,
        res,
        500,
        'INTERNAL_ERROR',
        error.message || 'An unexpected error occurred'
    );
};

export const notFoundHandler = (req: Request, res: Response) => {
    sendError(
        req,
        res,
        404,
        'NOT_FOUND',
        `Route ${req.method} ${req.path} not found`
    );
};
