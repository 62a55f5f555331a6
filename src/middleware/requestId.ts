import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

declare global {
    namespace Express {
        interface Request {
            id?: string;
        }
    }
}

const headerValue = (req: Request): string | undefined => {
    const value = req.headers['x-request-id'];
    return Array.isArray(value) ? value[0] : value;
};

/**
 * Middleware to generate and attach a unique request ID to each request
 * The requestId can be accessed via req.id or the X-Request-ID response header
 */
export const requestIdMiddleware = (
    req: Request,
    res: Response,
    next: NextFunction
) => {
    // Reuse an upstream id (e.g. from a load balancer) when present
    const requestId = headerValue(req) || randomUUID();

    req.id = requestId;
    res.setHeader('X-Request-ID', requestId);

    next();
};

export const getRequestId = (req: Request): string => {
    return req.id || headerValue(req) || randomUUID();
};
