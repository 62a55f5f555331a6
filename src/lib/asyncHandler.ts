// lib/asyncHandler.ts
import { Request, Response, NextFunction } from 'express';
/**
 * Async handler to wrap async route handlers
 * Eliminates the need for try-catch blocks in every controller
 */
export const asyncHandler =
    (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) =>
    (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
