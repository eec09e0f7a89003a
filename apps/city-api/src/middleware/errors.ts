/**
 * Error Middleware
 *
 * CityScopeError → its status with `{ error, code }`; ZodError → 400 with
 * details; anything else → 500.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { CityScopeError } from '@cityscope/types';
import { validationErrorBody } from './validation.js';

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forward rejections of an async handler to the error middleware.
 */
export function asyncHandler(handler: AsyncHandler): RequestHandler {
    return (req, res, next) => {
        handler(req, res, next).catch(next);
    };
}

export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json({ error: `No route for ${req.method} ${req.path}`, code: 'NOT_FOUND' });
}

export function errorHandler(
    error: unknown,
    req: Request,
    res: Response,
    // Express recognizes error middleware by its four parameters
    next: NextFunction
): void {
    if (error instanceof ZodError) {
        res.status(400).json(validationErrorBody(error));
        return;
    }

    if (error instanceof CityScopeError) {
        if (error.status >= 500) {
            console.error(`✗ ${req.method} ${req.originalUrl} → ${error.code}:`, error.message, error.cause ?? '');
        }
        res.status(error.status).json({ error: error.message, code: error.code });
        return;
    }

    if (isJsonSyntaxError(error)) {
        res.status(400).json({ error: 'Invalid request body' });
        return;
    }

    console.error(`✗ ${req.method} ${req.originalUrl} failed:`, error);
    res.status(500).json({ error: 'Internal server error' });
}

// body-parser marks malformed JSON with `type: 'entity.parse.failed'`
function isJsonSyntaxError(error: unknown): boolean {
    return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}
