import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isLifecycleError } from '../errors/lifecycleError.js';

export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json({
        error: 'NotFound',
        message: `No route for ${req.method} ${req.path}`,
        statusCode: 404,
    });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    if (isLifecycleError(err)) {
        res.status(err.statusCode).json({
            error: err.code,
            message: err.message,
            statusCode: err.statusCode,
            ...(err.reason ? { reason: err.reason } : {}),
        });
        return;
    }

    if (err instanceof ZodError) {
        res.status(400).json({
            error: 'Validation Error',
            message: 'Invalid request data',
            statusCode: 400,
            details: err.errors.map((e) => ({
                field: e.path.join('.'),
                message: e.message,
            })),
        });
        return;
    }

    // body-parser marks malformed JSON with a 400 status
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
        res.status(400).json({ error: 'Validation Error', message: 'Malformed JSON body', statusCode: 400 });
        return;
    }

    const message = err instanceof Error ? err.message : String(err);
    console.error(`[ErrorHandler] Unhandled error on ${req.method} ${req.path}:`, message);

    res.status(500).json({
        error: 'Internal Server Error',
        message: 'An unexpected error occurred',
        statusCode: 500,
    });
}
