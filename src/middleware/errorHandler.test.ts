import { describe, it, expect, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import { z } from 'zod';
import { errorHandler, notFoundHandler } from './errorHandler.js';
import { LifecycleError } from '../errors/lifecycleError.js';

const buildApp = (failure: () => never) => {
    const app = express();
    app.use(express.json());
    app.post('/fail', () => {
        failure();
    });
    app.use(notFoundHandler);
    app.use(errorHandler);
    return app;
};

describe('errorHandler', () => {
    it('maps lifecycle errors to their status and code', async () => {
        const app = buildApp(() => {
            throw new LifecycleError('InvalidMagnitude', 'Cannot discount an undefined fee', 'UndefinedFee');
        });

        const response = await request(app).post('/fail');

        expect(response.status).toBe(400);
        expect(response.body).toEqual({
            error: 'InvalidMagnitude',
            message: 'Cannot discount an undefined fee',
            statusCode: 400,
            reason: 'UndefinedFee',
        });
    });

    it('maps payment shortfalls to 402', async () => {
        const app = buildApp(() => {
            throw new LifecycleError('InsufficientPayment', 'Renewal of asset 1 costs 5, got 4');
        });

        const response = await request(app).post('/fail');

        expect(response.status).toBe(402);
        expect(response.body).toEqual({ error: 'InsufficientPayment', message: 'Renewal of asset 1 costs 5, got 4', statusCode: 402 });
    });

    it('maps validation errors to 400 with field details', async () => {
        const app = buildApp(() => {
            z.object({ duration: z.number() }).parse({ duration: 'soon' });
            throw new Error('unreachable');
        });

        const response = await request(app).post('/fail');

        expect(response.status).toBe(400);
        expect(response.body).toEqual({
            error: 'Validation Error',
            message: 'Invalid request data',
            statusCode: 400,
            details: [{ field: 'duration', message: 'Expected number, received string' }],
        });
    });

    it('rejects malformed JSON bodies', async () => {
        const app = buildApp(() => {
            throw new Error('unreachable');
        });

        const response = await request(app).post('/fail').set('Content-Type', 'application/json').send('{"duration":');

        expect(response.status).toBe(400);
        expect(response.body).toEqual({ error: 'Validation Error', message: 'Malformed JSON body', statusCode: 400 });
    });

    it('hides unexpected errors behind a 500', async () => {
        const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
        const app = buildApp(() => {
            throw new Error('database exploded');
        });

        const response = await request(app).post('/fail');

        expect(response.status).toBe(500);
        expect(response.body).toEqual({ error: 'Internal Server Error', message: 'An unexpected error occurred', statusCode: 500 });
        expect(consoleErrorSpy).toHaveBeenCalledWith('[ErrorHandler] Unhandled error on POST /fail:', 'database exploded');
        consoleErrorSpy.mockRestore();
    });

    it('answers unknown routes with 404', async () => {
        const response = await request(buildApp(() => {
            throw new Error('unreachable');
        })).get('/missing');

        expect(response.status).toBe(404);
        expect(response.body).toEqual({ error: 'NotFound', message: 'No route for GET /missing', statusCode: 404 });
    });
});
