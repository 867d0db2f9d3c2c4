import { Request, Response, NextFunction } from 'express';
import type { ApiKeyAccessControl, CallerRole } from '../services/accessControl.js';

export interface Caller {
    key: string;
    role: CallerRole;
}

// Extend Express Request type to include the authenticated caller
declare global {
    namespace Express {
        interface Request {
            caller?: Caller;
        }
    }
}

/**
 * Middleware factory that requires a known API key in the 'x-api-key' header.
 * Only identifies the caller; what the caller may do is decided by the
 * lifecycle services through the same access control.
 */
export function requireApiKey(accessControl: ApiKeyAccessControl) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const apiKey = req.header('x-api-key');

        if (!apiKey) {
            res.status(401).json({
                error: 'Unauthorized',
                message: 'API key is required',
            });
            return;
        }

        const role = accessControl.roleOf(apiKey);

        if (!role) {
            res.status(401).json({
                error: 'Unauthorized',
                message: 'Invalid or inactive API key',
            });
            return;
        }

        req.caller = { key: apiKey, role };
        next();
    };
}

/**
 * The caller attached by `requireApiKey`, or an empty key when the route is unauthenticated.
 */
export const callerKey = (req: Request): string => req.caller?.key ?? '';
