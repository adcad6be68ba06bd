/**
 * Admin bearer-token middleware for /api/pipeline
 */

import crypto from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthenticationError } from '../utils/errors.js';

function tokensMatch(presented: string, expected: string): boolean {
    const a = Buffer.from(presented, 'utf8');
    const b = Buffer.from(expected, 'utf8');
    return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export function requireAdminToken(expectedToken: string): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction): void => {
        const authHeader = req.headers['authorization'];
        const token = authHeader?.startsWith('Bearer ') ? authHeader.slice('Bearer '.length) : null;

        if (!token || !tokensMatch(token, expectedToken)) {
            next(new AuthenticationError('Admin token required'));
            return;
        }
        next();
    };
}
