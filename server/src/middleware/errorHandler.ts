/**
 * Centralized Error Handler Middleware
 * Maps the pipeline's error classes to consistent JSON responses
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { TransformError } from '@order-bridge/shared/errors';
import {
    AuthenticationError,
    ValidationError,
    NotFoundError,
    StateRaceError,
    TransientUpstreamError,
    PersistenceError,
    PackageIntegrityError,
    LedgerUnavailableError,
    isCustomError,
    isPipelineError,
} from '../utils/errors.js';
import logger from '../utils/logger.js';

export interface ErrorResponseBody {
    error: string;
    type: string;
    [key: string]: unknown;
}

export interface ErrorResponse {
    status: number;
    body: ErrorResponseBody;
}

/**
 * Body-parser and other http-errors carry `status`/`statusCode` and `expose`
 */
function httpErrorStatus(err: Error): number | null {
    if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
    if ('status' in err && typeof err.status === 'number') return err.status;
    return null;
}

/**
 * Translate anything thrown by a route into a status and body.
 * Exported separately so webhook tests can assert the mapping without a server.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
    if (err instanceof AuthenticationError) {
        return { status: 401, body: { error: err.message, type: err.name } };
    }

    if (err instanceof ValidationError) {
        return { status: 400, body: { error: err.message, type: err.name, details: err.details } };
    }

    if (err instanceof TransformError) {
        return { status: 400, body: { error: err.message, type: 'ValidationError', code: err.code } };
    }

    if (err instanceof ZodError) {
        return {
            status: 400,
            body: {
                error: 'Validation failed',
                type: 'ValidationError',
                details: err.issues.map(issue => ({
                    path: issue.path.join('.'),
                    message: issue.message,
                })),
            },
        };
    }

    if (err instanceof NotFoundError) {
        return {
            status: 404,
            body: { error: err.message, type: err.name, resourceType: err.resourceType, resourceId: err.resourceId },
        };
    }

    if (err instanceof StateRaceError) {
        return { status: 409, body: { error: err.message, type: err.name, observedState: err.observedState } };
    }

    if (err instanceof PackageIntegrityError) {
        return { status: 422, body: { error: err.message, type: err.name, violations: err.violations } };
    }

    if (err instanceof TransientUpstreamError) {
        return { status: 502, body: { error: err.message, type: err.name, service: err.serviceName } };
    }

    if (err instanceof LedgerUnavailableError) {
        return { status: 503, body: { error: err.message, type: err.name } };
    }

    if (err instanceof PersistenceError) {
        // Don't expose store internals
        return { status: 500, body: { error: 'Order store unavailable', type: err.name } };
    }

    if (isCustomError(err)) {
        return { status: err.statusCode, body: { error: err.message, type: err.name } };
    }

    if (err instanceof Error) {
        const status = httpErrorStatus(err) ?? 500;
        return {
            status,
            body: { error: status >= 500 ? 'Internal server error' : err.message, type: err.name || 'Error' },
        };
    }

    return { status: 500, body: { error: 'Internal server error', type: 'Error' } };
}

/**
 * Global error handling middleware
 */
export const errorHandler: ErrorRequestHandler = (
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const { status, body } = toErrorResponse(err);
    const logData = {
        method: req.method,
        path: req.path,
        status,
        type: body.type,
        error: err instanceof Error ? err.message : String(err),
    };

    if (status >= 500) {
        // Stack only for errors the pipeline did not raise itself
        const stack = !isPipelineError(err) && err instanceof Error ? err.stack : undefined;
        logger.error({ ...logData, stack }, 'Request failed');
    } else {
        logger.warn(logData, 'Request rejected');
    }

    res.status(status).json(body);
};

export default errorHandler;
