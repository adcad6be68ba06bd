/**
 * Centralized logger using Pino
 * One child logger per pipeline stage so every line carries its `module`
 */
import pino from 'pino';
import type { Logger } from 'pino';
import type { Request, Response, NextFunction } from 'express';

const isDev = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

function resolveLevel(): string {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

// pino-pretty runs in a worker thread; tests and production write JSON to stdout
const logger: Logger = isDev && !isTest
    ? pino(
        { level: resolveLevel() },
        pino.transport({
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        })
    )
    : pino({
        level: resolveLevel(),
        formatters: {
            level: (label: string) => ({ level: label }),
        },
    });

// Child loggers per pipeline stage
export const webhookLogger: Logger = logger.child({ module: 'webhook' });
export const ingestLogger: Logger = logger.child({ module: 'ingest' });
export const queueLogger: Logger = logger.child({ module: 'queue' });
export const reconcileLogger: Logger = logger.child({ module: 'reconcile' });
export const marketplaceLogger: Logger = logger.child({ module: 'marketplace' });
export const fetchLogger: Logger = logger.child({ module: 'fetch' });
export const pipelineLogger: Logger = logger.child({ module: 'pipeline' });
export const exportLogger: Logger = logger.child({ module: 'export' });
export const systemLogger: Logger = logger.child({ module: 'system' });

export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.originalUrl,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            logger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            logger.warn(logData, 'Request warning');
        } else if (duration > 1000) {
            logger.warn(logData, 'Slow request');
        } else {
            logger.debug(logData, 'Request completed');
        }
    });

    next();
}
