/**
 * Express application
 *
 * Routes:
 * - POST /api/webhooks/marketplace/orders  marketplace order events (HMAC signed)
 * - /api/pipeline/*                        operator API (admin bearer token)
 * - GET  /api/health                       liveness
 *
 * Built without listening so tests can mount it on an ephemeral port.
 */

import express from 'express';
import type { Express, Request, Response } from 'express';
import { errorHandler } from './middleware/errorHandler.js';
import { createPipelineRouter, type PipelineRouterDeps } from './routes/pipeline.js';
import { createWebhookRouter } from './routes/webhooks.js';
import type { WebhookIngressDeps } from './services/webhookIngress.js';
import { requestLogger } from './utils/logger.js';

export interface AppDeps {
    webhook: WebhookIngressDeps;
    pipeline: PipelineRouterDeps;
    /** Shutdown in progress: health reports 503 so load balancers drain */
    isShuttingDown?: () => boolean;
}

/** Largest webhook or admin request body accepted */
export const JSON_BODY_LIMIT = '1mb';

export function createApp(deps: AppDeps): Express {
    const app = express();
    app.disable('x-powered-by');

    app.use(requestLogger);

    // Reads its own raw body: the signature is checked before any JSON parse
    app.use('/api/webhooks', createWebhookRouter(deps.webhook, { bodyLimit: JSON_BODY_LIMIT }));

    app.use(express.json({ limit: JSON_BODY_LIMIT }));

    app.get('/api/health', (_req: Request, res: Response) => {
        const shuttingDown = deps.isShuttingDown?.() ?? false;
        res.status(shuttingDown ? 503 : 200).json({ status: shuttingDown ? 'shutting_down' : 'ok' });
    });

    app.use('/api/pipeline', createPipelineRouter(deps.pipeline));

    app.use(errorHandler);
    return app;
}
