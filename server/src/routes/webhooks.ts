/**
 * Marketplace Webhook Routes
 *
 * Marketplace Configuration:
 * - Endpoint: POST /api/webhooks/marketplace/orders
 * - Header X-Marketplace-Signature: hex HMAC-SHA256 of the raw body
 *
 * The route reads the body as raw bytes and hands them to the ingress
 * unparsed; it is mounted ahead of the app-wide JSON parser. Every response is JSON; failures go through the shared error handler so
 * the marketplace sees 401/400 for bad deliveries and 5xx when it should retry.
 */

import express, { Router } from 'express';
import type { Request, Response } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { handleOrderWebhook, type WebhookIngressDeps } from '../services/webhookIngress.js';

export const SIGNATURE_HEADER = 'X-Marketplace-Signature';

export interface WebhookRouterOptions {
    bodyLimit: string;
}

export function createWebhookRouter(deps: WebhookIngressDeps, options: WebhookRouterOptions): Router {
    const router = Router();

    router.post(
        '/marketplace/orders',
        // Any content type: the marketplace signs the bytes, not the media type
        express.raw({ type: () => true, limit: options.bodyLimit }),
        asyncHandler(async (req: Request, res: Response) => {
            const rawBody: unknown = req.body;
            req.rawBody = Buffer.isBuffer(rawBody) ? rawBody : undefined;
            const ack = await handleOrderWebhook(deps, req.rawBody, req.get(SIGNATURE_HEADER));
            res.status(200).json(ack);
        })
    );

    return router;
}
