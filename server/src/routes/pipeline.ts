/**
 * @module routes/pipeline
 * @description Operator endpoints for the order pipeline. Mounted at /api/pipeline
 * behind the admin bearer token.
 *
 * Status: queue stats, per-status order counts, reconciler and exporter last runs, circuit state
 * Triggers: reconcile run, export run (both run inline; the response carries the result)
 * Orders: list by processing status, replay a Failed order
 *
 * @see services/orderReplay.ts - Replay rules
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    orderKeyParamsSchema,
    storedOrdersQuerySchema,
    type ListOrdersResponse,
    type OrderSummary,
    type PipelineStatusResponse,
    type ReconcileTriggerResponse,
} from '@order-bridge/shared/schemas';
import type { StoredOrder } from '@order-bridge/shared/domain';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requireAdminToken } from '../middleware/adminAuth.js';
import type { BatchExporter } from '../services/batchExporter/exporter.js';
import type { MarketplaceClient } from '../services/marketplace/client.js';
import { replayFailedOrder } from '../services/orderReplay.js';
import type { OrderStore } from '../services/orderStore/types.js';
import type { ProcessingQueue } from '../services/processingQueue.js';
import type { SafetyNetReconciler } from '../services/safetyNetReconciler.js';

// ============================================
// INTERFACES
// ============================================

export interface PipelineRouterDeps {
    adminToken: string;
    store: OrderStore;
    queue: Pick<ProcessingQueue, 'getStats' | 'push'>;
    reconciler: Pick<SafetyNetReconciler, 'getStatus' | 'triggerRun'>;
    exporter: Pick<BatchExporter, 'getStatus' | 'triggerRun'>;
    marketplace: Pick<MarketplaceClient, 'getCircuitStatus'>;
}

function toSummary(order: StoredOrder): OrderSummary {
    return {
        channel: order.channel,
        sourceOrderId: order.sourceOrderId,
        processingStatus: order.processingStatus,
        resourceHref: order.resourceHref,
        exportBatchId: order.exportBatchId,
        updatedAt: order.updatedAt,
        failure: order.failure ? { kind: order.failure.kind, message: order.failure.message, at: order.failure.at } : null,
    };
}

// ============================================
// ROUTER
// ============================================

export function createPipelineRouter(deps: PipelineRouterDeps): Router {
    const router: Router = Router();
    router.use(requireAdminToken(deps.adminToken));

    router.get(
        '/status',
        asyncHandler(async (_req: Request, res: Response) => {
            const reconciler = deps.reconciler.getStatus();
            const exporter = deps.exporter.getStatus();
            const body: PipelineStatusResponse = {
                queue: deps.queue.getStats(),
                orders: await deps.store.countByStatus(),
                reconciler: {
                    isRunning: reconciler.isRunning,
                    schedulerActive: reconciler.schedulerActive,
                    lastRunAt: reconciler.lastRunAt,
                    lastRunResult: reconciler.lastRunResult,
                },
                exporter: {
                    isRunning: exporter.isRunning,
                    schedulerActive: exporter.schedulerActive,
                    lastRunAt: exporter.lastRunAt,
                    lastResult: exporter.lastResult,
                    lastError: exporter.lastError,
                },
                circuit: deps.marketplace.getCircuitStatus(),
            };
            res.json(body);
        })
    );

    router.post(
        '/reconcile',
        asyncHandler(async (_req: Request, res: Response) => {
            const result = await deps.reconciler.triggerRun();
            const body: ReconcileTriggerResponse = { started: result !== null, result };
            res.status(result ? 200 : 409).json(body);
        })
    );

    router.post(
        '/export',
        asyncHandler(async (_req: Request, res: Response) => {
            res.json(await deps.exporter.triggerRun());
        })
    );

    router.get(
        '/orders',
        asyncHandler(async (req: Request, res: Response) => {
            const { status, limit } = storedOrdersQuerySchema.parse(req.query);
            const orders = await deps.store.listOrdersByStatus(status, limit);
            const body: ListOrdersResponse = { orders: orders.map(toSummary), count: orders.length };
            res.json(body);
        })
    );

    router.post(
        '/orders/:channel/:sourceOrderId/replay',
        asyncHandler(async (req: Request, res: Response) => {
            const key = orderKeyParamsSchema.parse(req.params);
            res.json(await replayFailedOrder({ store: deps.store, queue: deps.queue }, key));
        })
    );

    return router;
}
