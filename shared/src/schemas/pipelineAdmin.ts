/**
 * Admin API contract
 *
 * Request and response shapes for /api/pipeline. The server builds its
 * responses against these types; the CLI parses responses with the schemas.
 */

import { z } from 'zod';

// ============================================
// REQUESTS
// ============================================

export const processingStatusSchema = z.enum([
    'Received',
    'Fetched',
    'Transformed',
    'Persisted',
    'Exported',
    'Failed',
    'Skipped',
]);

/**
 * @example
 * /api/pipeline/orders?status=Failed&limit=50
 */
export const storedOrdersQuerySchema = z.object({
    status: processingStatusSchema.default('Failed'),
    limit: z.coerce.number().int().positive().max(500).default(50),
});

export const orderKeyParamsSchema = z.object({
    channel: z.string().trim().min(1),
    sourceOrderId: z.string().trim().min(1),
});

export type StoredOrdersQuery = z.infer<typeof storedOrdersQuerySchema>;

// ============================================
// RESPONSES
// ============================================

const count = z.number().int().nonnegative();

export const queueStatsSchema = z.object({
    pushed: count,
    deduplicated: count,
    completed: count,
    failed: count,
    waiting: count,
    inFlight: count,
    delayed: count,
    stopped: z.boolean(),
});

export const reconcileRunSchema = z.object({
    startedAt: z.string(),
    trigger: z.string(),
    listed: count,
    queued: count,
    duplicate: count,
    failedStores: count,
    recovered: count,
    durationMs: z.number().nonnegative(),
    error: z.string().nullable(),
});

export const exportRunSchema = z.discriminatedUnion('outcome', [
    z.object({
        outcome: z.literal('exported'),
        batchId: z.string(),
        orderCount: count,
        rowCounts: z.record(count),
        path: z.string(),
        excluded: count,
    }),
    z.object({
        outcome: z.literal('rejected'),
        batchId: z.string(),
        orderCount: count,
        violations: z.array(z.string()),
    }),
    z.object({
        outcome: z.literal('skipped'),
        skipped: z.enum(['locked', 'empty']),
    }),
]);

export const circuitStatusSchema = z.object({
    name: z.string(),
    state: z.enum(['CLOSED', 'OPEN', 'HALF_OPEN']),
    failures: count,
    lastFailureAt: z.string().nullable(),
    nextResetAt: z.string().nullable(),
});

export const pipelineStatusSchema = z.object({
    queue: queueStatsSchema,
    orders: z.record(count),
    reconciler: z.object({
        isRunning: z.boolean(),
        schedulerActive: z.boolean(),
        lastRunAt: z.string().nullable(),
        lastRunResult: reconcileRunSchema.nullable(),
    }),
    exporter: z.object({
        isRunning: z.boolean(),
        schedulerActive: z.boolean(),
        lastRunAt: z.string().nullable(),
        lastResult: exportRunSchema.nullable(),
        lastError: z.string().nullable(),
    }),
    circuit: circuitStatusSchema,
});

export const reconcileTriggerResponseSchema = z.object({
    started: z.boolean(),
    result: reconcileRunSchema.nullable(),
});

export const orderSummarySchema = z.object({
    channel: z.string(),
    sourceOrderId: z.string(),
    processingStatus: processingStatusSchema,
    resourceHref: z.string(),
    exportBatchId: z.string().nullable(),
    updatedAt: z.string(),
    failure: z
        .object({
            kind: z.string(),
            message: z.string(),
            at: z.string(),
        })
        .nullable(),
});

export const listOrdersResponseSchema = z.object({
    orders: z.array(orderSummarySchema),
    count,
});

export const replayResponseSchema = z.object({
    channel: z.string(),
    sourceOrderId: z.string(),
    processingStatus: processingStatusSchema,
    queued: z.boolean(),
});

export type QueueStatsView = z.infer<typeof queueStatsSchema>;
export type ReconcileRunView = z.infer<typeof reconcileRunSchema>;
export type ExportRunView = z.infer<typeof exportRunSchema>;
export type PipelineStatusResponse = z.infer<typeof pipelineStatusSchema>;
export type ReconcileTriggerResponse = z.infer<typeof reconcileTriggerResponseSchema>;
export type OrderSummary = z.infer<typeof orderSummarySchema>;
export type ListOrdersResponse = z.infer<typeof listOrdersResponseSchema>;
export type ReplayResponse = z.infer<typeof replayResponseSchema>;
