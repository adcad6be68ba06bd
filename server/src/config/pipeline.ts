/**
 * Pipeline Configuration
 *
 * Qualifying-state constants and the tunables every stage reads.
 * Services take a slice of PipelineConfig through their options; only
 * buildPipelineConfig() touches the parsed environment.
 *
 * TO CHANGE A TUNABLE:
 * Set the matching environment variable (see config/env.ts).
 */

import type { Env } from './env.js';

// ============================================
// MARKETPLACE STATES
// ============================================

/**
 * Webhook status that marks a delivery as complete.
 * Every other status is acknowledged and ignored.
 */
export const QUALIFYING_WEBHOOK_STATUS = 'HANDED_OFF';

/**
 * Order states the pipeline will ingest.
 *
 * The reconciler lists these and the fetcher re-checks them; an order found
 * outside this set at fetch time is Skipped.
 */
export const ELIGIBLE_ORDER_STATES: readonly string[] = ['HANDED_OFF', 'DELIVERED', 'COMPLETED'];

/**
 * Detail-resource expansions requested on every order fetch
 */
export const ORDER_DETAIL_EXPAND = 'cart,delivery,payment';

/**
 * Guard against a list endpoint that never stops paginating
 */
export const RECONCILE_MAX_PAGES = 200;

/**
 * First in-process delay between persistence attempts; doubles per attempt
 */
export const PERSIST_ATTEMPT_BASE_DELAY_MS = 200;

// ============================================
// CIRCUIT BREAKER CONFIGURATION
// ============================================

/**
 * Circuit breaker for marketplace API failure protection
 */
export const CIRCUIT_BREAKER_CONFIG = {
    /** Number of failures before opening circuit */
    failureThreshold: 5,
    /** Time before attempting to close circuit (ms) */
    resetTimeoutMs: 60000,
    /** Number of requests to allow when half-open */
    halfOpenMaxRequests: 3,
} as const;

// ============================================
// TUNABLES
// ============================================

export interface PipelineConfig {
    channel: string;
    storeIds: string[];
    webhookAckDeadlineMs: number;
    reconcile: {
        intervalMinutes: number;
        lookbackHours: number;
        storeConcurrency: number;
        strandedAfterMinutes: number;
        maxPages: number;
    };
    fetch: {
        maxAttempts: number;
        baseDelayMs: number;
        timeoutMs: number;
    };
    queue: {
        concurrency: number;
        maxDepth: number;
    };
    persist: {
        maxAttempts: number;
        /** In-process backoff base between attempts */
        attemptDelayMs: number;
        /** Delay before a re-queued item carrying its bundle is retried */
        retryDelayMs: number;
    };
    export: {
        intervalMinutes: number;
        batchSize: number;
        rootDir: string;
    };
}

export function buildPipelineConfig(env: Env): PipelineConfig {
    return {
        channel: env.MARKETPLACE_CHANNEL,
        storeIds: env.MARKETPLACE_STORE_IDS,
        webhookAckDeadlineMs: env.WEBHOOK_ACK_DEADLINE_MS,
        reconcile: {
            intervalMinutes: env.RECONCILE_INTERVAL_MINUTES,
            lookbackHours: env.RECONCILE_LOOKBACK_HOURS,
            storeConcurrency: env.RECONCILE_STORE_CONCURRENCY,
            strandedAfterMinutes: env.STRANDED_AFTER_MINUTES,
            maxPages: RECONCILE_MAX_PAGES,
        },
        fetch: {
            maxAttempts: env.FETCH_MAX_ATTEMPTS,
            baseDelayMs: env.FETCH_BASE_DELAY_MS,
            timeoutMs: env.MARKETPLACE_TIMEOUT_MS,
        },
        queue: {
            concurrency: env.QUEUE_CONCURRENCY,
            maxDepth: env.QUEUE_MAX_DEPTH,
        },
        persist: {
            maxAttempts: env.PERSIST_MAX_ATTEMPTS,
            attemptDelayMs: PERSIST_ATTEMPT_BASE_DELAY_MS,
            retryDelayMs: env.PERSIST_RETRY_DELAY_MS,
        },
        export: {
            intervalMinutes: env.EXPORT_INTERVAL_MINUTES,
            batchSize: env.EXPORT_BATCH_SIZE,
            rootDir: env.EXPORT_ROOT_DIR,
        },
    };
}
