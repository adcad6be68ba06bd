/**
 * Safety-Net Reconciler
 *
 * Runs on an interval (and once at startup) to catch orders whose webhook
 * never arrived:
 * 1. For every configured store, list recently updated orders in the
 *    eligible states, page by page, and admit each through order intake
 * 2. Re-push ledger claims that have been open too long without an outcome
 *    (crash between claim and push, or queued work lost with the process)
 *
 * Stores are swept concurrently up to `storeConcurrency`; pages within a
 * store are sequential. A failing store is reported and never stops the others.
 */

import { orderKeyToString } from '@order-bridge/shared/domain';
import type { MarketplaceOrderPage } from '@order-bridge/shared/schemas';
import { ELIGIBLE_ORDER_STATES, type PipelineConfig } from '../config/pipeline.js';
import { mapSettled } from '../utils/async.js';
import { toError } from '../utils/errors.js';
import { reconcileLogger as log } from '../utils/logger.js';
import type { DedupLedger } from './dedupLedger/types.js';
import type { MarketplaceClient } from './marketplace/client.js';
import type { OrderIntake } from './orderIntake.js';
import type { ProcessingQueue } from './processingQueue.js';

// ============================================
// TYPES & INTERFACES
// ============================================

export type RunTrigger = 'startup' | 'scheduled' | 'manual';

export interface StoreSweepResult {
    storeId: string;
    pages: number;
    listed: number;
    queued: number;
    duplicate: number;
    error: string | null;
}

export interface ReconcileResult {
    startedAt: string;
    trigger: RunTrigger;
    stores: StoreSweepResult[];
    listed: number;
    queued: number;
    duplicate: number;
    failedStores: number;
    recovered: number;
    durationMs: number;
    error: string | null;
}

export interface ReconcilerStatus {
    isRunning: boolean;
    schedulerActive: boolean;
    intervalMinutes: number;
    lookbackHours: number;
    storeCount: number;
    lastRunAt: string | null;
    lastRunResult: ReconcileResult | null;
}

export interface SafetyNetReconcilerDeps {
    client: Pick<MarketplaceClient, 'listOrders'>;
    intake: Pick<OrderIntake, 'admit'>;
    ledger: Pick<DedupLedger, 'listStranded'>;
    queue: Pick<ProcessingQueue, 'push'>;
    channel: string;
    storeIds: readonly string[];
    config: PipelineConfig['reconcile'];
    eligibleStates?: readonly string[];
    now?: () => Date;
}

// ============================================
// CONFIGURATION
// ============================================

/** Upper bound on stranded claims re-pushed per run */
const STRANDED_BATCH_LIMIT = 500;

// ============================================
// RECONCILER
// ============================================

export class SafetyNetReconciler {
    private interval: NodeJS.Timeout | null = null;
    private isRunning = false;
    private lastRunAt: string | null = null;
    private lastRunResult: ReconcileResult | null = null;
    private readonly now: () => Date;

    constructor(private readonly deps: SafetyNetReconcilerDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * One full reconcile pass. Returns null when a run is already in progress.
     */
    async runOnce(trigger: RunTrigger): Promise<ReconcileResult | null> {
        if (this.isRunning) {
            log.debug({ trigger }, 'Reconcile already in progress, skipping');
            return null;
        }

        this.isRunning = true;
        const startTime = Date.now();
        const startedAt = this.now();
        const result: ReconcileResult = {
            startedAt: startedAt.toISOString(),
            trigger,
            stores: [],
            listed: 0,
            queued: 0,
            duplicate: 0,
            failedStores: 0,
            recovered: 0,
            durationMs: 0,
            error: null,
        };

        try {
            const { lookbackHours, storeConcurrency } = this.deps.config;
            const updatedSince = new Date(startedAt.getTime() - lookbackHours * 3_600_000).toISOString();
            log.info({ trigger, stores: this.deps.storeIds.length, updatedSince }, 'Starting reconcile run');

            // Keys admitted during this run, across all stores
            const seen = new Set<string>();
            const settled = await mapSettled(this.deps.storeIds, storeConcurrency, storeId =>
                this.sweepStore(storeId, updatedSince, seen)
            );

            for (const [index, outcome] of settled.entries()) {
                const sweep: StoreSweepResult =
                    outcome.status === 'fulfilled'
                        ? outcome.value
                        : {
                              storeId: this.deps.storeIds[index] ?? 'unknown',
                              pages: 0,
                              listed: 0,
                              queued: 0,
                              duplicate: 0,
                              error: toError(outcome.reason).message,
                          };
                result.stores.push(sweep);
                result.listed += sweep.listed;
                result.queued += sweep.queued;
                result.duplicate += sweep.duplicate;
                if (sweep.error) result.failedStores++;
            }

            result.recovered = await this.recoverStranded(startedAt);
        } catch (error) {
            result.error = toError(error).message;
            log.error({ error: result.error }, 'Reconcile run failed');
        } finally {
            result.durationMs = Date.now() - startTime;
            this.lastRunAt = this.now().toISOString();
            this.lastRunResult = result;
            this.isRunning = false;
        }

        log.info(
            {
                trigger,
                listed: result.listed,
                queued: result.queued,
                duplicate: result.duplicate,
                failedStores: result.failedStores,
                recovered: result.recovered,
                durationMs: result.durationMs,
            },
            'Reconcile run completed'
        );
        return result;
    }

    /**
     * Page through one store's recent orders. Any error ends this store's
     * sweep and is reported on its result.
     */
    private async sweepStore(storeId: string, updatedSince: string, seen: Set<string>): Promise<StoreSweepResult> {
        const { channel, client, intake } = this.deps;
        const { maxPages } = this.deps.config;
        const result: StoreSweepResult = { storeId, pages: 0, listed: 0, queued: 0, duplicate: 0, error: null };
        const usedTokens = new Set<string>();
        let pageToken: string | null = null;

        try {
            do {
                if (result.pages >= maxPages) {
                    throw new Error(`Pagination exceeded ${maxPages} pages`);
                }

                const page: MarketplaceOrderPage = await client.listOrders(storeId, {
                    states: this.deps.eligibleStates ?? ELIGIBLE_ORDER_STATES,
                    updatedSince,
                    pageToken,
                });
                result.pages++;

                for (const order of page.orders) {
                    result.listed++;
                    const key = orderKeyToString({ channel, sourceOrderId: order.id });
                    if (seen.has(key)) {
                        result.duplicate++;
                        continue;
                    }
                    seen.add(key);

                    const admitted = await intake.admit({
                        channel,
                        sourceOrderId: order.id,
                        source: 'reconciler',
                        resourceHref: order.resource_href,
                    });
                    if (admitted === 'queued') result.queued++;
                    else result.duplicate++;
                }

                const next: string | null = page.next_page_token ?? null;
                if (next !== null && usedTokens.has(next)) {
                    throw new Error(`Page token ${next} repeated`);
                }
                if (next !== null) usedTokens.add(next);
                pageToken = next;
            } while (pageToken !== null);
        } catch (error) {
            result.error = toError(error).message;
            log.warn({ storeId, pages: result.pages, error: result.error }, 'Store sweep aborted');
        }

        log.debug({ ...result }, 'Store sweep finished');
        return result;
    }

    /**
     * Re-push claims open longer than `strandedAfterMinutes` with no outcome
     */
    private async recoverStranded(runStartedAt: Date): Promise<number> {
        const cutoff = new Date(runStartedAt.getTime() - this.deps.config.strandedAfterMinutes * 60_000);
        const stranded = await this.deps.ledger.listStranded(cutoff, STRANDED_BATCH_LIMIT);
        let recovered = 0;

        for (const record of stranded) {
            try {
                const pushed = this.deps.queue.push({
                    channel: record.channel,
                    sourceOrderId: record.sourceOrderId,
                    resourceHref: record.resourceHref,
                    source: 'recovery',
                });
                if (pushed) recovered++;
            } catch (error) {
                log.warn({ error: toError(error).message, remaining: stranded.length - recovered }, 'Stranded recovery stopped');
                break;
            }
        }

        if (recovered > 0) {
            log.info({ recovered, cutoff: cutoff.toISOString() }, 'Re-queued stranded claims');
        }
        return recovered;
    }

    // ============================================
    // SCHEDULER CONTROL
    // ============================================

    start(): void {
        if (this.interval) {
            log.debug('Reconciler already running');
            return;
        }

        const { intervalMinutes } = this.deps.config;
        log.info({ intervalMinutes, stores: this.deps.storeIds.length }, 'Starting reconciler');

        this.launch('startup');
        this.interval = setInterval(() => this.launch('scheduled'), intervalMinutes * 60_000);
        this.interval.unref();
    }

    stop(): void {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
            log.info('Reconciler stopped');
        }
    }

    /** Manual trigger; null when a run is already in progress */
    triggerRun(): Promise<ReconcileResult | null> {
        return this.runOnce('manual');
    }

    getStatus(): ReconcilerStatus {
        return {
            isRunning: this.isRunning,
            schedulerActive: this.interval !== null,
            intervalMinutes: this.deps.config.intervalMinutes,
            lookbackHours: this.deps.config.lookbackHours,
            storeCount: this.deps.storeIds.length,
            lastRunAt: this.lastRunAt,
            lastRunResult: this.lastRunResult,
        };
    }

    private launch(trigger: RunTrigger): void {
        this.runOnce(trigger).catch((error: unknown) => {
            log.error({ trigger, error: toError(error).message }, 'Reconcile run threw');
        });
    }
}
