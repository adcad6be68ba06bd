/**
 * Order Pipeline
 *
 * Queue worker: fetch → transform → persist for one order key, with every
 * status change validated against the processing status table.
 *
 * STATUS FLOW:
 *   Received → Fetched → Transformed → Persisted
 *       ↓          ↓          ↓
 *    Skipped/   Skipped/   Skipped/
 *    Failed     Failed     Failed
 *
 * REDELIVERY:
 * - Stored Persisted/Exported/Skipped/Failed → record the ledger outcome, stop
 * - Stored Received/Fetched/Transformed (crash mid-flight) → resume; stages
 *   already reached are not written again
 * - Item carrying a bundle (earlier persistence failure) → no re-fetch
 *
 * An aborted signal stops the item before its next durable write.
 */

import {
    e5ToMinor,
    formatMinor,
    transformOrder,
    transitionStatus,
    type FailureKind,
    type NormalizedOrderBundle,
    type OrderKey,
    type ProcessingStatus,
    type TransformContext,
} from '@order-bridge/shared/domain';
import type { MarketplaceOrder } from '@order-bridge/shared/schemas';
import { TransformError } from '@order-bridge/shared/errors';
import type { DedupLedger, LedgerOutcome } from './dedupLedger/types.js';
import type { OrderStore, OrderWrite } from './orderStore/types.js';
import type { OrderFetcher } from './orderFetcher.js';
import type { ProcessingQueue, QueueHandler, QueueItem } from './processingQueue.js';
import type { PipelineConfig } from '../config/pipeline.js';
import { PersistenceError, StateRaceError, TransientUpstreamError, ValidationError, toError } from '../utils/errors.js';
import { backoffDelay, sleep as defaultSleep, type Sleep } from '../utils/async.js';
import { pipelineLogger as log } from '../utils/logger.js';

// ============================================
// TYPES
// ============================================

export type PipelineResult = 'persisted' | 'skipped' | 'failed' | 'already-complete' | 'requeued' | 'aborted';

export interface OrderPipelineDeps {
    store: OrderStore;
    ledger: DedupLedger;
    fetcher: Pick<OrderFetcher, 'fetch'>;
    queue: Pick<ProcessingQueue, 'pushDelayed'>;
    transformContext: TransformContext;
    persist: PipelineConfig['persist'];
    sleep?: Sleep;
    now?: () => Date;
}

export interface FailureClassification {
    status: 'Skipped' | 'Failed';
    kind: FailureKind;
}

/** Stages a resumed item may already have reached, in order */
const INGEST_STAGES: readonly ProcessingStatus[] = ['Received', 'Fetched', 'Transformed'];

const OUTCOME_BY_STATUS: Partial<Record<ProcessingStatus, LedgerOutcome>> = {
    Persisted: 'persisted',
    Exported: 'persisted',
    Skipped: 'skipped',
    Failed: 'failed',
};

// ============================================
// HELPERS
// ============================================

/**
 * Map an error to the order's fate. Null means "not a data outcome":
 * persistence problems and bugs leave the order where it is.
 */
export function classifyFailure(error: unknown): FailureClassification | null {
    if (error instanceof StateRaceError) return { status: 'Skipped', kind: 'StateRaceError' };
    if (error instanceof TransientUpstreamError) return { status: 'Failed', kind: 'TransientUpstreamError' };
    if (error instanceof ValidationError || error instanceof TransformError) {
        return { status: 'Failed', kind: 'ValidationError' };
    }
    return null;
}

function stageIndex(status: ProcessingStatus | null): number {
    return status === null ? -1 : INGEST_STAGES.indexOf(status);
}

// ============================================
// PIPELINE
// ============================================

export class OrderPipeline {
    private readonly sleep: Sleep;
    private readonly now: () => Date;

    constructor(private readonly deps: OrderPipelineDeps) {
        this.sleep = deps.sleep ?? defaultSleep;
        this.now = deps.now ?? (() => new Date());
    }

    /** Queue consumer bound to this pipeline */
    readonly handler: QueueHandler = async (item, signal) => {
        await this.process(item, signal);
    };

    async process(item: QueueItem, signal: AbortSignal): Promise<PipelineResult> {
        const key: OrderKey = { channel: item.channel, sourceOrderId: item.sourceOrderId };
        const logCtx = { channel: item.channel, sourceOrderId: item.sourceOrderId, source: item.source };
        let current: ProcessingStatus | null = null;
        let bundle: NormalizedOrderBundle | undefined = item.bundle;

        try {
            const stored = await this.deps.store.getOrder(key);
            current = stored?.processingStatus ?? null;

            const settledOutcome = current === null ? undefined : OUTCOME_BY_STATUS[current];
            if (settledOutcome) {
                log.info({ ...logCtx, status: current }, 'Order already settled, skipping redelivery');
                await this.recordOutcome(key, settledOutcome);
                return 'already-complete';
            }

            if (bundle) {
                // Fetch and transform already happened in an earlier round
                for (const stage of INGEST_STAGES) {
                    current = await this.advance(item, current, stage, signal);
                }
            } else {
                current = await this.advance(item, current, 'Received', signal);
                const source = await this.deps.fetcher.fetch(item, signal);
                current = await this.advance(item, current, 'Fetched', signal);
                bundle = transformOrder(source, this.deps.transformContext);
                this.warnOnTotalMismatch(source, bundle);
                current = await this.advance(item, current, 'Transformed', signal);
            }

            const persisted = await this.persistWithRetry(item, current, bundle, signal);
            if (!persisted) {
                this.requeue(item, bundle);
                return 'requeued';
            }

            log.info({ ...logCtx, lines: bundle.lines.length, total: formatMinor(bundle.order.total) }, 'Order persisted');
            await this.recordOutcome(key, 'persisted');
            return 'persisted';
        } catch (error) {
            if (signal.aborted) {
                log.info({ ...logCtx, status: current }, 'Order processing aborted');
                return 'aborted';
            }

            if (error instanceof PersistenceError) {
                log.warn({ ...logCtx, error: error.message }, 'Order store unavailable, re-queueing');
                this.requeue(item, bundle);
                return 'requeued';
            }

            const classification = classifyFailure(error);
            if (!classification || current === null) throw error;

            return this.settleFailure(item, current, classification, toError(error));
        }
    }

    // ============================================
    // STATUS WRITES
    // ============================================

    /**
     * Move to `target`, validating the transition. A stage the order has
     * already reached is not written again.
     */
    private async advance(
        item: QueueItem,
        current: ProcessingStatus | null,
        target: ProcessingStatus,
        signal: AbortSignal | undefined,
        extra: Pick<OrderWrite, 'bundle' | 'failure'> = {}
    ): Promise<ProcessingStatus> {
        const targetStage = stageIndex(target);
        if (targetStage !== -1 && targetStage <= stageIndex(current)) {
            return current ?? target;
        }
        if (current !== null) {
            transitionStatus(current, target);
        }

        signal?.throwIfAborted();
        await this.deps.store.upsertOrder({
            channel: item.channel,
            sourceOrderId: item.sourceOrderId,
            processingStatus: target,
            resourceHref: item.resourceHref,
            ...extra,
        });
        log.debug({ channel: item.channel, sourceOrderId: item.sourceOrderId, from: current, to: target }, 'Status advanced');
        return target;
    }

    /**
     * @returns false when every attempt hit PersistenceError
     */
    private async persistWithRetry(
        item: QueueItem,
        current: ProcessingStatus | null,
        bundle: NormalizedOrderBundle,
        signal: AbortSignal
    ): Promise<boolean> {
        const { maxAttempts, attemptDelayMs } = this.deps.persist;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                await this.advance(item, current, 'Persisted', signal, { bundle, failure: null });
                return true;
            } catch (error) {
                if (!(error instanceof PersistenceError)) throw error;

                log.warn(
                    { channel: item.channel, sourceOrderId: item.sourceOrderId, attempt, maxAttempts, error: error.message },
                    'Persist attempt failed'
                );
                if (attempt < maxAttempts) {
                    await this.sleep(backoffDelay(attemptDelayMs, attempt), signal);
                }
            }
        }
        return false;
    }

    private async settleFailure(
        item: QueueItem,
        current: ProcessingStatus,
        classification: FailureClassification,
        error: Error
    ): Promise<PipelineResult> {
        const logCtx = { channel: item.channel, sourceOrderId: item.sourceOrderId, kind: classification.kind };

        try {
            // Aborted items never reach classification
            await this.advance(item, current, classification.status, undefined, {
                failure: {
                    kind: classification.kind,
                    message: error.message,
                    resourceHref: item.resourceHref,
                    at: this.now().toISOString(),
                },
            });
        } catch (writeError) {
            if (!(writeError instanceof PersistenceError)) throw writeError;
            log.error(
                { ...logCtx, error: writeError.message },
                'Could not record order failure; claim left for stranded-claim recovery'
            );
            return 'requeued';
        }

        if (classification.status === 'Skipped') {
            log.info({ ...logCtx, reason: error.message }, 'Order skipped');
            await this.recordOutcome(item, 'skipped');
            return 'skipped';
        }

        log.warn({ ...logCtx, error: error.message }, 'Order failed');
        await this.recordOutcome(item, 'failed');
        return 'failed';
    }

    // ============================================
    // SIDE CHANNELS
    // ============================================

    private requeue(item: QueueItem, bundle: NormalizedOrderBundle | undefined): void {
        const next: QueueItem = { ...item, bundle, persistRounds: (item.persistRounds ?? 0) + 1 };
        try {
            this.deps.queue.pushDelayed(next, this.deps.persist.retryDelayMs);
        } catch (error) {
            log.error(
                { channel: item.channel, sourceOrderId: item.sourceOrderId, error: toError(error).message },
                'Re-queue refused; claim left for stranded-claim recovery'
            );
        }
    }

    private async recordOutcome(key: OrderKey, outcome: LedgerOutcome): Promise<void> {
        try {
            const written = await this.deps.ledger.recordOutcome(key, outcome);
            if (!written) {
                log.debug({ channel: key.channel, sourceOrderId: key.sourceOrderId, outcome }, 'Ledger outcome already recorded');
            }
        } catch (error) {
            log.warn(
                { channel: key.channel, sourceOrderId: key.sourceOrderId, outcome, error: toError(error).message },
                'Failed to record ledger outcome'
            );
        }
    }

    private warnOnTotalMismatch(source: MarketplaceOrder, bundle: NormalizedOrderBundle): void {
        const sourceTotal = source.payment.charges.total;
        if (!sourceTotal) return;

        const expected = e5ToMinor(sourceTotal.amount_e5);
        if (expected !== bundle.order.total) {
            log.warn(
                {
                    channel: bundle.order.channel,
                    sourceOrderId: bundle.order.sourceOrderId,
                    sourceTotal: formatMinor(expected),
                    derivedTotal: formatMinor(bundle.order.total),
                },
                'Derived total differs from marketplace total'
            );
        }
    }
}
