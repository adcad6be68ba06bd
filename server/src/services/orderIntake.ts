/**
 * Order Intake
 *
 * The single entry point both producers (webhook ingress and the safety-net
 * reconciler) use to hand an order to the pipeline.
 *
 * FLOW:
 * 1. Register the key on the dedup ledger (atomic register-if-absent)
 * 2. Only the caller that inserted pushes to the processing queue
 * 3. Push accepted → mark the claim enqueued
 *    Push refused → release the claim so the next delivery can re-claim it
 *
 * LedgerUnavailableError propagates untouched: without the ledger no order
 * is accepted.
 */

import { orderKeyToString } from '@order-bridge/shared/domain';
import type { DedupLedger, RegisterRequest } from './dedupLedger/types.js';
import type { ProcessingQueue } from './processingQueue.js';
import { QueueUnavailableError, toError } from '../utils/errors.js';
import { ingestLogger } from '../utils/logger.js';

export type AdmitResult = 'queued' | 'duplicate';

export class OrderIntake {
    constructor(
        private readonly ledger: DedupLedger,
        private readonly queue: ProcessingQueue
    ) {}

    /**
     * @throws LedgerUnavailableError when the ledger cannot be reached
     * @throws QueueUnavailableError when the queue refused the item (claim released)
     */
    async admit(request: RegisterRequest): Promise<AdmitResult> {
        const key = orderKeyToString(request);
        const registration = await this.ledger.register(request);

        if (registration.status === 'already-present') {
            ingestLogger.debug({ key, source: request.source }, 'Duplicate order reference');
            return 'duplicate';
        }

        try {
            // false means another claim of this key is already queued; the
            // order is still on its way, so the claim stays
            this.queue.push({
                channel: request.channel,
                sourceOrderId: request.sourceOrderId,
                resourceHref: request.resourceHref,
                source: request.source,
            });
        } catch (error) {
            await this.releaseAfterPushFailure(request, error);
            throw error instanceof QueueUnavailableError
                ? error
                : new QueueUnavailableError(`Queue push failed: ${toError(error).message}`);
        }

        try {
            await this.ledger.markEnqueued(request);
        } catch (error) {
            // Item is queued; the claim stays 'claimed' and recovery may re-push it later
            ingestLogger.warn({ key, error: toError(error).message }, 'Failed to mark claim enqueued');
        }

        ingestLogger.info(
            { channel: request.channel, sourceOrderId: request.sourceOrderId, source: request.source },
            'Order admitted'
        );
        return 'queued';
    }

    private async releaseAfterPushFailure(request: RegisterRequest, pushError: unknown): Promise<void> {
        const key = orderKeyToString(request);
        ingestLogger.error({ key, error: toError(pushError).message }, 'Queue push failed, releasing claim');

        try {
            await this.ledger.releaseClaim(request);
        } catch (releaseError) {
            ingestLogger.error(
                { key, error: toError(releaseError).message },
                'Failed to release claim; key stays claimed until stranded-claim recovery'
            );
        }
    }
}
