/**
 * Manual replay of a Failed order
 *
 * Operator action: Failed → Received (a manual-only transition), then
 * re-queue with the resource reference recorded at failure time. The dedup
 * ledger is left as it is; its outcome for the key stays `failed`.
 *
 * A refused push puts the order back to Failed with its original failure,
 * so the operator can replay it again.
 */

import { transitionStatus, type OrderKey } from '@order-bridge/shared/domain';
import type { ReplayResponse } from '@order-bridge/shared/schemas';
import { NotFoundError, StateRaceError, toError } from '../utils/errors.js';
import { ingestLogger as log } from '../utils/logger.js';
import type { OrderStore } from './orderStore/types.js';
import type { ProcessingQueue } from './processingQueue.js';

export interface OrderReplayDeps {
    store: Pick<OrderStore, 'getOrder' | 'upsertOrder'>;
    queue: Pick<ProcessingQueue, 'push'>;
}

/**
 * @throws NotFoundError when the order is unknown
 * @throws StateRaceError when the order is not Failed
 * @throws QueueUnavailableError when the queue is stopped or full
 */
export async function replayFailedOrder(deps: OrderReplayDeps, key: OrderKey): Promise<ReplayResponse> {
    const order = await deps.store.getOrder(key);
    if (!order) {
        throw new NotFoundError(
            `Order ${key.channel}/${key.sourceOrderId} not found`,
            'order',
            `${key.channel}/${key.sourceOrderId}`
        );
    }
    if (order.processingStatus !== 'Failed') {
        throw new StateRaceError(
            `Only Failed orders can be replayed; ${key.sourceOrderId} is ${order.processingStatus}`,
            order.processingStatus
        );
    }

    const resourceHref = order.failure?.resourceHref ?? order.resourceHref;
    const processingStatus = transitionStatus(order.processingStatus, 'Received', true);
    await deps.store.upsertOrder({ ...key, processingStatus, resourceHref, failure: null });

    let queued: boolean;
    try {
        queued = deps.queue.push({ ...key, resourceHref, source: 'replay' });
    } catch (error) {
        await deps.store.upsertOrder({
            ...key,
            processingStatus: order.processingStatus,
            resourceHref: order.resourceHref,
            failure: order.failure,
        });
        log.warn(
            { channel: key.channel, sourceOrderId: key.sourceOrderId, error: toError(error).message },
            'Replay push refused, order left Failed'
        );
        throw error;
    }
    log.info({ channel: key.channel, sourceOrderId: key.sourceOrderId, queued }, 'Failed order replayed');

    return { channel: key.channel, sourceOrderId: key.sourceOrderId, processingStatus, queued };
}
