/**
 * Order Fetcher
 *
 * Retrieves the full order for a queue item and decides whether it is
 * still eligible for ingestion.
 *
 * OUTCOMES:
 * - valid, eligible order          → MarketplaceOrder
 * - state outside the eligible set → StateRaceError   (order Skipped)
 * - body fails schema / wrong id   → ValidationError  (order Failed)
 * - retries exhausted              → TransientUpstreamError from the client (order Failed)
 */

import { marketplaceOrderSchema, type MarketplaceOrder } from '@order-bridge/shared/schemas';
import { ELIGIBLE_ORDER_STATES } from '../config/pipeline.js';
import { StateRaceError, ValidationError } from '../utils/errors.js';
import { fetchLogger as log } from '../utils/logger.js';
import type { MarketplaceClient } from './marketplace/client.js';
import type { QueueItem } from './processingQueue.js';

export type OrderDetailSource = Pick<MarketplaceClient, 'getOrder'>;

export class OrderFetcher {
    constructor(
        private readonly client: OrderDetailSource,
        private readonly eligibleStates: readonly string[] = ELIGIBLE_ORDER_STATES
    ) {}

    async fetch(item: QueueItem, signal?: AbortSignal): Promise<MarketplaceOrder> {
        const started = Date.now();
        const body = await this.client.getOrder(item.resourceHref, signal);

        const parsed = marketplaceOrderSchema.safeParse(body);
        if (!parsed.success) {
            throw new ValidationError(`Order ${item.sourceOrderId} failed schema validation`, parsed.error.issues);
        }

        const order = parsed.data;
        if (order.id !== item.sourceOrderId) {
            throw new ValidationError(
                `Order resource returned id ${order.id}, expected ${item.sourceOrderId}`,
                { resourceHref: item.resourceHref }
            );
        }

        if (!this.eligibleStates.includes(order.state)) {
            throw new StateRaceError(`Order ${order.id} is ${order.state}, no longer eligible`, order.state);
        }

        log.debug(
            { channel: item.channel, sourceOrderId: item.sourceOrderId, durationMs: Date.now() - started },
            'Order fetched'
        );
        return order;
    }
}
