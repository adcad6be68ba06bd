/**
 * Tests for the order fetcher's validation and eligibility checks
 */

import { OrderFetcher, type OrderDetailSource } from '../orderFetcher.js';
import type { QueueItem } from '../processingQueue.js';
import { StateRaceError, TransientUpstreamError, ValidationError } from '../../utils/errors.js';
import { hrefFor, orderBody } from './fixtures.js';

const item: QueueItem = {
    channel: 'uber_eats',
    sourceOrderId: 'ord-5',
    resourceHref: hrefFor('ord-5'),
    source: 'webhook',
};

function sourceReturning(body: unknown): OrderDetailSource {
    return { getOrder: vi.fn(async () => body) };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    return null;
}

describe('OrderFetcher', () => {
    it('returns the parsed order with defaults applied', async () => {
        const fetcher = new OrderFetcher(sourceReturning(orderBody('ord-5')));
        const order = await fetcher.fetch(item);

        expect(order.id).toBe('ord-5');
        expect(order.cart.items).toHaveLength(1);
        expect(order.payment.fees).toEqual([]);
    });

    it('passes the resource href and signal to the client', async () => {
        const source = sourceReturning(orderBody('ord-5'));
        const controller = new AbortController();
        await new OrderFetcher(source).fetch(item, controller.signal);

        expect(source.getOrder).toHaveBeenCalledWith(hrefFor('ord-5'), controller.signal);
    });

    it('raises a state race for an order no longer eligible', async () => {
        const fetcher = new OrderFetcher(sourceReturning(orderBody('ord-5', { state: 'CANCELED' })));
        const error = await captureError(fetcher.fetch(item));

        expect(error).toBeInstanceOf(StateRaceError);
        expect(error).toMatchObject({ observedState: 'CANCELED' });
    });

    it('rejects a body that fails the schema', async () => {
        const fetcher = new OrderFetcher(sourceReturning({ id: 'ord-5' }));
        expect(await captureError(fetcher.fetch(item))).toBeInstanceOf(ValidationError);
    });

    it('rejects a resource for a different order', async () => {
        const fetcher = new OrderFetcher(sourceReturning(orderBody('ord-6')));
        expect(await captureError(fetcher.fetch(item))).toBeInstanceOf(ValidationError);
    });

    it('lets transient upstream errors through', async () => {
        const fetcher = new OrderFetcher({
            getOrder: async () => {
                throw new TransientUpstreamError('down', 'marketplace', null, 4);
            },
        });
        expect(await captureError(fetcher.fetch(item))).toBeInstanceOf(TransientUpstreamError);
    });
});
