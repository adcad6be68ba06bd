/**
 * Tests for the marketplace client's request shapes and retry policy
 */

import { MarketplaceClient, isTransientRequestError } from '../client.js';
import { StaticTokenProvider } from '../tokenProvider.js';
import { CircuitBreaker } from '../../../utils/circuitBreaker.js';
import { TransientUpstreamError, ValidationError } from '../../../utils/errors.js';
import { scriptedAdapter, type ScriptedReply } from './scriptedAdapter.js';

const HREF = 'https://api.marketplace.test/v1/orders/ord-1';

function build(replies: ScriptedReply[], circuitOptions: { failureThreshold?: number } = {}) {
    const { adapter, requests } = scriptedAdapter(replies);
    const delays: number[] = [];
    const client = new MarketplaceClient({
        baseUrl: 'https://api.marketplace.test',
        tokenProvider: new StaticTokenProvider('test-token'),
        timeoutMs: 1000,
        maxAttempts: 4,
        baseDelayMs: 500,
        adapter,
        circuit: new CircuitBreaker('test_marketplace', { ...circuitOptions, isFailure: isTransientRequestError }),
        sleep: async ms => {
            delays.push(ms);
        },
    });
    return { client, requests, delays };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    return null;
}

describe('MarketplaceClient.getOrder', () => {
    it('requests the expanded detail resource with a bearer token', async () => {
        const { client, requests } = build([{ status: 200, data: { id: 'ord-1' } }]);

        await expect(client.getOrder(HREF)).resolves.toEqual({ id: 'ord-1' });
        expect(requests[0]?.url).toBe(HREF);
        expect(requests[0]?.params).toEqual({ expand: 'cart,delivery,payment' });
        expect(requests[0]?.headers.Authorization).toBe('Bearer test-token');
    });

    it('retries 5xx with doubling delays', async () => {
        const { client, requests, delays } = build([{ status: 503 }, { status: 502 }, { status: 200, data: {} }]);

        await client.getOrder(HREF);
        expect(requests).toHaveLength(3);
        expect(delays).toEqual([500, 1000]);
    });

    it('honours Retry-After on 429', async () => {
        const { client, delays } = build([{ status: 429, headers: { 'retry-after': '2' } }, { status: 200, data: {} }]);

        await client.getOrder(HREF);
        expect(delays).toEqual([2000]);
    });

    it('does not retry other 4xx', async () => {
        const { client, requests } = build([{ status: 404 }]);

        const error = await captureError(client.getOrder(HREF));
        expect(error).toBeInstanceOf(ValidationError);
        expect(requests).toHaveLength(1);
    });

    it('gives up with TransientUpstreamError after the last attempt', async () => {
        const { client, requests, delays } = build([
            new Error('socket hang up'),
            new Error('socket hang up'),
            new Error('socket hang up'),
            new Error('socket hang up'),
        ]);

        const error = await captureError(client.getOrder(HREF));
        expect(error).toBeInstanceOf(TransientUpstreamError);
        expect(error).toMatchObject({ attempts: 4, serviceName: 'marketplace' });
        expect(requests).toHaveLength(4);
        expect(delays).toEqual([500, 1000, 2000]);
    });

    it('treats an open circuit as transient without calling the API', async () => {
        const { client, requests } = build([{ status: 500 }], { failureThreshold: 1 });

        const error = await captureError(client.getOrder(HREF));
        expect(error).toBeInstanceOf(TransientUpstreamError);
        expect(requests).toHaveLength(1);
        expect(client.getCircuitStatus().state).toBe('OPEN');
    });
});

describe('MarketplaceClient.listOrders', () => {
    it('sends states, updated_since and the page token', async () => {
        const { client, requests } = build([
            {
                status: 200,
                data: {
                    orders: [{ id: 'ord-1', store_id: 'st-1', state: 'DELIVERED', resource_href: HREF }],
                    next_page_token: 'p2',
                },
            },
        ]);

        const page = await client.listOrders('st-1', {
            states: ['HANDED_OFF', 'DELIVERED'],
            updatedSince: '2026-03-14T00:00:00.000Z',
            pageToken: 'p1',
        });

        expect(page.next_page_token).toBe('p2');
        expect(page.orders).toHaveLength(1);
        expect(requests[0]?.url).toBe('/v1/stores/st-1/orders');
        expect(requests[0]?.params).toEqual({
            states: 'HANDED_OFF,DELIVERED',
            updated_since: '2026-03-14T00:00:00.000Z',
            page_token: 'p1',
        });
    });

    it('rejects a malformed page', async () => {
        const { client } = build([{ status: 200, data: { items: [] } }]);

        const error = await captureError(
            client.listOrders('st-1', { states: ['DELIVERED'], updatedSince: '2026-03-14T00:00:00.000Z' })
        );
        expect(error).toBeInstanceOf(ValidationError);
    });
});
