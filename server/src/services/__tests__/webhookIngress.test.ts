/**
 * Tests for webhook ingress: signature, parsing, status filter and intake
 */

import { InMemoryDedupLedger } from '../dedupLedger/inMemoryLedger.js';
import type { DedupLedger } from '../dedupLedger/types.js';
import { OrderIntake } from '../orderIntake.js';
import { ProcessingQueue } from '../processingQueue.js';
import { handleOrderWebhook, signWebhookBody, verifyWebhookSignature, type WebhookIngressDeps } from '../webhookIngress.js';
import { toErrorResponse } from '../../middleware/errorHandler.js';
import { LedgerUnavailableError } from '../../utils/errors.js';

const SECRET = 'test-secret';

function body(status = 'HANDED_OFF', orderId = 'ord-7'): Buffer {
    return Buffer.from(
        JSON.stringify({
            event_type: 'orders.notification',
            resource_href: `https://api.marketplace.test/v1/orders/${orderId}`,
            meta: { order_id: orderId, store_id: 'st-1', status },
        })
    );
}

function setup(ledger: DedupLedger = new InMemoryDedupLedger(), maxDepth = 10) {
    const queue = new ProcessingQueue({ concurrency: 1, maxDepth });
    const deps: WebhookIngressDeps = {
        intake: new OrderIntake(ledger, queue),
        secret: SECRET,
        channel: 'uber_eats',
        ackDeadlineMs: 1000,
    };
    return { deps, queue, ledger };
}

/** Run the handler and map the outcome the way the route does */
async function deliver(deps: WebhookIngressDeps, raw: Buffer, signature: string | undefined) {
    try {
        return { status: 200, body: await handleOrderWebhook(deps, raw, signature) };
    } catch (error) {
        return toErrorResponse(error);
    }
}

describe('verifyWebhookSignature', () => {
    it('accepts the hex HMAC of the raw body', () => {
        const raw = body();
        expect(verifyWebhookSignature(raw, signWebhookBody(raw, SECRET), SECRET)).toBe(true);
    });

    it('rejects a missing, short or foreign signature', () => {
        const raw = body();
        expect(verifyWebhookSignature(raw, undefined, SECRET)).toBe(false);
        expect(verifyWebhookSignature(raw, 'abc', SECRET)).toBe(false);
        expect(verifyWebhookSignature(raw, signWebhookBody(raw, 'other-secret'), SECRET)).toBe(false);
    });
});

describe('handleOrderWebhook', () => {
    it('returns 401 and queues nothing for a bad signature', async () => {
        const { deps, queue } = setup();
        const response = await deliver(deps, body(), 'deadbeef');

        expect(response.status).toBe(401);
        expect(queue.getStats().pushed).toBe(0);
    });

    it('returns 400 for a body that is not JSON', async () => {
        const { deps } = setup();
        const raw = Buffer.from('{not json');
        const response = await deliver(deps, raw, signWebhookBody(raw, SECRET));

        expect(response.status).toBe(400);
    });

    it('returns 400 for a body missing required fields', async () => {
        const { deps } = setup();
        const raw = Buffer.from(JSON.stringify({ event_type: 'orders.notification' }));
        const response = await deliver(deps, raw, signWebhookBody(raw, SECRET));

        expect(response.status).toBe(400);
        expect(response.body).toMatchObject({ type: 'ValidationError' });
    });

    it('acknowledges and ignores a non-qualifying status', async () => {
        const { deps, queue, ledger } = setup();
        const raw = body('PREPARING');
        const response = await deliver(deps, raw, signWebhookBody(raw, SECRET));

        expect(response).toEqual({ status: 200, body: { received: true, ignored: true } });
        expect(queue.getStats().pushed).toBe(0);
        expect(await ledger.getRecord({ channel: 'uber_eats', sourceOrderId: 'ord-7' })).toBeNull();
    });

    it('queues the first delivery and reports repeats as duplicates', async () => {
        const { deps, queue } = setup();
        const raw = body();
        const signature = signWebhookBody(raw, SECRET);

        expect(await deliver(deps, raw, signature)).toEqual({ status: 200, body: { received: true, queued: true } });
        expect(await deliver(deps, raw, signature)).toEqual({ status: 200, body: { received: true, duplicate: true } });
        expect(queue.getStats().pushed).toBe(1);
    });

    it('returns 500 and releases the claim when the queue is full', async () => {
        const { deps, ledger } = setup(new InMemoryDedupLedger(), 0);
        const raw = body();
        const response = await deliver(deps, raw, signWebhookBody(raw, SECRET));

        expect(response.status).toBe(500);
        expect((await ledger.getRecord({ channel: 'uber_eats', sourceOrderId: 'ord-7' }))?.claimState).toBe('released');
    });

    it('returns 503 and pushes nothing while the ledger is unavailable', async () => {
        const ledger = new InMemoryDedupLedger();
        vi.spyOn(ledger, 'register').mockRejectedValue(new LedgerUnavailableError());
        const { deps, queue } = setup(ledger);
        const raw = body();
        const response = await deliver(deps, raw, signWebhookBody(raw, SECRET));

        expect(response.status).toBe(503);
        expect(queue.getStats().pushed).toBe(0);
    });

    it('returns 500 when intake misses the acknowledgment deadline', async () => {
        const deps: WebhookIngressDeps = {
            intake: { admit: () => new Promise(() => {}) },
            secret: SECRET,
            channel: 'uber_eats',
            ackDeadlineMs: 10,
        };
        const raw = body();
        const response = await deliver(deps, raw, signWebhookBody(raw, SECRET));

        expect(response.status).toBe(500);
        expect(response.body).toMatchObject({ type: 'DeadlineExceededError' });
    });
});
