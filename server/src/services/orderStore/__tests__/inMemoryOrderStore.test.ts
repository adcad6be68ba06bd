/**
 * Tests for the in-memory order store
 */

import type { OrderFailure } from '@order-bridge/shared/domain';
import { InMemoryOrderStore } from '../inMemoryOrderStore.js';

const key = { channel: 'uber_eats', sourceOrderId: 'ord-1' };
const href = 'https://api.marketplace.test/v1/orders/ord-1';

describe('InMemoryOrderStore', () => {
    it('keeps stored fields the write omits', async () => {
        const store = new InMemoryOrderStore();
        const failure: OrderFailure = {
            kind: 'ValidationError',
            message: 'bad payload',
            resourceHref: href,
            at: '2026-03-01T10:00:00.000Z',
        };
        await store.upsertOrder({ ...key, processingStatus: 'Failed', resourceHref: href, failure });

        await store.upsertOrder({ ...key, processingStatus: 'Received', resourceHref: href });

        const stored = await store.getOrder(key);
        expect(stored?.processingStatus).toBe('Received');
        expect(stored?.failure).toEqual(failure);
    });

    it('returns copies', async () => {
        const store = new InMemoryOrderStore();
        await store.upsertOrder({ ...key, processingStatus: 'Received', resourceHref: href });

        const copy = await store.getOrder(key);
        if (copy) copy.processingStatus = 'Exported';

        expect((await store.getOrder(key))?.processingStatus).toBe('Received');
    });

    it('marks only Persisted orders as Exported', async () => {
        const store = new InMemoryOrderStore();
        const other = { channel: 'uber_eats', sourceOrderId: 'ord-2' };
        await store.upsertOrder({ ...key, processingStatus: 'Persisted', resourceHref: href });
        await store.upsertOrder({ ...other, processingStatus: 'Failed', resourceHref: href });

        const marked = await store.markExported([key, other], 'batch-1');

        expect(marked).toBe(1);
        expect(await store.getOrder(key)).toMatchObject({ processingStatus: 'Exported', exportBatchId: 'batch-1' });
        expect((await store.getOrder(other))?.processingStatus).toBe('Failed');
    });

    it('lists by status oldest first and counts every status', async () => {
        let minute = 0;
        const store = new InMemoryOrderStore(() => new Date(Date.UTC(2026, 2, 1, 10, minute++)));
        await store.upsertOrder({ channel: 'uber_eats', sourceOrderId: 'b', processingStatus: 'Persisted', resourceHref: href });
        await store.upsertOrder({ channel: 'uber_eats', sourceOrderId: 'a', processingStatus: 'Persisted', resourceHref: href });
        await store.upsertOrder({ channel: 'uber_eats', sourceOrderId: 'c', processingStatus: 'Skipped', resourceHref: href });

        const persisted = await store.listOrdersByStatus('Persisted', 10);
        const counts = await store.countByStatus();

        expect(persisted.map(o => o.sourceOrderId)).toEqual(['b', 'a']);
        expect(counts.Persisted).toBe(2);
        expect(counts.Skipped).toBe(1);
        expect(counts.Exported).toBe(0);
    });
});
