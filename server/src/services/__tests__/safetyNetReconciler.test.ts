/**
 * Tests for the safety-net reconciler: pagination, isolation and recovery
 */

import type { MarketplaceOrderPage } from '@order-bridge/shared/schemas';
import { InMemoryDedupLedger } from '../dedupLedger/inMemoryLedger.js';
import type { ListOrdersQuery } from '../marketplace/types.js';
import { OrderIntake } from '../orderIntake.js';
import { ProcessingQueue } from '../processingQueue.js';
import { SafetyNetReconciler } from '../safetyNetReconciler.js';
import { TransientUpstreamError } from '../../utils/errors.js';
import { hrefFor } from './fixtures.js';

/** storeId → page token ('' for the first page) → page */
type PageScript = Record<string, Record<string, MarketplaceOrderPage>>;

function page(storeId: string, ids: string[], next: string | null = null): MarketplaceOrderPage {
    return {
        orders: ids.map(id => ({ id, store_id: storeId, state: 'DELIVERED', resource_href: hrefFor(id) })),
        next_page_token: next,
    };
}

function ids(prefix: string, count: number): string[] {
    return Array.from({ length: count }, (_, i) => `${prefix}-${i + 1}`);
}

function setup(script: PageScript, storeIds: string[], options: { now?: () => Date; ledger?: InMemoryDedupLedger } = {}) {
    const ledger = options.ledger ?? new InMemoryDedupLedger();
    const queue = new ProcessingQueue({ concurrency: 1, maxDepth: 1000 });
    const listOrders = vi.fn(async (storeId: string, query: ListOrdersQuery) => {
        if (storeId === 'st-down') {
            throw new TransientUpstreamError('GET store orders failed after 4 attempts', 'marketplace', null, 4);
        }
        const scripted = script[storeId]?.[query.pageToken ?? ''];
        if (!scripted) throw new Error(`No page scripted for ${storeId}/${query.pageToken ?? ''}`);
        return scripted;
    });

    const reconciler = new SafetyNetReconciler({
        client: { listOrders },
        intake: new OrderIntake(ledger, queue),
        ledger,
        queue,
        channel: 'uber_eats',
        storeIds,
        config: { intervalMinutes: 15, lookbackHours: 24, storeConcurrency: 2, strandedAfterMinutes: 30, maxPages: 5 },
        now: options.now ?? (() => new Date('2026-03-14T12:00:00Z')),
    });

    return { reconciler, ledger, queue, listOrders };
}

describe('SafetyNetReconciler.runOnce', () => {
    it('registers every order across a 3-page token chain', async () => {
        const { reconciler, ledger, queue } = setup(
            {
                'st-1': {
                    '': page('st-1', ids('a', 50), 'p2'),
                    p2: page('st-1', ids('b', 50), 'p3'),
                    p3: page('st-1', ids('c', 50)),
                },
            },
            ['st-1']
        );

        const result = await reconciler.runOnce('manual');

        expect(ledger.size).toBe(150);
        expect(queue.getStats().waiting).toBe(150);
        expect(result).toMatchObject({ listed: 150, queued: 150, duplicate: 0, failedStores: 0 });
        expect(result?.stores[0]?.pages).toBe(3);
    });

    it('queries eligible states updated within the lookback window', async () => {
        const { reconciler, listOrders } = setup({ 'st-1': { '': page('st-1', []) } }, ['st-1']);

        await reconciler.runOnce('manual');

        expect(listOrders).toHaveBeenCalledWith('st-1', {
            states: ['HANDED_OFF', 'DELIVERED', 'COMPLETED'],
            updatedSince: '2026-03-13T12:00:00.000Z',
            pageToken: null,
        });
    });

    it('keeps sweeping other stores when one fails', async () => {
        const { reconciler, queue } = setup({ 'st-2': { '': page('st-2', ['ord-1', 'ord-2']) } }, ['st-down', 'st-2']);

        const result = await reconciler.runOnce('scheduled');

        expect(result?.failedStores).toBe(1);
        expect(result?.stores[0]).toMatchObject({
            storeId: 'st-down',
            error: 'GET store orders failed after 4 attempts',
        });
        expect(result?.stores[1]).toMatchObject({ storeId: 'st-2', queued: 2, error: null });
        expect(queue.getStats().waiting).toBe(2);
    });

    it('admits an order listed twice in one run only once', async () => {
        const { reconciler, queue } = setup(
            { 'st-1': { '': page('st-1', ['ord-1'], 'p2'), p2: page('st-1', ['ord-1']) } },
            ['st-1']
        );

        const result = await reconciler.runOnce('manual');

        expect(result).toMatchObject({ listed: 2, queued: 1, duplicate: 1 });
        expect(queue.getStats().pushed).toBe(1);
    });

    it('aborts a store whose page token repeats', async () => {
        const { reconciler } = setup(
            { 'st-1': { '': page('st-1', ['ord-1'], 'loop'), loop: page('st-1', ['ord-2'], 'loop') } },
            ['st-1']
        );

        const result = await reconciler.runOnce('manual');

        expect(result?.stores[0]).toMatchObject({ pages: 2, queued: 2, error: 'Page token loop repeated' });
    });

    it('stops a store after the page limit', async () => {
        const script: Record<string, MarketplaceOrderPage> = { '': page('st-1', [], 't1') };
        for (let i = 1; i <= 6; i++) script[`t${i}`] = page('st-1', [], `t${i + 1}`);
        const { reconciler } = setup({ 'st-1': script }, ['st-1']);

        const result = await reconciler.runOnce('manual');

        expect(result?.stores[0]).toMatchObject({ pages: 5, error: 'Pagination exceeded 5 pages' });
    });

    it('re-queues claims stranded longer than the threshold', async () => {
        let current = new Date('2026-03-14T11:00:00Z');
        const ledger = new InMemoryDedupLedger(() => current);
        await ledger.register({ channel: 'uber_eats', sourceOrderId: 'ord-old', source: 'webhook', resourceHref: hrefFor('ord-old') });
        current = new Date('2026-03-14T11:50:00Z');
        await ledger.register({ channel: 'uber_eats', sourceOrderId: 'ord-new', source: 'webhook', resourceHref: hrefFor('ord-new') });
        current = new Date('2026-03-14T12:00:00Z');

        const { reconciler, queue } = setup({}, [], { ledger, now: () => current });
        const result = await reconciler.runOnce('manual');

        expect(result?.recovered).toBe(1);
        expect(queue.isKeyQueued({ channel: 'uber_eats', sourceOrderId: 'ord-old' })).toBe(true);
        expect(queue.isKeyQueued({ channel: 'uber_eats', sourceOrderId: 'ord-new' })).toBe(false);
    });

    it('skips a run while the previous one is still going', async () => {
        const { reconciler } = setup({ 'st-1': { '': page('st-1', ['ord-1']) } }, ['st-1']);

        const [first, second] = await Promise.all([reconciler.runOnce('scheduled'), reconciler.runOnce('manual')]);

        expect(first?.queued).toBe(1);
        expect(second).toBeNull();
        expect(reconciler.getStatus()).toMatchObject({ isRunning: false, lastRunResult: first });
    });
});
