/**
 * Tests for the in-memory dedup ledger
 */

import { InMemoryDedupLedger } from '../inMemoryLedger.js';
import type { RegisterRequest } from '../types.js';

const request: RegisterRequest = {
    channel: 'uber_eats',
    sourceOrderId: 'ord-1',
    source: 'webhook',
    resourceHref: 'https://api.marketplace.test/v1/orders/ord-1',
};

function clock(start: string) {
    let current = new Date(start).getTime();
    return {
        now: () => new Date(current),
        advanceMinutes: (minutes: number) => {
            current += minutes * 60_000;
        },
    };
}

describe('InMemoryDedupLedger', () => {
    it('inserts the first registration and reports later ones as present', async () => {
        const ledger = new InMemoryDedupLedger();

        const first = await ledger.register(request);
        const second = await ledger.register({ ...request, source: 'reconciler' });

        expect(first.status).toBe('inserted');
        expect(second.status).toBe('already-present');
        expect(second.record.source).toBe('webhook');
        expect(ledger.size).toBe(1);
    });

    it('lets exactly one of many concurrent registrations win', async () => {
        const ledger = new InMemoryDedupLedger();

        const results = await Promise.all(Array.from({ length: 20 }, () => ledger.register(request)));

        expect(results.filter(r => r.status === 'inserted')).toHaveLength(1);
    });

    it('re-claims a released key with no outcome', async () => {
        const ledger = new InMemoryDedupLedger();
        await ledger.register(request);
        await ledger.releaseClaim(request);

        const retry = await ledger.register(request);

        expect(retry.status).toBe('inserted');
        expect(retry.record.claimState).toBe('claimed');
    });

    it('never re-claims once an outcome is recorded', async () => {
        const ledger = new InMemoryDedupLedger();
        await ledger.register(request);
        await ledger.recordOutcome(request, 'persisted');
        await ledger.releaseClaim(request);

        const retry = await ledger.register(request);

        expect(retry.status).toBe('already-present');
        expect(retry.record.claimState).toBe('claimed');
    });

    it('writes the outcome once', async () => {
        const ledger = new InMemoryDedupLedger();
        await ledger.register(request);

        expect(await ledger.recordOutcome(request, 'skipped')).toBe(true);
        expect(await ledger.recordOutcome(request, 'failed')).toBe(false);
        expect((await ledger.getRecord(request))?.outcome).toBe('skipped');
    });

    it('keeps identity and first-seen time on re-claim', async () => {
        const time = clock('2026-03-01T10:00:00Z');
        const ledger = new InMemoryDedupLedger(time.now);
        await ledger.register(request);
        await ledger.releaseClaim(request);
        time.advanceMinutes(5);

        const retry = await ledger.register({ ...request, source: 'reconciler' });

        expect(retry.record.firstSeenAt).toBe('2026-03-01T10:00:00.000Z');
        expect(retry.record.claimedAt).toBe('2026-03-01T10:05:00.000Z');
        expect(retry.record.source).toBe('webhook');
    });

    it('lists stranded claims oldest first, excluding released and finished keys', async () => {
        const time = clock('2026-03-01T10:00:00Z');
        const ledger = new InMemoryDedupLedger(time.now);
        const key = (id: string): RegisterRequest => ({ ...request, sourceOrderId: id });

        await ledger.register(key('enqueued-old'));
        await ledger.markEnqueued(key('enqueued-old'));
        time.advanceMinutes(1);
        await ledger.register(key('claimed-old'));
        await ledger.register(key('released'));
        await ledger.releaseClaim(key('released'));
        await ledger.register(key('done'));
        await ledger.recordOutcome(key('done'), 'persisted');
        time.advanceMinutes(60);
        await ledger.register(key('fresh'));

        const stranded = await ledger.listStranded(new Date('2026-03-01T10:30:00Z'), 10);

        expect(stranded.map(r => r.sourceOrderId)).toEqual(['enqueued-old', 'claimed-old']);
    });
});
