/**
 * In-memory Dedup Ledger
 *
 * Used by tests and by STORE_BACKEND=memory. Every method body runs
 * synchronously between awaits, so check-and-insert is atomic on the
 * event loop.
 */

import { orderKeyToString, type OrderKey } from '@order-bridge/shared/domain';
import type {
    DedupLedger,
    DedupRecord,
    LedgerOutcome,
    RegisterRequest,
    RegisterResult,
} from './types.js';

export class InMemoryDedupLedger implements DedupLedger {
    private readonly records = new Map<string, DedupRecord>();

    constructor(private readonly now: () => Date = () => new Date()) {}

    async register(request: RegisterRequest): Promise<RegisterResult> {
        const id = orderKeyToString(request);
        const existing = this.records.get(id);
        const timestamp = this.now().toISOString();

        if (!existing) {
            const record: DedupRecord = {
                channel: request.channel,
                sourceOrderId: request.sourceOrderId,
                firstSeenAt: timestamp,
                source: request.source,
                resourceHref: request.resourceHref,
                claimState: 'claimed',
                claimedAt: timestamp,
                outcome: null,
                outcomeAt: null,
            };
            this.records.set(id, record);
            return { status: 'inserted', record: { ...record } };
        }

        if (existing.claimState === 'released' && existing.outcome === null) {
            existing.claimState = 'claimed';
            existing.claimedAt = timestamp;
            return { status: 'inserted', record: { ...existing } };
        }

        return { status: 'already-present', record: { ...existing } };
    }

    async markEnqueued(key: OrderKey): Promise<void> {
        const record = this.records.get(orderKeyToString(key));
        if (!record) return;
        record.claimState = 'enqueued';
        record.claimedAt = this.now().toISOString();
    }

    async releaseClaim(key: OrderKey): Promise<void> {
        const record = this.records.get(orderKeyToString(key));
        if (!record || record.outcome !== null) return;
        record.claimState = 'released';
    }

    async recordOutcome(key: OrderKey, outcome: LedgerOutcome): Promise<boolean> {
        const record = this.records.get(orderKeyToString(key));
        if (!record || record.outcome !== null) return false;
        record.outcome = outcome;
        record.outcomeAt = this.now().toISOString();
        return true;
    }

    async listStranded(olderThan: Date, limit: number): Promise<DedupRecord[]> {
        const cutoff = olderThan.toISOString();
        return Array.from(this.records.values())
            .filter(r => r.outcome === null && r.claimState !== 'released' && r.claimedAt < cutoff)
            .sort((a, b) => a.claimedAt.localeCompare(b.claimedAt))
            .slice(0, limit)
            .map(r => ({ ...r }));
    }

    async getRecord(key: OrderKey): Promise<DedupRecord | null> {
        const record = this.records.get(orderKeyToString(key));
        return record ? { ...record } : null;
    }

    /** Number of registered keys */
    get size(): number {
        return this.records.size;
    }
}
