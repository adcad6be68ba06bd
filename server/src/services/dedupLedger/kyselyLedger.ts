/**
 * Postgres Dedup Ledger
 *
 * register() is one INSERT … ON CONFLICT DO NOTHING RETURNING; the
 * database decides which of two racing callers inserted. A released
 * claim is re-taken with a conditional UPDATE, which is equally atomic.
 */

import type { Selectable } from 'kysely';
import type { OrderKey } from '@order-bridge/shared/domain';
import type { KyselyDB } from '../../db/index.js';
import type { DedupLedgerTable } from '../../db/types.js';
import { LedgerUnavailableError, toError } from '../../utils/errors.js';
import type {
    DedupLedger,
    DedupRecord,
    LedgerOutcome,
    RegisterRequest,
    RegisterResult,
} from './types.js';

type LedgerRow = Selectable<DedupLedgerTable>;

function toRecord(row: LedgerRow): DedupRecord {
    return {
        channel: row.channel,
        sourceOrderId: row.source_order_id,
        firstSeenAt: row.first_seen_at.toISOString(),
        source: row.source,
        resourceHref: row.resource_href,
        claimState: row.claim_state,
        claimedAt: row.claimed_at.toISOString(),
        outcome: row.outcome,
        outcomeAt: row.outcome_at ? row.outcome_at.toISOString() : null,
    };
}

export class KyselyDedupLedger implements DedupLedger {
    constructor(
        private readonly db: KyselyDB,
        private readonly now: () => Date = () => new Date()
    ) {}

    /**
     * Run a ledger query, translating driver failures into LedgerUnavailableError
     */
    private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            throw new LedgerUnavailableError(`Dedup ledger ${operation} failed`, toError(error));
        }
    }

    async register(request: RegisterRequest): Promise<RegisterResult> {
        return this.guard('register', async () => {
            const timestamp = this.now();

            const inserted = await this.db
                .insertInto('dedup_ledger')
                .values({
                    channel: request.channel,
                    source_order_id: request.sourceOrderId,
                    first_seen_at: timestamp,
                    source: request.source,
                    resource_href: request.resourceHref,
                    claim_state: 'claimed',
                    claimed_at: timestamp,
                    outcome: null,
                    outcome_at: null,
                })
                .onConflict(oc => oc.columns(['channel', 'source_order_id']).doNothing())
                .returningAll()
                .executeTakeFirst();

            if (inserted) {
                return { status: 'inserted', record: toRecord(inserted) };
            }

            const reclaimed = await this.db
                .updateTable('dedup_ledger')
                .set({ claim_state: 'claimed', claimed_at: timestamp })
                .where('channel', '=', request.channel)
                .where('source_order_id', '=', request.sourceOrderId)
                .where('claim_state', '=', 'released')
                .where('outcome', 'is', null)
                .returningAll()
                .executeTakeFirst();

            if (reclaimed) {
                return { status: 'inserted', record: toRecord(reclaimed) };
            }

            const existing = await this.db
                .selectFrom('dedup_ledger')
                .selectAll()
                .where('channel', '=', request.channel)
                .where('source_order_id', '=', request.sourceOrderId)
                .executeTakeFirstOrThrow();

            return { status: 'already-present', record: toRecord(existing) };
        });
    }

    async markEnqueued(key: OrderKey): Promise<void> {
        await this.guard('markEnqueued', () =>
            this.db
                .updateTable('dedup_ledger')
                .set({ claim_state: 'enqueued', claimed_at: this.now() })
                .where('channel', '=', key.channel)
                .where('source_order_id', '=', key.sourceOrderId)
                .execute()
        );
    }

    async releaseClaim(key: OrderKey): Promise<void> {
        await this.guard('releaseClaim', () =>
            this.db
                .updateTable('dedup_ledger')
                .set({ claim_state: 'released' })
                .where('channel', '=', key.channel)
                .where('source_order_id', '=', key.sourceOrderId)
                .where('outcome', 'is', null)
                .execute()
        );
    }

    async recordOutcome(key: OrderKey, outcome: LedgerOutcome): Promise<boolean> {
        const result = await this.guard('recordOutcome', () =>
            this.db
                .updateTable('dedup_ledger')
                .set({ outcome, outcome_at: this.now() })
                .where('channel', '=', key.channel)
                .where('source_order_id', '=', key.sourceOrderId)
                .where('outcome', 'is', null)
                .executeTakeFirst()
        );
        return result.numUpdatedRows > 0n;
    }

    async listStranded(olderThan: Date, limit: number): Promise<DedupRecord[]> {
        const rows = await this.guard('listStranded', () =>
            this.db
                .selectFrom('dedup_ledger')
                .selectAll()
                .where('outcome', 'is', null)
                .where('claim_state', '!=', 'released')
                .where('claimed_at', '<', olderThan)
                .orderBy('claimed_at', 'asc')
                .limit(limit)
                .execute()
        );
        return rows.map(toRecord);
    }

    async getRecord(key: OrderKey): Promise<DedupRecord | null> {
        const row = await this.guard('getRecord', () =>
            this.db
                .selectFrom('dedup_ledger')
                .selectAll()
                .where('channel', '=', key.channel)
                .where('source_order_id', '=', key.sourceOrderId)
                .executeTakeFirst()
        );
        return row ? toRecord(row) : null;
    }
}
