/**
 * Postgres Order Store
 *
 * One row per (channel, source_order_id) in `pipeline_order`; the normalized
 * bundle and the failure record live in jsonb columns.
 */

import { sql, type Selectable } from 'kysely';
import {
    isValidProcessingStatus,
    type OrderKey,
    type ProcessingStatus,
    type StoredOrder,
} from '@order-bridge/shared/domain';
import type { KyselyDB } from '../../db/index.js';
import type { PipelineOrderTable } from '../../db/types.js';
import { PersistenceError, toError } from '../../utils/errors.js';
import { emptyStatusCounts, type OrderStore, type OrderWrite, type StatusCounts } from './types.js';

type OrderRow = Selectable<PipelineOrderTable>;

function toStoredOrder(row: OrderRow): StoredOrder {
    return {
        channel: row.channel,
        sourceOrderId: row.source_order_id,
        processingStatus: row.processing_status,
        resourceHref: row.resource_href,
        bundle: row.bundle,
        failure: row.failure,
        exportBatchId: row.export_batch_id,
        updatedAt: row.updated_at.toISOString(),
    };
}

function toJson(value: unknown): string | null {
    return value === null ? null : JSON.stringify(value);
}

export class KyselyOrderStore implements OrderStore {
    constructor(
        private readonly db: KyselyDB,
        private readonly now: () => Date = () => new Date()
    ) {}

    private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            throw new PersistenceError(`Order store ${operation} failed`, toError(error));
        }
    }

    async getOrder(key: OrderKey): Promise<StoredOrder | null> {
        const row = await this.guard('getOrder', () =>
            this.db
                .selectFrom('pipeline_order')
                .selectAll()
                .where('channel', '=', key.channel)
                .where('source_order_id', '=', key.sourceOrderId)
                .executeTakeFirst()
        );
        return row ? toStoredOrder(row) : null;
    }

    async upsertOrder(write: OrderWrite): Promise<StoredOrder> {
        const updatedAt = this.now();
        const changes = {
            processing_status: write.processingStatus,
            resource_href: write.resourceHref,
            updated_at: updatedAt,
            ...(write.bundle !== undefined && { bundle: toJson(write.bundle) }),
            ...(write.failure !== undefined && { failure: toJson(write.failure) }),
        };

        const row = await this.guard('upsertOrder', () =>
            this.db
                .insertInto('pipeline_order')
                .values({
                    channel: write.channel,
                    source_order_id: write.sourceOrderId,
                    bundle: null,
                    failure: null,
                    export_batch_id: null,
                    ...changes,
                })
                .onConflict(oc => oc.columns(['channel', 'source_order_id']).doUpdateSet(changes))
                .returningAll()
                .executeTakeFirstOrThrow()
        );
        return toStoredOrder(row);
    }

    async listOrdersByStatus(status: ProcessingStatus, limit: number): Promise<StoredOrder[]> {
        const rows = await this.guard('listOrdersByStatus', () =>
            this.db
                .selectFrom('pipeline_order')
                .selectAll()
                .where('processing_status', '=', status)
                .orderBy('updated_at', 'asc')
                .limit(limit)
                .execute()
        );
        return rows.map(toStoredOrder);
    }

    async markExported(keys: readonly OrderKey[], batchId: string): Promise<number> {
        if (keys.length === 0) return 0;
        const updatedAt = this.now();

        return this.guard('markExported', () =>
            this.db.transaction().execute(async trx => {
                let marked = 0;
                for (const key of keys) {
                    const result = await trx
                        .updateTable('pipeline_order')
                        .set({ processing_status: 'Exported', export_batch_id: batchId, updated_at: updatedAt })
                        .where('channel', '=', key.channel)
                        .where('source_order_id', '=', key.sourceOrderId)
                        .where('processing_status', '=', 'Persisted')
                        .executeTakeFirst();
                    marked += Number(result.numUpdatedRows);
                }
                return marked;
            })
        );
    }

    async countByStatus(): Promise<StatusCounts> {
        const rows = await this.guard('countByStatus', () =>
            this.db
                .selectFrom('pipeline_order')
                .select(['processing_status', sql<number>`count(*)::int`.as('count')])
                .groupBy('processing_status')
                .execute()
        );

        const counts = emptyStatusCounts();
        for (const row of rows) {
            if (isValidProcessingStatus(row.processing_status)) {
                counts[row.processing_status] = row.count;
            }
        }
        return counts;
    }
}
