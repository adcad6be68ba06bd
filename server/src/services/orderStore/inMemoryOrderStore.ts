/**
 * In-memory Order Store (tests and STORE_BACKEND=memory)
 *
 * Returns deep copies so callers can never mutate stored state.
 */

import { orderKeyToString, type OrderKey, type ProcessingStatus, type StoredOrder } from '@order-bridge/shared/domain';
import { emptyStatusCounts, type OrderStore, type OrderWrite, type StatusCounts } from './types.js';

export class InMemoryOrderStore implements OrderStore {
    private readonly orders = new Map<string, StoredOrder>();

    constructor(private readonly now: () => Date = () => new Date()) {}

    async getOrder(key: OrderKey): Promise<StoredOrder | null> {
        const order = this.orders.get(orderKeyToString(key));
        return order ? structuredClone(order) : null;
    }

    async upsertOrder(write: OrderWrite): Promise<StoredOrder> {
        const id = orderKeyToString(write);
        const existing = this.orders.get(id);
        const next: StoredOrder = {
            channel: write.channel,
            sourceOrderId: write.sourceOrderId,
            processingStatus: write.processingStatus,
            resourceHref: write.resourceHref,
            bundle: write.bundle !== undefined ? write.bundle : existing?.bundle ?? null,
            failure: write.failure !== undefined ? write.failure : existing?.failure ?? null,
            exportBatchId: existing?.exportBatchId ?? null,
            updatedAt: this.now().toISOString(),
        };
        this.orders.set(id, structuredClone(next));
        return next;
    }

    async listOrdersByStatus(status: ProcessingStatus, limit: number): Promise<StoredOrder[]> {
        return Array.from(this.orders.values())
            .filter(o => o.processingStatus === status)
            .sort((a, b) => a.updatedAt.localeCompare(b.updatedAt))
            .slice(0, limit)
            .map(o => structuredClone(o));
    }

    async markExported(keys: readonly OrderKey[], batchId: string): Promise<number> {
        let marked = 0;
        const updatedAt = this.now().toISOString();
        for (const key of keys) {
            const order = this.orders.get(orderKeyToString(key));
            if (!order || order.processingStatus !== 'Persisted') continue;
            order.processingStatus = 'Exported';
            order.exportBatchId = batchId;
            order.updatedAt = updatedAt;
            marked++;
        }
        return marked;
    }

    async countByStatus(): Promise<StatusCounts> {
        const counts = emptyStatusCounts();
        for (const order of this.orders.values()) {
            counts[order.processingStatus]++;
        }
        return counts;
    }
}
