/**
 * Order Store contract
 *
 * Narrow persistence interface for pipeline orders. Status transition rules
 * are enforced by the pipeline before it writes; the store only stores.
 *
 * Every method throws PersistenceError when the backing store is unavailable.
 */

import type {
    NormalizedOrderBundle,
    OrderFailure,
    OrderKey,
    ProcessingStatus,
    StoredOrder,
} from '@order-bridge/shared/domain';

export interface OrderWrite extends OrderKey {
    processingStatus: ProcessingStatus;
    resourceHref: string;
    /** Omitted: keep the stored value */
    bundle?: NormalizedOrderBundle | null;
    /** Omitted: keep the stored value */
    failure?: OrderFailure | null;
}

export type StatusCounts = Record<ProcessingStatus, number>;

export interface OrderStore {
    getOrder(key: OrderKey): Promise<StoredOrder | null>;

    upsertOrder(write: OrderWrite): Promise<StoredOrder>;

    /** Oldest `updatedAt` first */
    listOrdersByStatus(status: ProcessingStatus, limit: number): Promise<StoredOrder[]>;

    /**
     * Persisted → Exported for every key, in one transaction.
     * Keys that are no longer Persisted are left alone; returns the number marked.
     */
    markExported(keys: readonly OrderKey[], batchId: string): Promise<number>;

    countByStatus(): Promise<StatusCounts>;
}

export function emptyStatusCounts(): StatusCounts {
    return {
        Received: 0,
        Fetched: 0,
        Transformed: 0,
        Persisted: 0,
        Exported: 0,
        Failed: 0,
        Skipped: 0,
    };
}
