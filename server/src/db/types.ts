/**
 * Table definitions for the pipeline's Postgres schema (see schema.sql)
 *
 * jsonb columns are returned parsed by node-postgres and written as JSON text.
 */

import type { ColumnType } from 'kysely';
import type {
    NormalizedOrderBundle,
    OrderFailure,
    ProcessingStatus,
} from '@order-bridge/shared/domain';

type Timestamp = ColumnType<Date, Date | string, Date | string>;
type NullableTimestamp = ColumnType<Date | null, Date | string | null, Date | string | null>;
type NullableJson<T> = ColumnType<T | null, string | null, string | null>;

export interface DedupLedgerTable {
    channel: string;
    source_order_id: string;
    first_seen_at: ColumnType<Date, Date | string, never>;
    source: 'webhook' | 'reconciler';
    resource_href: string;
    claim_state: 'claimed' | 'enqueued' | 'released';
    claimed_at: Timestamp;
    outcome: 'persisted' | 'skipped' | 'failed' | null;
    outcome_at: NullableTimestamp;
}

export interface PipelineOrderTable {
    channel: string;
    source_order_id: string;
    processing_status: ProcessingStatus;
    resource_href: string;
    bundle: NullableJson<NormalizedOrderBundle>;
    failure: NullableJson<OrderFailure>;
    export_batch_id: string | null;
    updated_at: Timestamp;
}

export interface DB {
    dedup_ledger: DedupLedgerTable;
    pipeline_order: PipelineOrderTable;
}
