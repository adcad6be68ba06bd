/**
 * Dedup Ledger contract
 *
 * The ledger is the single authoritative gate in front of the processing
 * queue: an order key is pushed only by the caller whose `register` call
 * returned `inserted`.
 *
 * CLAIM LIFECYCLE:
 *   register → claimed → markEnqueued → enqueued
 *                 ↓
 *           releaseClaim (queue push failed) → released → register re-claims
 *
 * `outcome` is written once, when the pipeline reaches a result for the key.
 * Identity and `firstSeenAt` never change after insert.
 */

import type { OrderKey } from '@order-bridge/shared/domain';

// ============================================
// TYPES
// ============================================

export type IntakeSource = 'webhook' | 'reconciler';

export type ClaimState = 'claimed' | 'enqueued' | 'released';

export type LedgerOutcome = 'persisted' | 'skipped' | 'failed';

export interface DedupRecord extends OrderKey {
    firstSeenAt: string;
    source: IntakeSource;
    resourceHref: string;
    claimState: ClaimState;
    claimedAt: string;
    outcome: LedgerOutcome | null;
    outcomeAt: string | null;
}

export interface RegisterRequest extends OrderKey {
    source: IntakeSource;
    resourceHref: string;
}

export type RegisterResult =
    | { status: 'inserted'; record: DedupRecord }
    | { status: 'already-present'; record: DedupRecord };

// ============================================
// INTERFACE
// ============================================

/**
 * Every method throws LedgerUnavailableError when the backing store cannot be reached.
 */
export interface DedupLedger {
    /**
     * Atomic register-if-absent. Also re-takes a released claim that has no outcome.
     */
    register(request: RegisterRequest): Promise<RegisterResult>;

    /** The queue accepted the item; refreshes `claimedAt` */
    markEnqueued(key: OrderKey): Promise<void>;

    /** The queue push failed; the next delivery may claim the key again */
    releaseClaim(key: OrderKey): Promise<void>;

    /**
     * Write-once. Returns false when an outcome was already recorded.
     */
    recordOutcome(key: OrderKey, outcome: LedgerOutcome): Promise<boolean>;

    /**
     * Claims with no outcome whose `claimedAt` is older than `olderThan`,
     * oldest first. Released claims are excluded: their retry path is the
     * next delivery.
     */
    listStranded(olderThan: Date, limit: number): Promise<DedupRecord[]>;

    getRecord(key: OrderKey): Promise<DedupRecord | null>;
}
