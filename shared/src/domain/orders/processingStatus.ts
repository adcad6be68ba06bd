/**
 * Order Processing Status State Machine - Pure Domain Logic
 * Single source of truth for pipeline status transitions.
 * NO DATABASE DEPENDENCIES - pure functions only.
 *
 * STATUS FLOW:
 * Received → Fetched → Transformed → Persisted → Exported
 *    ↓          ↓           ↓
 * Skipped/   Skipped/    Skipped/
 * Failed     Failed      Failed
 *
 * Skipped is the named outcome for "order no longer in a qualifying state";
 * it is never an error. A resumed order re-fetches, so it can reach Skipped
 * from any pre-persist stage. Failed can only leave via manual replay.
 */

// ============================================
// TYPE DEFINITIONS
// ============================================

export type ProcessingStatus =
    | 'Received'
    | 'Fetched'
    | 'Transformed'
    | 'Persisted'
    | 'Exported'
    | 'Failed'
    | 'Skipped';

export interface StatusTransitionDefinition {
    to: ProcessingStatus;
    /** Only an operator action may take this transition */
    manualOnly?: boolean;
    description: string;
}

// ============================================
// STATE MACHINE DEFINITION
// ============================================

export const PROCESSING_STATUS_TRANSITIONS: Record<ProcessingStatus, StatusTransitionDefinition[]> = {
    Received: [
        { to: 'Fetched', description: 'Order detail retrieved from the marketplace' },
        { to: 'Skipped', description: 'Order no longer in a qualifying state' },
        { to: 'Failed', description: 'Fetch retries exhausted or payload invalid' },
    ],

    Fetched: [
        { to: 'Transformed', description: 'Normalized model built' },
        { to: 'Skipped', description: 'Resumed order no longer in a qualifying state' },
        { to: 'Failed', description: 'Source data could not be normalized' },
    ],

    Transformed: [
        { to: 'Persisted', description: 'Normalized order written to the order store' },
        { to: 'Skipped', description: 'Resumed order no longer in a qualifying state' },
        { to: 'Failed', description: 'Normalized order rejected by the order store' },
    ],

    Persisted: [
        { to: 'Exported', description: 'Included in a validated, promoted ERP package' },
    ],

    Failed: [
        { to: 'Received', manualOnly: true, description: 'Replay requested by an operator' },
    ],

    Exported: [],
    Skipped: [],
};

export const PROCESSING_STATUSES: readonly ProcessingStatus[] = [
    'Received', 'Fetched', 'Transformed', 'Persisted', 'Exported', 'Failed', 'Skipped',
] as const;

/**
 * Statuses after which the ingestion pipeline has nothing left to do for an order.
 * Persisted is included: export is a separate stage.
 */
export const INGESTION_COMPLETE_STATUSES: readonly ProcessingStatus[] = [
    'Persisted', 'Exported', 'Skipped',
] as const;

export const TERMINAL_STATUSES: readonly ProcessingStatus[] = [
    'Exported', 'Skipped',
] as const;

// ============================================
// VALIDATION FUNCTIONS
// ============================================

export function isValidProcessingStatus(status: string): status is ProcessingStatus {
    return PROCESSING_STATUSES.some(s => s === status);
}

export function getStatusTransition(
    from: ProcessingStatus,
    to: ProcessingStatus
): StatusTransitionDefinition | null {
    return PROCESSING_STATUS_TRANSITIONS[from].find(t => t.to === to) || null;
}

/**
 * @param manual - true when an operator initiated the transition
 */
export function isValidStatusTransition(from: ProcessingStatus, to: ProcessingStatus, manual = false): boolean {
    const def = getStatusTransition(from, to);
    if (!def) return false;
    return manual || !def.manualOnly;
}

export function getNextStatuses(from: ProcessingStatus): ProcessingStatus[] {
    return PROCESSING_STATUS_TRANSITIONS[from].map(t => t.to);
}

export function isIngestionComplete(status: ProcessingStatus): boolean {
    return INGESTION_COMPLETE_STATUSES.includes(status);
}

export function isTerminalStatus(status: ProcessingStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

export function buildStatusTransitionError(from: string, to: string): string {
    const validFrom = isValidProcessingStatus(from) ? from : 'unknown';
    const allowed = isValidProcessingStatus(from) ? getNextStatuses(from) : [];
    return `Cannot transition from '${validFrom}' to '${to}'. Allowed: ${allowed.join(', ') || 'none'}`;
}

/**
 * Assert a transition and return the target status.
 * Throws a plain Error: an invalid transition is a programming error, not a data error.
 */
export function transitionStatus(from: ProcessingStatus, to: ProcessingStatus, manual = false): ProcessingStatus {
    if (!isValidStatusTransition(from, to, manual)) {
        throw new Error(buildStatusTransitionError(from, to));
    }
    return to;
}
