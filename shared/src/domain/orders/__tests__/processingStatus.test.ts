import {
    buildStatusTransitionError,
    getNextStatuses,
    isIngestionComplete,
    isTerminalStatus,
    isValidProcessingStatus,
    isValidStatusTransition,
    transitionStatus,
} from '../processingStatus.js';

describe('processing status state machine', () => {
    it('walks the happy path', () => {
        expect(isValidStatusTransition('Received', 'Fetched')).toBe(true);
        expect(isValidStatusTransition('Fetched', 'Transformed')).toBe(true);
        expect(isValidStatusTransition('Transformed', 'Persisted')).toBe(true);
        expect(isValidStatusTransition('Persisted', 'Exported')).toBe(true);
    });

    it('never leaves Exported or Skipped', () => {
        expect(getNextStatuses('Exported')).toEqual([]);
        expect(getNextStatuses('Skipped')).toEqual([]);
        expect(isTerminalStatus('Exported')).toBe(true);
        expect(isTerminalStatus('Persisted')).toBe(false);
    });

    it('only lets an operator replay a failed order', () => {
        expect(isValidStatusTransition('Failed', 'Received')).toBe(false);
        expect(isValidStatusTransition('Failed', 'Received', true)).toBe(true);
    });

    it('rejects skipping stages', () => {
        expect(isValidStatusTransition('Received', 'Persisted')).toBe(false);
        expect(() => transitionStatus('Persisted', 'Failed')).toThrow(
            "Cannot transition from 'Persisted' to 'Failed'. Allowed: Exported"
        );
    });

    it('lets a resumed order be skipped from any pre-persist stage', () => {
        expect(getNextStatuses('Fetched')).toEqual(['Transformed', 'Skipped', 'Failed']);
        expect(transitionStatus('Transformed', 'Skipped')).toBe('Skipped');
        expect(isValidStatusTransition('Persisted', 'Skipped')).toBe(false);
    });

    it('treats Persisted as ingestion-complete', () => {
        expect(isIngestionComplete('Persisted')).toBe(true);
        expect(isIngestionComplete('Failed')).toBe(false);
    });

    it('describes unknown source statuses', () => {
        expect(isValidProcessingStatus('Shipped')).toBe(false);
        expect(buildStatusTransitionError('Shipped', 'Exported')).toBe(
            "Cannot transition from 'unknown' to 'Exported'. Allowed: none"
        );
    });
});
