/**
 * Export Lock
 *
 * Held for the whole of one batch build so two exporters never select the
 * same Persisted orders.
 *
 * - InMemoryExportLock: one process (tests, STORE_BACKEND=memory)
 * - PostgresAdvisoryLock: every process sharing the database. The advisory
 *   lock is session-scoped, so the callback runs while one pooled
 *   connection is held.
 */

import { sql } from 'kysely';
import type { KyselyDB } from '../../db/index.js';
import { PersistenceError, toError } from '../../utils/errors.js';

export type LockResult<T> = { acquired: true; value: T } | { acquired: false };

export interface ExportLock {
    /** Run `fn` while holding the lock; never waits for a held lock */
    withLock<T>(fn: () => Promise<T>): Promise<LockResult<T>>;
}

export class InMemoryExportLock implements ExportLock {
    private held = false;

    async withLock<T>(fn: () => Promise<T>): Promise<LockResult<T>> {
        if (this.held) return { acquired: false };

        this.held = true;
        try {
            return { acquired: true, value: await fn() };
        } finally {
            this.held = false;
        }
    }

    get isHeld(): boolean {
        return this.held;
    }
}

/** Arbitrary application-wide key for pg_try_advisory_lock */
export const EXPORT_ADVISORY_LOCK_KEY = 728_401;

export class PostgresAdvisoryLock implements ExportLock {
    constructor(
        private readonly db: KyselyDB,
        private readonly lockKey: number = EXPORT_ADVISORY_LOCK_KEY
    ) {}

    async withLock<T>(fn: () => Promise<T>): Promise<LockResult<T>> {
        let acquired = false;
        try {
            return await this.db.connection().execute(async (conn): Promise<LockResult<T>> => {
                const { rows } = await sql<{ locked: boolean }>`select pg_try_advisory_lock(${this.lockKey}) as locked`.execute(conn);
                if (!rows[0]?.locked) return { acquired: false };

                acquired = true;
                try {
                    return { acquired: true, value: await fn() };
                } finally {
                    await sql`select pg_advisory_unlock(${this.lockKey})`.execute(conn);
                }
            });
        } catch (error) {
            // Errors from the export itself pass through untouched
            if (acquired) throw error;
            throw new PersistenceError('Could not acquire export lock', toError(error));
        }
    }
}
