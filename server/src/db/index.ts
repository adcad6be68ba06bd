/**
 * Kysely Factory
 *
 * Creates and manages the singleton Kysely instance backing the dedup
 * ledger, the order store and the export lock.
 *
 * Usage:
 *   const db = createKysely(env.DATABASE_URL);
 *   const ledger = new KyselyDedupLedger(db);
 */

import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import type { DB } from './types.js';

let kyselyInstance: Kysely<DB> | null = null;

/**
 * Create or return the singleton Kysely instance
 */
export function createKysely(connectionString: string, poolSize = 10): Kysely<DB> {
    if (kyselyInstance) return kyselyInstance;

    const pool = new pg.Pool({
        connectionString,
        max: poolSize,
    });

    kyselyInstance = new Kysely<DB>({
        dialect: new PostgresDialect({ pool }),
    });

    return kyselyInstance;
}

/**
 * Close the pool (shutdown coordinator, resources phase)
 */
export async function closeKysely(): Promise<void> {
    if (!kyselyInstance) return;
    const instance = kyselyInstance;
    kyselyInstance = null;
    await instance.destroy();
}

export type KyselyDB = Kysely<DB>;
export type { DB } from './types.js';
