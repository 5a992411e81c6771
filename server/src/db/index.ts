/**
 * Kysely Factory
 *
 * One pg pool per process, shared by the host repository and the
 * reconciliation job store.
 *
 * Usage:
 *   const db = createKysely(env.DATABASE_URL);
 *   const invoice = await db
 *     .selectFrom('emr_invoice')
 *     .select(['external_id', 'status'])
 *     .where('external_id', '=', id)
 *     .executeTakeFirst();
 */

import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import type { DB } from './schema.js';

let kyselyInstance: Kysely<DB> | null = null;

/**
 * Create or return the singleton Kysely instance
 */
export function createKysely(connectionString: string): Kysely<DB> {
    if (kyselyInstance) return kyselyInstance;

    const pool = new pg.Pool({
        connectionString,
        max: 10,
    });

    kyselyInstance = new Kysely<DB>({
        dialect: new PostgresDialect({ pool }),
    });

    return kyselyInstance;
}

/**
 * Close the pool. Safe to call when nothing was created.
 */
export async function destroyKysely(): Promise<void> {
    if (!kyselyInstance) return;
    const instance = kyselyInstance;
    kyselyInstance = null;
    await instance.destroy();
}

/**
 * Type helper for Kysely instance
 * Use this when typing function parameters that accept a Kysely instance
 */
export type KyselyDB = Kysely<DB>;

export type { DB } from './schema.js';
