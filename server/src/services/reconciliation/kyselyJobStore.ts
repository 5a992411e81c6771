/**
 * Kysely Reconciliation Job Store
 *
 * Backed by `erp_reconciliation_job` (server/sql/001_erp_reconciliation_job.sql).
 * Claiming uses FOR UPDATE SKIP LOCKED so several server processes can
 * poll the same table.
 */

import type { Selectable } from 'kysely';
import type { KyselyDB } from '../../db/index.js';
import type { ErpReconciliationJob } from '../../db/schema.js';
import { NotFoundError } from '../../utils/errors.js';
import {
    DUE_STATES,
    LEASED_STATES,
    ReconciliationKindSchema,
    ReconciliationStateSchema,
} from './types.js';
import type {
    NewReconciliationJob,
    ReconciliationJob,
    ReconciliationJobPatch,
    ReconciliationJobStore,
    ReconciliationKind,
} from './types.js';

function toJob(row: Selectable<ErpReconciliationJob>): ReconciliationJob {
    return {
        id: row.id,
        kind: ReconciliationKindSchema.parse(row.kind),
        targetExternalId: row.target_external_id,
        state: ReconciliationStateSchema.parse(row.state),
        scheduledAt: row.scheduled_at,
        runAt: row.run_at,
        attempts: row.attempts,
        lastError: row.last_error,
        updatedAt: row.updated_at,
    };
}

export class KyselyJobStore implements ReconciliationJobStore {
    constructor(private readonly db: KyselyDB) {}

    async create(job: NewReconciliationJob): Promise<ReconciliationJob> {
        const row = await this.db
            .insertInto('erp_reconciliation_job')
            .values({
                kind: job.kind,
                target_external_id: job.targetExternalId,
                state: 'scheduled',
                scheduled_at: job.scheduledAt,
                run_at: job.runAt,
                last_error: null,
                updated_at: job.scheduledAt,
            })
            .returningAll()
            .executeTakeFirstOrThrow();
        return toJob(row);
    }

    async claimDue(now: Date, limit: number, staleBefore: Date): Promise<ReconciliationJob[]> {
        const due = this.db
            .selectFrom('erp_reconciliation_job')
            .select('id')
            .where((eb) =>
                eb.or([
                    eb.and([eb('state', 'in', [...DUE_STATES]), eb('run_at', '<=', now)]),
                    eb.and([eb('state', 'in', [...LEASED_STATES]), eb('updated_at', '<', staleBefore)]),
                ])
            )
            .orderBy('run_at')
            .limit(limit)
            .forUpdate()
            .skipLocked();

        const rows = await this.db
            .updateTable('erp_reconciliation_job')
            .set({ state: 'checking', updated_at: now })
            .where('id', 'in', due)
            .returningAll()
            .execute();
        return rows.map(toJob);
    }

    async update(id: string, patch: ReconciliationJobPatch, now: Date): Promise<ReconciliationJob> {
        const row = await this.db
            .updateTable('erp_reconciliation_job')
            .set({
                ...(patch.state !== undefined ? { state: patch.state } : {}),
                ...(patch.runAt !== undefined ? { run_at: patch.runAt } : {}),
                ...(patch.attempts !== undefined ? { attempts: patch.attempts } : {}),
                ...(patch.lastError !== undefined ? { last_error: patch.lastError } : {}),
                updated_at: now,
            })
            .where('id', '=', id)
            .returningAll()
            .executeTakeFirst();
        if (!row) {
            throw new NotFoundError('Reconciliation job not found', 'ReconciliationJob', id);
        }
        return toJob(row);
    }

    async get(id: string): Promise<ReconciliationJob | null> {
        const row = await this.db
            .selectFrom('erp_reconciliation_job')
            .selectAll()
            .where('id', '=', id)
            .executeTakeFirst();
        return row ? toJob(row) : null;
    }

    async listByTarget(kind: ReconciliationKind, targetExternalId: string): Promise<ReconciliationJob[]> {
        const rows = await this.db
            .selectFrom('erp_reconciliation_job')
            .selectAll()
            .where('kind', '=', kind)
            .where('target_external_id', '=', targetExternalId)
            .orderBy('scheduled_at')
            .execute();
        return rows.map(toJob);
    }
}
