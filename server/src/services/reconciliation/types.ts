/**
 * Reconciliation Job Types
 *
 * A job re-verifies, after a delay, that a host invoice or payment which
 * was just synced still exists, and compensates in the ERP when it does
 * not (the host write that triggered the sync rolled back).
 *
 * scheduled → checking → reconciled_present
 *                      → pending_recheck → reconciled_present
 *                                        → reconciled_cleaned
 *                                        → retrying → (checking again)
 *                                        → failed
 */

import { z } from 'zod';

export const ReconciliationKindSchema = z.enum(['invoice', 'payment']);

export const ReconciliationStateSchema = z.enum([
    'scheduled',
    'checking',
    'pending_recheck',
    'reconciled_present',
    'reconciled_cleaned',
    'retrying',
    'failed',
]);

export type ReconciliationKind = z.infer<typeof ReconciliationKindSchema>;
export type ReconciliationState = z.infer<typeof ReconciliationStateSchema>;

/** States a worker may pick up */
export const DUE_STATES: readonly ReconciliationState[] = ['scheduled', 'retrying'];

/** States of a job some worker is running; claimable again once the lease runs out */
export const LEASED_STATES: readonly ReconciliationState[] = ['checking', 'pending_recheck'];

/** States after which nothing happens to the job */
export const FINAL_STATES: readonly ReconciliationState[] = ['reconciled_present', 'reconciled_cleaned', 'failed'];

export interface ReconciliationJob {
    id: string;
    kind: ReconciliationKind;
    targetExternalId: string;
    state: ReconciliationState;
    scheduledAt: Date;
    runAt: Date;
    attempts: number;
    lastError: string | null;
    updatedAt: Date;
}

export interface NewReconciliationJob {
    kind: ReconciliationKind;
    targetExternalId: string;
    scheduledAt: Date;
    runAt: Date;
}

export type ReconciliationJobPatch = Partial<Pick<ReconciliationJob, 'state' | 'runAt' | 'attempts' | 'lastError'>>;

/**
 * Durable job storage. `claimDue` moves due jobs to `checking` so two
 * workers never run the same job at once. A leased job not touched since
 * `staleBefore` belonged to a worker that stopped mid-run and is due again.
 */
export interface ReconciliationJobStore {
    create(job: NewReconciliationJob): Promise<ReconciliationJob>;
    claimDue(now: Date, limit: number, staleBefore: Date): Promise<ReconciliationJob[]>;
    update(id: string, patch: ReconciliationJobPatch, now: Date): Promise<ReconciliationJob>;
    get(id: string): Promise<ReconciliationJob | null>;
    listByTarget(kind: ReconciliationKind, targetExternalId: string): Promise<ReconciliationJob[]>;
}
