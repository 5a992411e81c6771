/**
 * Reconciliation Scheduler
 *
 * Called right after an invoice or payment is synced. Scheduling must never
 * fail the host write that triggered the sync, so store errors are logged
 * and swallowed into a null result.
 */

import { reconciliationLogger } from '../../utils/logger.js';
import { systemClock } from './task.js';
import type { Clock } from './task.js';
import type { ReconciliationJob, ReconciliationJobStore, ReconciliationKind } from './types.js';

export class ReconciliationScheduler {
    constructor(
        private readonly store: ReconciliationJobStore,
        private readonly delaySeconds: number,
        private readonly now: Clock = systemClock,
    ) {}

    async schedule(kind: ReconciliationKind, targetExternalId: string): Promise<ReconciliationJob | null> {
        const scheduledAt = this.now();
        const runAt = new Date(scheduledAt.getTime() + this.delaySeconds * 1000);

        try {
            const job = await this.store.create({ kind, targetExternalId, scheduledAt, runAt });
            reconciliationLogger.debug({ jobId: job.id, kind, externalId: targetExternalId, runAt }, 'Reconciliation scheduled');
            return job;
        } catch (error: unknown) {
            reconciliationLogger.error({ err: error, kind, externalId: targetExternalId }, 'Failed to schedule reconciliation');
            return null;
        }
    }
}
