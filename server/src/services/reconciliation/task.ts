/**
 * Reconciliation Task
 *
 * Two-phase existence check for a synced invoice or payment:
 *
 *   1. Look the record up in host storage. Present → done.
 *   2. Absent → wait `recheckDelaySeconds` and look again. Present → done.
 *   3. Still absent → the host write rolled back after the ERP accepted
 *      the sync; issue the compensating return/cancel.
 *
 * Connection failures anywhere in the run put the job back as `retrying`
 * (bounded by `maxRetries`, fixed backoff). Anything else fails the job.
 * The whole run is idempotent; a compensating call on an already
 * cancelled ERP record is a no-op on the ERP side.
 */

import { ROLLBACK_CLEANUP_REASON } from '@care-erp/shared';
import type { ReconciliationConfig } from '../../config/pluginConfig.js';
import type { HostRepository } from '../../repositories/hostRepository.js';
import { ErpConnectionError } from '../../utils/errors.js';
import { reconciliationLogger } from '../../utils/logger.js';
import type { SyncResources } from '../sync/index.js';
import type { ReconciliationJob, ReconciliationJobStore, ReconciliationState } from './types.js';

// ============================================
// TYPES
// ============================================

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => Date;

export interface ReconciliationTaskDeps {
    store: ReconciliationJobStore;
    repository: HostRepository;
    sync: Pick<SyncResources, 'returnInvoice' | 'cancelPayment'>;
    config: ReconciliationConfig;
    sleep?: Sleep;
    now?: Clock;
}

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
export const systemClock: Clock = () => new Date();

// ============================================
// TASK
// ============================================

export class ReconciliationTask {
    private readonly sleep: Sleep;
    private readonly now: Clock;

    constructor(private readonly deps: ReconciliationTaskDeps) {
        this.sleep = deps.sleep ?? defaultSleep;
        this.now = deps.now ?? systemClock;
    }

    /**
     * Run one claimed job to its next resting state. The outcome is written
     * to the store and returned; a failure to write it is the only rejection.
     */
    async run(job: ReconciliationJob): Promise<ReconciliationJob> {
        const log = reconciliationLogger.child({ jobId: job.id, kind: job.kind, externalId: job.targetExternalId });

        try {
            const state = await this.check(job);
            log.info({ state }, 'Reconciliation finished');
            return await this.deps.store.update(job.id, { state, lastError: null }, this.now());
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);

            if (error instanceof ErpConnectionError) {
                const attempts = job.attempts + 1;
                if (attempts <= this.deps.config.maxRetries) {
                    const runAt = new Date(this.now().getTime() + this.deps.config.retryDelaySeconds * 1000);
                    log.warn({ attempts, runAt, error: message }, 'ERP unreachable during reconciliation, will retry');
                    return this.deps.store.update(job.id, { state: 'retrying', attempts, runAt, lastError: message }, this.now());
                }
                log.error({ attempts, error: message }, 'Reconciliation retries exhausted');
                return this.deps.store.update(job.id, { state: 'failed', attempts, lastError: message }, this.now());
            }

            log.error({ err: error }, 'Reconciliation failed');
            return this.deps.store.update(job.id, { state: 'failed', lastError: message }, this.now());
        }
    }

    private async check(job: ReconciliationJob): Promise<ReconciliationState> {
        if (await this.exists(job)) {
            return 'reconciled_present';
        }

        await this.deps.store.update(job.id, { state: 'pending_recheck' }, this.now());
        await this.sleep(this.deps.config.recheckDelaySeconds * 1000);

        if (await this.exists(job)) {
            return 'reconciled_present';
        }

        reconciliationLogger.warn(
            { kind: job.kind, externalId: job.targetExternalId },
            'Record missing after recheck, compensating in ERP',
        );
        await this.compensate(job);
        return 'reconciled_cleaned';
    }

    private exists(job: ReconciliationJob): Promise<boolean> {
        return job.kind === 'invoice'
            ? this.deps.repository.invoiceExists(job.targetExternalId)
            : this.deps.repository.paymentExists(job.targetExternalId);
    }

    private async compensate(job: ReconciliationJob): Promise<void> {
        if (job.kind === 'invoice') {
            await this.deps.sync.returnInvoice(job.targetExternalId, ROLLBACK_CLEANUP_REASON);
        } else {
            await this.deps.sync.cancelPayment(job.targetExternalId, ROLLBACK_CLEANUP_REASON);
        }
    }
}
