/**
 * Reconciliation Worker
 *
 * Polls the job store for due jobs and runs them. One poll at a time per
 * process; a tick that finds the previous poll still running is skipped.
 * Jobs whose lease ran out (their worker died mid-run) are claimed again.
 */

import { reconciliationLogger } from '../../utils/logger.js';
import { systemClock } from './task.js';
import type { Clock, ReconciliationTask } from './task.js';
import type { ReconciliationJobStore } from './types.js';

// ============================================
// TYPES
// ============================================

export interface PollResult {
    claimed: number;
    outcomes: Record<string, number>;
    durationMs: number;
}

export interface WorkerStatus {
    isRunning: boolean;
    schedulerActive: boolean;
    pollIntervalMs: number;
    lastPollAt: Date | null;
    lastPollResult: PollResult | null;
}

export interface ReconciliationWorkerOptions {
    pollIntervalMs: number;
    /** A job left in checking or pending_recheck longer than this is claimed again */
    leaseMs: number;
    batchSize?: number;
    now?: Clock;
}

const DEFAULT_BATCH_SIZE = 20;

// ============================================
// WORKER
// ============================================

export class ReconciliationWorker {
    private interval: ReturnType<typeof setInterval> | null = null;
    private inFlight: Promise<PollResult> | null = null;
    private lastPollAt: Date | null = null;
    private lastPollResult: PollResult | null = null;
    private readonly now: Clock;
    private readonly batchSize: number;

    constructor(
        private readonly store: ReconciliationJobStore,
        private readonly task: ReconciliationTask,
        private readonly options: ReconciliationWorkerOptions,
    ) {
        this.now = options.now ?? systemClock;
        this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    }

    /**
     * Claim and run every due job. Returns null when a poll is already in progress.
     */
    async poll(): Promise<PollResult | null> {
        if (this.inFlight) {
            reconciliationLogger.debug('Reconciliation poll already in progress, skipping');
            return null;
        }

        const current = this.runPoll();
        this.inFlight = current;
        try {
            return await current;
        } finally {
            this.inFlight = null;
        }
    }

    private async runPoll(): Promise<PollResult> {
        const start = Date.now();
        const now = this.now();
        const staleBefore = new Date(now.getTime() - this.options.leaseMs);
        const jobs = await this.store.claimDue(now, this.batchSize, staleBefore);
        const settled = await Promise.allSettled(jobs.map((job) => this.task.run(job)));

        const outcomes: Record<string, number> = {};
        settled.forEach((result, index) => {
            if (result.status === 'fulfilled') {
                outcomes[result.value.state] = (outcomes[result.value.state] ?? 0) + 1;
                return;
            }
            outcomes.unrecorded = (outcomes.unrecorded ?? 0) + 1;
            reconciliationLogger.error(
                { err: result.reason, jobId: jobs[index]?.id },
                'Reconciliation outcome could not be recorded',
            );
        });

        const result: PollResult = { claimed: jobs.length, outcomes, durationMs: Date.now() - start };
        if (jobs.length > 0) {
            reconciliationLogger.info(result, 'Reconciliation poll complete');
        }
        this.lastPollAt = new Date();
        this.lastPollResult = result;
        return result;
    }

    start(): void {
        if (this.interval) {
            reconciliationLogger.debug('Reconciliation worker already running');
            return;
        }

        reconciliationLogger.info({ pollIntervalMs: this.options.pollIntervalMs }, 'Starting reconciliation worker');
        this.interval = setInterval(() => {
            if (this.inFlight) return;
            this.poll().catch((error: unknown) => {
                reconciliationLogger.error({ err: error }, 'Reconciliation poll failed');
            });
        }, this.options.pollIntervalMs);
    }

    /**
     * Stop polling and wait for an in-flight poll to settle.
     */
    async stop(): Promise<void> {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
            reconciliationLogger.info('Reconciliation worker stopped');
        }
        const current = this.inFlight;
        if (current) {
            await current.catch((error: unknown) => {
                reconciliationLogger.error({ err: error }, 'Reconciliation poll failed during shutdown');
            });
        }
    }

    getStatus(): WorkerStatus {
        return {
            isRunning: this.inFlight !== null,
            schedulerActive: this.interval !== null,
            pollIntervalMs: this.options.pollIntervalMs,
            lastPollAt: this.lastPollAt,
            lastPollResult: this.lastPollResult,
        };
    }
}
