/**
 * In-process job store, for tests and the CLI's one-shot runs
 */

import { randomUUID } from 'node:crypto';
import { NotFoundError } from '../../utils/errors.js';
import { DUE_STATES, LEASED_STATES } from './types.js';
import type {
    NewReconciliationJob,
    ReconciliationJob,
    ReconciliationJobPatch,
    ReconciliationJobStore,
    ReconciliationKind,
} from './types.js';

export class MemoryJobStore implements ReconciliationJobStore {
    private readonly jobs = new Map<string, ReconciliationJob>();

    async create(job: NewReconciliationJob): Promise<ReconciliationJob> {
        const created: ReconciliationJob = {
            id: randomUUID(),
            kind: job.kind,
            targetExternalId: job.targetExternalId,
            state: 'scheduled',
            scheduledAt: job.scheduledAt,
            runAt: job.runAt,
            attempts: 0,
            lastError: null,
            updatedAt: job.scheduledAt,
        };
        this.jobs.set(created.id, created);
        return { ...created };
    }

    async claimDue(now: Date, limit: number, staleBefore: Date): Promise<ReconciliationJob[]> {
        const due = [...this.jobs.values()]
            .filter(
                (job) =>
                    (DUE_STATES.includes(job.state) && job.runAt.getTime() <= now.getTime()) ||
                    (LEASED_STATES.includes(job.state) && job.updatedAt.getTime() < staleBefore.getTime())
            )
            .sort((a, b) => a.runAt.getTime() - b.runAt.getTime())
            .slice(0, limit);

        for (const job of due) {
            job.state = 'checking';
            job.updatedAt = now;
        }
        return due.map((job) => ({ ...job }));
    }

    async update(id: string, patch: ReconciliationJobPatch, now: Date): Promise<ReconciliationJob> {
        const job = this.jobs.get(id);
        if (!job) {
            throw new NotFoundError('Reconciliation job not found', 'ReconciliationJob', id);
        }
        Object.assign(job, patch, { updatedAt: now });
        return { ...job };
    }

    async get(id: string): Promise<ReconciliationJob | null> {
        const job = this.jobs.get(id);
        return job ? { ...job } : null;
    }

    async listByTarget(kind: ReconciliationKind, targetExternalId: string): Promise<ReconciliationJob[]> {
        return [...this.jobs.values()]
            .filter((job) => job.kind === kind && job.targetExternalId === targetExternalId)
            .sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime())
            .map((job) => ({ ...job }));
    }

    all(): ReconciliationJob[] {
        return [...this.jobs.values()].map((job) => ({ ...job }));
    }
}
