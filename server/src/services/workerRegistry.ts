/**
 * Worker Registry - background workers of the server process.
 *
 * index.ts calls startAllWorkers() / stopAllWorkers() on startup/shutdown.
 * Every worker started here is registered for graceful shutdown.
 */

import shutdownCoordinator from '../utils/shutdownCoordinator.js';
import type { ShutdownCoordinator } from '../utils/shutdownCoordinator.js';
import logger from '../utils/logger.js';
import type { ReconciliationWorker } from './reconciliation/index.js';

export interface WorkerEntry {
    name: string;
    start: () => void;
    stop: () => void | Promise<void>;
    shutdownTimeout?: number;
}

export interface WorkerRegistryOptions {
    disableWorkers: boolean;
    coordinator?: ShutdownCoordinator;
}

export function buildWorkerEntries(reconciliation: ReconciliationWorker): WorkerEntry[] {
    return [
        {
            name: 'reconciliationWorker',
            start: () => reconciliation.start(),
            stop: () => reconciliation.stop(),
            shutdownTimeout: 30_000,
        },
    ];
}

export function startAllWorkers(workers: WorkerEntry[], options: WorkerRegistryOptions): string[] {
    const coordinator = options.coordinator ?? shutdownCoordinator;

    if (options.disableWorkers) {
        logger.warn('Background workers disabled (DISABLE_BACKGROUND_WORKERS=true)');
        return [];
    }

    for (const worker of workers) {
        worker.start();
        coordinator.register(worker.name, worker.stop, worker.shutdownTimeout ?? 5000);
    }
    return workers.map((worker) => worker.name);
}

export async function stopAllWorkers(coordinator: ShutdownCoordinator = shutdownCoordinator): Promise<void> {
    await coordinator.shutdown();
}
