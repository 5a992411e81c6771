/**
 * Reconciliation - delayed two-phase existence checks after invoice and
 * payment syncs, with compensating ERP calls for rolled-back host writes.
 */

export * from './types.js';
export { ReconciliationTask, defaultSleep, systemClock } from './task.js';
export type { Clock, ReconciliationTaskDeps, Sleep } from './task.js';
export { ReconciliationScheduler } from './scheduler.js';
export { ReconciliationWorker } from './worker.js';
export type { PollResult, ReconciliationWorkerOptions, WorkerStatus } from './worker.js';
export { KyselyJobStore } from './kyselyJobStore.js';
export { MemoryJobStore } from './memoryJobStore.js';
