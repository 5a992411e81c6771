/**
 * Service container
 *
 * Wires every long-lived service from one PluginConfig and one database.
 * The HTTP entry point and the CLI both start from here.
 */

import type { PluginConfig } from './config/pluginConfig.js';
import { createKysely } from './db/index.js';
import type { KyselyDB } from './db/index.js';
import { KyselyHostRepository } from './repositories/kyselyHostRepository.js';
import type { HostRepository } from './repositories/hostRepository.js';
import { ErpClient } from './services/erp/client.js';
import { SyncEventDispatcher, registerSyncHandlers } from './services/hooks/index.js';
import {
    KyselyJobStore,
    ReconciliationScheduler,
    ReconciliationTask,
    ReconciliationWorker,
} from './services/reconciliation/index.js';
import type { ReconciliationJobStore } from './services/reconciliation/index.js';
import { createSyncResources } from './services/sync/index.js';
import type { SyncResources } from './services/sync/index.js';

export interface Container {
    config: PluginConfig;
    db: KyselyDB;
    erp: ErpClient;
    repository: HostRepository;
    sync: SyncResources;
    jobStore: ReconciliationJobStore;
    scheduler: ReconciliationScheduler;
    worker: ReconciliationWorker;
    dispatcher: SyncEventDispatcher;
}

export function createContainer(config: PluginConfig, databaseUrl: string): Container {
    const db = createKysely(databaseUrl);
    const erp = new ErpClient(config.erp);
    const repository = new KyselyHostRepository(db);
    const sync = createSyncResources({ erp, repository, config });

    const jobStore = new KyselyJobStore(db);
    const scheduler = new ReconciliationScheduler(jobStore, config.reconciliation.delaySeconds);
    const task = new ReconciliationTask({ store: jobStore, repository, sync, config: config.reconciliation });
    const worker = new ReconciliationWorker(jobStore, task, {
        pollIntervalMs: config.reconciliation.pollIntervalMs,
        leaseMs: config.reconciliation.leaseSeconds * 1000,
    });

    const dispatcher = new SyncEventDispatcher(repository);
    registerSyncHandlers(dispatcher, sync, scheduler);

    return { config, db, erp, repository, sync, jobStore, scheduler, worker, dispatcher };
}

export { buildErpConfig, buildPluginConfig, erpEnvSchema, ERP_REQUIRED_SETTINGS, parseEnv } from './config/env.js';
export type { Env, ErpEnv } from './config/env.js';
export type { ErpConnectionConfig } from './config/pluginConfig.js';
export { destroyKysely } from './db/index.js';
export { LIST_FILTERS } from './repositories/hostRepository.js';
export type { BulkSyncKind, HostRepository, ListOptions, SyncTargetRef } from './repositories/hostRepository.js';
export { ErpClient } from './services/erp/client.js';
export { createSyncResources } from './services/sync/index.js';
export type { ErpId, SyncResources } from './services/sync/index.js';
