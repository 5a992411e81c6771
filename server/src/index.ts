/**
 * Server entry point
 *
 * Validates the environment, wires the container, serves the proxy routes
 * and runs the reconciliation worker until SIGINT/SIGTERM.
 */

import { buildPluginConfig, parseEnv } from './config/env.js';
import { createApp } from './app.js';
import { createContainer } from './bootstrap.js';
import { destroyKysely } from './db/index.js';
import { buildWorkerEntries, startAllWorkers, stopAllWorkers } from './services/workerRegistry.js';
import shutdownCoordinator from './utils/shutdownCoordinator.js';
import logger from './utils/logger.js';

const env = parseEnv();
const config = buildPluginConfig(env);
const container = createContainer(config, env.DATABASE_URL);

const app = createApp({
    config,
    jwtSecret: env.JWT_SECRET,
    erp: container.erp,
    repository: container.repository,
    dispatcher: container.dispatcher,
});

const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, erp: container.erp.urlFor('') }, 'ERP sync server listening');
});

const started = startAllWorkers(buildWorkerEntries(container.worker), {
    disableWorkers: env.DISABLE_BACKGROUND_WORKERS === 'true',
});
logger.info({ workers: started }, 'Background workers started');

shutdownCoordinator.register('httpServer', () => new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
}), 10_000);

async function shutdown(signal: string): Promise<void> {
    logger.info({ signal }, 'Shutting down');
    await stopAllWorkers();
    // the pool outlives the handlers: a draining worker may still query
    await destroyKysely();
    process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
        shutdown(signal).catch((err: unknown) => {
            logger.error({ err }, 'Shutdown failed');
            process.exit(1);
        });
    });
}
