/**
 * Express application
 *
 * Built from explicit dependencies so tests can mount it with in-memory
 * storage and a fake ERP. Everything except /api/ping needs a host token.
 */

import express from 'express';
import type { Express } from 'express';
import type { PluginConfig } from './config/pluginConfig.js';
import { authenticateToken } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import type { HostRepository } from './repositories/hostRepository.js';
import { createAccountRouter } from './routes/account.js';
import { createCashSessionRouter } from './routes/cashSession.js';
import { createCashTransferRouter } from './routes/cashTransfer.js';
import { createHookRouter } from './routes/hooks.js';
import { createLookupRouter } from './routes/lookups.js';
import type { ErpRpc } from './services/erp/client.js';
import type { SyncEventDispatcher } from './services/hooks/dispatcher.js';
import { requestLogger } from './utils/logger.js';

export interface AppDeps {
    config: PluginConfig;
    jwtSecret: string;
    erp: ErpRpc;
    repository: HostRepository;
    dispatcher: Pick<SyncEventDispatcher, 'afterSave'>;
}

export function createApp(deps: AppDeps): Express {
    const { config, jwtSecret, erp, repository, dispatcher } = deps;
    const app = express();

    app.use(express.json({ limit: '1mb' }));
    app.use(requestLogger);

    /** GET /api/ping */
    app.get('/api/ping', (_req, res) => {
        res.json({ status: 'ok' });
    });

    app.use('/api', authenticateToken(jwtSecret));

    app.use('/api', createLookupRouter({ erp }));
    app.use('/api/account', createAccountRouter({ erp, repository, config }));
    app.use('/api/facility/:facilityId/cash-session', createCashSessionRouter({ erp, repository }));
    app.use('/api/facility/:facilityId/cash-transfer', createCashTransferRouter({ erp, repository }));
    app.use('/api/hooks', createHookRouter({ dispatcher }));

    app.use(errorHandler);

    return app;
}
