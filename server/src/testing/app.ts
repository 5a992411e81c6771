/**
 * Express app over in-memory storage and the recording ERP, for route tests
 */

import type { Express } from 'express';
import { makeFacility, makeLocation } from '@care-erp/shared/testing';
import { createApp } from '../app.js';
import { signToken } from '../middleware/auth.js';
import type { AuthUser } from '../middleware/auth.js';
import { SyncEventDispatcher, registerSyncHandlers } from '../services/hooks/index.js';
import { MemoryJobStore, ReconciliationScheduler } from '../services/reconciliation/index.js';
import { createSyncResources } from '../services/sync/index.js';
import { testConfig } from './config.js';
import { FakeErp } from './fakeErp.js';
import { InMemoryHostRepository } from './inMemoryHostRepository.js';

export const TEST_JWT_SECRET = 'test-secret';

export const CASHIER: AuthUser = {
    userExternalId: 'user-cashier',
    username: 'cashier1',
    name: 'Ravi Kumar',
    isSuperuser: false,
};

export interface TestApp {
    app: Express;
    erp: FakeErp;
    repository: InMemoryHostRepository;
    jobs: MemoryJobStore;
    /** `Authorization` header value for the user */
    bearer(user?: AuthUser): string;
}

/**
 * Seeds facility `fac-1` with counter `loc-counter-1` ("Front Desk"),
 * which the cashier may use.
 */
export function createTestApp(): TestApp {
    const config = testConfig();
    const erp = new FakeErp();
    const repository = new InMemoryHostRepository();
    const jobs = new MemoryJobStore();

    repository.facilities.set('fac-1', makeFacility());
    repository.locations.set('loc-counter-1', makeLocation());
    repository.grantLocationAccess(CASHIER.userExternalId, 'loc-counter-1');

    const dispatcher = new SyncEventDispatcher(repository);
    registerSyncHandlers(dispatcher, createSyncResources({ erp, repository, config }), new ReconciliationScheduler(jobs, 60));

    const app = createApp({ config, jwtSecret: TEST_JWT_SECRET, erp, repository, dispatcher });

    return {
        app,
        erp,
        repository,
        jobs,
        bearer: (user = CASHIER) => `Bearer ${signToken(user, TEST_JWT_SECRET)}`,
    };
}
