/**
 * Cash Session Routes
 *
 * Facility-scoped proxy to the ERP's cash sessions and counters.
 * Mounted at /api/facility/:facilityId/cash-session. Session state lives in
 * the ERP; these routes authorize the counter, forward and reshape.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    CloseSessionRequestSchema,
    CounterDataSchema,
    CurrentSessionRequestSchema,
    ERP_ENDPOINTS,
    ErpCashReplySchema,
    ListSessionsQuerySchema,
    OpenSessionRequestSchema,
    SessionDataSchema,
} from '@care-erp/shared';
import type { z } from 'zod';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import { requireUser } from '../middleware/auth.js';
import type { ErpRpc } from '../services/erp/client.js';
import { expectSuccess, listField, relay } from '../services/erp/relay.js';
import { authorizeLocation, displayName, resolveFacility } from '../services/cash/locationAccess.js';
import type { LocationRepository } from '../services/cash/locationAccess.js';
import { cashLogger } from '../utils/logger.js';

export interface CashRouteDeps {
    erp: ErpRpc;
    repository: LocationRepository;
}

export function createCashSessionRouter({ erp, repository }: CashRouteDeps): Router {
    const router: Router = Router({ mergeParams: true });

    /**
     * POST /api/facility/:facilityId/cash-session
     * Open a session for the caller at a counter
     */
    router.post('/', typedRoute(OpenSessionRequestSchema, 'body', async (body, req, res) => {
        const user = requireUser(req);
        const facility = await resolveFacility(repository, req.params.facilityId);
        const location = await authorizeLocation(repository, user, facility, body.counter_x_care_id);

        const payload = {
            external_user_id: user.userExternalId,
            external_user_name: displayName(user),
            counter_x_care_id: location.externalId,
            opening_balance: body.opening_balance,
        };
        cashLogger.info({ username: user.username, facility: facility.name, payload }, 'Opening cash session');

        const session = await relay(
            erp,
            { endpoint: ERP_ENDPOINTS.cashSession, payload },
            'Error opening cash session',
            (reply) => SessionDataSchema.parse(expectSuccess(reply, 'Failed to open session in ERP').session ?? {}),
        );

        res.status(201).json({ success: true, session });
    }));

    /**
     * POST|PUT /api/facility/:facilityId/cash-session/close
     * Close the caller's session at a counter
     */
    const closeSession = typedRoute(CloseSessionRequestSchema, 'body', async (body, req, res) => {
        const user = requireUser(req);
        const facility = await resolveFacility(repository, req.params.facilityId);
        const location = await authorizeLocation(repository, user, facility, body.counter_x_care_id);

        const payload = {
            external_user_id: user.userExternalId,
            facility_external_id: facility.externalId,
            counter_x_care_id: location.externalId,
            closed_by_ext_id: user.userExternalId,
            closed_by_name: displayName(user),
        };
        cashLogger.info({ username: user.username, facility: facility.name, payload }, 'Closing cash session');

        const session = await relay(
            erp,
            { endpoint: ERP_ENDPOINTS.cashSessionClose, payload, method: 'PUT' },
            'Error closing cash session',
            (reply) => SessionDataSchema.parse(expectSuccess(reply, 'Failed to close session in ERP').session ?? {}),
        );

        res.json({ success: true, session });
    });
    router.post('/close', closeSession);
    router.put('/close', closeSession);

    /**
     * GET  /api/facility/:facilityId/cash-session/current?counter_x_care_id=
     * POST /api/facility/:facilityId/cash-session/current
     * The caller's open session at a counter, if any
     */
    const currentSession = async (input: z.output<typeof CurrentSessionRequestSchema>, req: Request, res: Response): Promise<void> => {
        const user = requireUser(req);
        const facility = await resolveFacility(repository, req.params.facilityId);
        const location = await authorizeLocation(repository, user, facility, input.counter_x_care_id);

        const payload = {
            external_user_id: user.userExternalId,
            counter_x_care_id: location.externalId,
        };
        cashLogger.info({ username: user.username, facility: facility.name, payload }, 'Getting current cash session');

        const session = await relay(
            erp,
            { endpoint: ERP_ENDPOINTS.cashSessionCurrent, payload },
            'Error getting current cash session',
            (reply) => {
                // no success flag check: an absent session is a normal answer
                const found = ErpCashReplySchema.parse(reply).session;
                return found ? SessionDataSchema.parse(found) : null;
            },
        );

        if (!session) {
            res.json({ success: true, session: null, message: 'No open session' });
            return;
        }
        res.json({ success: true, session });
    };
    router.get('/current', typedRoute(CurrentSessionRequestSchema, 'query', currentSession));
    router.post('/current', typedRoute(CurrentSessionRequestSchema, 'body', currentSession));

    /**
     * GET /api/facility/:facilityId/cash-session/list?status=
     * The caller's sessions in the facility
     */
    router.get(['/', '/list'], typedRoute(ListSessionsQuerySchema, 'query', async (query, req, res) => {
        const user = requireUser(req);
        const facility = await resolveFacility(repository, req.params.facilityId);

        const params = new URLSearchParams({
            facility_external_id: facility.externalId,
            external_user_id: user.userExternalId,
        });
        if (query.status) params.set('status', query.status);
        cashLogger.info({ facility: facility.name, query: params.toString() }, 'Listing cash sessions');

        const sessions = await relay(
            erp,
            { endpoint: `${ERP_ENDPOINTS.cashSessionList}?${params.toString()}`, method: 'GET' },
            'Error listing cash sessions',
            (reply) => listField(reply, 'sessions').map((entry) => SessionDataSchema.parse(entry)),
        );

        res.json({ success: true, sessions });
    }));

    /**
     * GET /api/facility/:facilityId/cash-session/counters
     * Counters with their open-session summary
     */
    router.get('/counters', asyncHandler(async (req: Request, res: Response) => {
        requireUser(req);
        const facility = await resolveFacility(repository, req.params.facilityId);
        cashLogger.info({ facility: facility.name }, 'Listing cash counters');

        const counters = await relay(
            erp,
            { endpoint: ERP_ENDPOINTS.cashCounters, method: 'GET' },
            'Error listing cash counters',
            (reply) => listField(reply, 'counters').map((entry) => CounterDataSchema.parse(entry)),
        );

        res.json({ success: true, counters, count: counters.length });
    }));

    return router;
}
