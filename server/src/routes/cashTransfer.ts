/**
 * Cash Transfer Routes
 *
 * Facility-scoped proxy to the ERP's cash transfers between counters.
 * Mounted at /api/facility/:facilityId/cash-transfer.
 */

import { Router } from 'express';
import type { RequestHandler } from 'express';
import {
    AcceptTransferRequestSchema,
    CancelTransferRequestSchema,
    CreateTransferRequestSchema,
    ERP_ENDPOINTS,
    ListTransfersQuerySchema,
    PendingTransfersQuerySchema,
    RejectTransferRequestSchema,
    TransferDataSchema,
} from '@care-erp/shared';
import type { TransferData } from '@care-erp/shared';
import { typedRoute } from '../middleware/asyncHandler.js';
import { requireUser } from '../middleware/auth.js';
import { expectSuccess, listField, relay } from '../services/erp/relay.js';
import type { ErpRpc } from '../services/erp/client.js';
import { authorizeLocation, displayName, resolveFacility } from '../services/cash/locationAccess.js';
import { cashLogger } from '../utils/logger.js';
import type { CashRouteDeps } from './cashSession.js';

function readTransfer(reply: unknown, failure: string): TransferData {
    return TransferDataSchema.parse(expectSuccess(reply, failure).transfer ?? {});
}

/** PUT a resolution to `api/care/cash/transfer/<id>/<action>` */
async function resolveTransfer(
    erp: ErpRpc,
    transferId: string,
    action: 'accept' | 'reject' | 'cancel',
    payload: Record<string, unknown>,
    verb: string,
): Promise<TransferData> {
    return relay(
        erp,
        { endpoint: `${ERP_ENDPOINTS.cashTransfer}/${encodeURIComponent(transferId)}/${action}`, payload, method: 'PUT' },
        `Error ${verb} cash transfer`,
        (reply) => readTransfer(reply, `Failed to ${action} transfer in ERP`),
    );
}

export function createCashTransferRouter({ erp, repository }: CashRouteDeps): Router {
    const router: Router = Router({ mergeParams: true });

    /**
     * GET /api/facility/:facilityId/cash-transfer?status=&counter_x_care_id=&from_session_id=
     * Transfers of the facility; filtering by counter requires access to it
     */
    router.get('/', typedRoute(ListTransfersQuerySchema, 'query', async (query, req, res) => {
        const user = requireUser(req);
        const facility = await resolveFacility(repository, req.params.facilityId);

        const params = new URLSearchParams({ facility_external_id: facility.externalId });
        if (query.status) params.set('status', query.status);
        if (query.counter_x_care_id) {
            const location = await authorizeLocation(repository, user, facility, query.counter_x_care_id);
            params.set('counter_x_care_id', location.externalId);
        }
        if (query.from_session_id) params.set('from_session_id', query.from_session_id);
        cashLogger.info({ facility: facility.name, query: params.toString() }, 'Listing cash transfers');

        const transfers = await relay(
            erp,
            { endpoint: `${ERP_ENDPOINTS.cashTransferList}?${params.toString()}`, method: 'GET' },
            'Error listing cash transfers',
            (reply) => listField(reply, 'transfers').map((entry) => TransferDataSchema.parse(entry)),
        );

        res.json({ success: true, transfers });
    }));

    /**
     * POST /api/facility/:facilityId/cash-transfer
     * Hand cash from the caller's counter to another session
     */
    router.post('/', typedRoute(CreateTransferRequestSchema, 'body', async (body, req, res) => {
        const user = requireUser(req);
        const facility = await resolveFacility(repository, req.params.facilityId);
        const from = await authorizeLocation(repository, user, facility, body.from_counter_x_care_id);

        const payload = {
            from_user_id: user.userExternalId,
            facility_external_id: facility.externalId,
            from_counter_x_care_id: from.externalId,
            to_session_id: body.to_session_id,
            amount: body.amount,
            created_by_ext_id: user.userExternalId,
            created_by_name: displayName(user),
            denominations: body.denominations,
        };
        cashLogger.info({ username: user.username, facility: facility.name, payload }, 'Creating cash transfer');

        const transfer = await relay(
            erp,
            { endpoint: ERP_ENDPOINTS.cashTransfer, payload },
            'Error creating cash transfer',
            (reply) => readTransfer(reply, 'Failed to create transfer in ERP'),
        );

        res.status(201).json({ success: true, transfer });
    }));

    /**
     * POST|PUT /api/facility/:facilityId/cash-transfer/:transferId/accept
     */
    const accept: RequestHandler = typedRoute(AcceptTransferRequestSchema, 'body', async (body, req, res) => {
        const user = requireUser(req);
        const facility = await resolveFacility(repository, req.params.facilityId);
        const location = await authorizeLocation(repository, user, facility, body.counter_x_care_id);

        cashLogger.info({ transferId: req.params.transferId, username: user.username }, 'Accepting cash transfer');
        const transfer = await resolveTransfer(erp, req.params.transferId, 'accept', {
            facility_external_id: facility.externalId,
            counter_x_care_id: location.externalId,
            resolved_by_ext_id: user.userExternalId,
            resolved_by_name: displayName(user),
        }, 'accepting');

        res.json({ success: true, transfer });
    });

    /**
     * POST|PUT /api/facility/:facilityId/cash-transfer/:transferId/reject
     */
    const reject: RequestHandler = typedRoute(RejectTransferRequestSchema, 'body', async (body, req, res) => {
        const user = requireUser(req);
        const facility = await resolveFacility(repository, req.params.facilityId);
        const location = await authorizeLocation(repository, user, facility, body.counter_x_care_id);

        cashLogger.info({ transferId: req.params.transferId, username: user.username }, 'Rejecting cash transfer');
        const transfer = await resolveTransfer(erp, req.params.transferId, 'reject', {
            facility_external_id: facility.externalId,
            counter_x_care_id: location.externalId,
            resolved_by_ext_id: user.userExternalId,
            resolved_by_name: displayName(user),
            reason: body.reason,
        }, 'rejecting');

        res.json({ success: true, transfer });
    });

    /**
     * POST|PUT /api/facility/:facilityId/cash-transfer/:transferId/cancel
     * Sender withdraws a pending transfer
     */
    const cancel: RequestHandler = typedRoute(CancelTransferRequestSchema, 'body', async (body, req, res) => {
        const user = requireUser(req);
        const facility = await resolveFacility(repository, req.params.facilityId);
        const location = await authorizeLocation(repository, user, facility, body.counter_x_care_id);

        cashLogger.info({ transferId: req.params.transferId, username: user.username }, 'Cancelling cash transfer');
        const transfer = await resolveTransfer(erp, req.params.transferId, 'cancel', {
            facility_external_id: facility.externalId,
            counter_x_care_id: location.externalId,
            cancelled_by_ext_id: user.userExternalId,
            cancelled_by_name: displayName(user),
            reason: body.reason,
        }, 'cancelling');

        res.json({ success: true, transfer });
    });

    /**
     * GET /api/facility/:facilityId/cash-transfer/pending?counter_x_care_id=
     * Incoming transfers waiting at a counter
     */
    router.get('/pending', typedRoute(PendingTransfersQuerySchema, 'query', async (query, req, res) => {
        const user = requireUser(req);
        const facility = await resolveFacility(repository, req.params.facilityId);
        const location = await authorizeLocation(repository, user, facility, query.counter_x_care_id);

        const payload = {
            facility_external_id: facility.externalId,
            external_user_id: user.userExternalId,
            counter_x_care_id: location.externalId,
        };
        cashLogger.info({ counter: location.name, facility: facility.name }, 'Getting pending transfers');

        const transfers = await relay(
            erp,
            { endpoint: ERP_ENDPOINTS.cashTransferPending, payload },
            'Error getting pending transfers',
            (reply) => listField(reply, 'transfers').map((entry) => TransferDataSchema.parse(entry)),
        );

        res.json({ success: true, transfers });
    }));

    for (const [action, handler] of [['accept', accept], ['reject', reject], ['cancel', cancel]] as const) {
        router.post(`/:transferId/${action}`, handler);
        router.put(`/:transferId/${action}`, handler);
    }

    return router;
}
