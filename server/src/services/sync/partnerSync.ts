/**
 * Partner Sync - supplier organizations as ERP company partners
 */

import {
    ERP_ENDPOINTS,
    NotFoundError,
    PartnerDataSchema,
    PartnerReplySchema,
    buildSupplierPartner,
    parseRequest,
} from '@care-erp/shared';
import { parseReply } from '../erp/client.js';
import { syncLogger } from '../../utils/logger.js';
import type { ErpId, SyncDeps } from './types.js';

const log = syncLogger.child({ resource: 'partner' });

export async function syncSupplier(deps: SyncDeps, externalId: string): Promise<ErpId> {
    const organization = await deps.repository.findOrganization(externalId);
    if (!organization) {
        throw new NotFoundError('Organization not found', 'Organization', externalId);
    }

    const data = parseRequest(PartnerDataSchema, buildSupplierPartner(organization, deps.config.defaultPartnerState));
    const reply = parseReply(
        PartnerReplySchema,
        ERP_ENDPOINTS.addPartner,
        await deps.erp.call(ERP_ENDPOINTS.addPartner, data)
    );

    const erpId = reply.partner?.id ?? null;
    log.info({ externalId, erpId }, 'Supplier synced');
    return erpId;
}
