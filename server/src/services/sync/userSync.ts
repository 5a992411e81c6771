/**
 * User Sync - staff users become ERP users with an agent partner
 */

import { ERP_ENDPOINTS, NotFoundError, UserDataSchema, UserReplySchema, buildUserData, parseRequest } from '@care-erp/shared';
import { parseReply } from '../erp/client.js';
import { syncLogger } from '../../utils/logger.js';
import type { ErpId, SyncDeps } from './types.js';

const log = syncLogger.child({ resource: 'user' });

export async function syncUser(deps: SyncDeps, externalId: string): Promise<ErpId> {
    const user = await deps.repository.findUser(externalId);
    if (!user) {
        throw new NotFoundError('User not found', 'User', externalId);
    }

    const data = parseRequest(UserDataSchema, buildUserData(user, deps.config.defaultPartnerState));
    const reply = parseReply(UserReplySchema, ERP_ENDPOINTS.addUser, await deps.erp.call(ERP_ENDPOINTS.addUser, data));

    const erpId = reply.user?.id ?? null;
    log.info({ externalId, erpId }, 'User synced');
    return erpId;
}
