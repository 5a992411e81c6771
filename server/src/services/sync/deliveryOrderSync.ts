/**
 * Delivery Order Sync - completed purchase deliveries as ERP vendor bills
 */

import {
    AccountMoveRequestSchema,
    ERP_ENDPOINTS,
    InvoiceReplySchema,
    NotFoundError,
    buildVendorBillRequest,
    parseRequest,
} from '@care-erp/shared';
import { parseReply } from '../erp/client.js';
import { syncLogger } from '../../utils/logger.js';
import type { ErpId, SyncDeps } from './types.js';

const log = syncLogger.child({ resource: 'delivery-order' });

/**
 * Orders from internal suppliers (stock moved between the host's own
 * stores) are never billed.
 */
export async function syncDeliveryOrder(deps: SyncDeps, externalId: string): Promise<ErpId> {
    const order = await deps.repository.findDeliveryOrder(externalId);
    if (!order) {
        throw new NotFoundError('Delivery order not found', 'DeliveryOrder', externalId);
    }

    const { supplier } = order;
    if (!supplier) {
        log.warn({ externalId }, 'Delivery order has no supplier, skipping');
        return null;
    }
    if (deps.config.internalSupplierIds.includes(supplier.externalId)) {
        log.info({ externalId, supplier: supplier.externalId }, 'Internal supplier, skipping');
        return null;
    }

    const data = parseRequest(
        AccountMoveRequestSchema,
        buildVendorBillRequest(order, supplier, deps.config.defaultPartnerState)
    );
    const reply = parseReply(
        InvoiceReplySchema,
        ERP_ENDPOINTS.accountMove,
        await deps.erp.call(ERP_ENDPOINTS.accountMove, data)
    );

    log.info({ externalId, erpId: reply.invoice.id }, 'Vendor bill synced');
    return reply.invoice.id;
}
