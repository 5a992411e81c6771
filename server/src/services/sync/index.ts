/**
 * Sync Resources
 *
 * One function per (entity, direction). `createSyncResources` binds them
 * to their dependencies for the dispatcher, reconciliation and the CLI.
 */

import { syncCategory, syncChargeItemDefinition, syncProduct } from './catalogSync.js';
import { syncDeliveryOrder } from './deliveryOrderSync.js';
import { returnInvoice, syncInvoice, syncInvoiceReturn } from './invoiceSync.js';
import { syncSupplier } from './partnerSync.js';
import { cancelPayment, syncPayment, syncPaymentCancel } from './paymentSync.js';
import { syncUser } from './userSync.js';
import type { ErpId, SyncDeps } from './types.js';

export interface SyncResources {
    syncUser(externalId: string): Promise<ErpId>;
    syncChargeItemDefinition(externalId: string): Promise<ErpId>;
    syncProduct(externalId: string): Promise<ErpId>;
    syncCategory(externalId: string): Promise<ErpId>;
    syncSupplier(externalId: string): Promise<ErpId>;
    syncInvoice(externalId: string): Promise<ErpId>;
    syncInvoiceReturn(externalId: string): Promise<ErpId>;
    returnInvoice(externalId: string, reason: string): Promise<ErpId>;
    syncPayment(externalId: string): Promise<ErpId>;
    syncPaymentCancel(externalId: string): Promise<ErpId>;
    cancelPayment(externalId: string, reason: string): Promise<ErpId>;
    syncDeliveryOrder(externalId: string): Promise<ErpId>;
}

export function createSyncResources(deps: SyncDeps): SyncResources {
    return {
        syncUser: (id) => syncUser(deps, id),
        syncChargeItemDefinition: (id) => syncChargeItemDefinition(deps, id),
        syncProduct: (id) => syncProduct(deps, id),
        syncCategory: (id) => syncCategory(deps, id),
        syncSupplier: (id) => syncSupplier(deps, id),
        syncInvoice: (id) => syncInvoice(deps, id),
        syncInvoiceReturn: (id) => syncInvoiceReturn(deps, id),
        returnInvoice: (id, reason) => returnInvoice(deps, id, reason),
        syncPayment: (id) => syncPayment(deps, id),
        syncPaymentCancel: (id) => syncPaymentCancel(deps, id),
        cancelPayment: (id, reason) => cancelPayment(deps, id, reason),
        syncDeliveryOrder: (id) => syncDeliveryOrder(deps, id),
    };
}

export type { ErpId, SyncDeps } from './types.js';
export { buildInvoiceContext } from './invoiceSync.js';
export { readPaymentMethodLink, writePaymentMethodLink } from './accountLink.js';
