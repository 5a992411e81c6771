/**
 * Sync handlers per transition
 *
 * Invoice and payment creates are followed by a reconciliation job; the
 * scheduler never throws, so scheduling cannot fail the host write.
 */

import type { ReconciliationScheduler } from '../reconciliation/index.js';
import type { SyncResources } from '../sync/index.js';
import type { SyncEventDispatcher } from './dispatcher.js';

export function registerSyncHandlers(
    dispatcher: SyncEventDispatcher,
    sync: SyncResources,
    scheduler: Pick<ReconciliationScheduler, 'schedule'>,
): SyncEventDispatcher {
    return dispatcher
        .on('user.saved', async ({ externalId }) => {
            await sync.syncUser(externalId);
        })
        .on('invoice.issued', async ({ externalId }) => {
            const erpId = await sync.syncInvoice(externalId);
            if (erpId !== null) {
                await scheduler.schedule('invoice', externalId);
            }
        })
        .on('invoice.cancelled', async ({ externalId }) => {
            await sync.syncInvoiceReturn(externalId);
        })
        .on('payment_reconciliation.active', async ({ externalId }) => {
            const erpId = await sync.syncPayment(externalId);
            if (erpId !== null) {
                await scheduler.schedule('payment', externalId);
            }
        })
        .on('payment_reconciliation.cancelled', async ({ externalId }) => {
            await sync.syncPaymentCancel(externalId);
        })
        .on('charge_item_definition.saved', async ({ externalId }) => {
            await sync.syncChargeItemDefinition(externalId);
        })
        .on('resource_category.saved', async ({ externalId }) => {
            await sync.syncCategory(externalId);
        })
        .on('organization.saved', async ({ externalId }) => {
            await sync.syncSupplier(externalId);
        })
        .on('delivery_order.completed', async ({ externalId }) => {
            await sync.syncDeliveryOrder(externalId);
        })
        .on('product.saved', async ({ externalId }) => {
            await sync.syncProduct(externalId);
        });
}
