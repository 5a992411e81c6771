/**
 * Sync Transitions
 *
 * The closed set of (entity, transition) keys a host save can trigger,
 * and the classifier that maps a saved record onto them.
 */

import {
    CHARGE_ITEM_CATEGORY_RESOURCE_TYPE,
    INVOICE_CANCELLED_STATUSES,
    INVOICE_RETURNABLE_STATUSES,
    PAYMENT_CANCELLED_STATUSES,
    SUPPLIER_ORG_TYPE,
} from '@care-erp/shared';
import type { SyncEvent, SyncEventOf } from '@care-erp/shared';

// ============================================
// KEYS
// ============================================

export interface EventByKey {
    'user.saved': SyncEventOf<'user'>;
    'invoice.issued': SyncEventOf<'invoice'>;
    'invoice.cancelled': SyncEventOf<'invoice'>;
    'payment_reconciliation.active': SyncEventOf<'payment_reconciliation'>;
    'payment_reconciliation.cancelled': SyncEventOf<'payment_reconciliation'>;
    'charge_item_definition.saved': SyncEventOf<'charge_item_definition'>;
    'resource_category.saved': SyncEventOf<'resource_category'>;
    'organization.saved': SyncEventOf<'organization'>;
    'delivery_order.completed': SyncEventOf<'delivery_order'>;
    'product.saved': SyncEventOf<'product'>;
}

export type TransitionKey = keyof EventByKey;

export type Transition = { [K in TransitionKey]: { key: K; event: EventByKey[K] } }[TransitionKey];

/** The ERP number write-back; never a sync trigger */
export function isNumberWriteBack(event: SyncEvent): boolean {
    return event.updateFields !== null && event.updateFields.length === 1 && event.updateFields[0] === 'number';
}

// ============================================
// CLASSIFIER
// ============================================

/**
 * Transitions a saved record triggers. At most one per save.
 */
export function classify(event: SyncEvent): Transition[] {
    switch (event.entity) {
        case 'user':
            return [{ key: 'user.saved', event }];

        case 'invoice':
            if (isNumberWriteBack(event)) return [];
            if (event.status === 'issued') return [{ key: 'invoice.issued', event }];
            if (
                INVOICE_CANCELLED_STATUSES.includes(event.status) &&
                event.previousStatus !== null &&
                INVOICE_RETURNABLE_STATUSES.includes(event.previousStatus)
            ) {
                return [{ key: 'invoice.cancelled', event }];
            }
            return [];

        case 'payment_reconciliation':
            if (event.status === 'active') return [{ key: 'payment_reconciliation.active', event }];
            if (PAYMENT_CANCELLED_STATUSES.includes(event.status)) {
                return [{ key: 'payment_reconciliation.cancelled', event }];
            }
            return [];

        case 'charge_item_definition':
            return [{ key: 'charge_item_definition.saved', event }];

        case 'resource_category':
            return event.resourceType === CHARGE_ITEM_CATEGORY_RESOURCE_TYPE
                ? [{ key: 'resource_category.saved', event }]
                : [];

        case 'organization':
            return event.orgType === SUPPLIER_ORG_TYPE ? [{ key: 'organization.saved', event }] : [];

        case 'delivery_order':
            return event.status === 'completed' && !event.originExternalId
                ? [{ key: 'delivery_order.completed', event }]
                : [];

        case 'product':
            return event.chargeItemDefinitionExternalId ? [{ key: 'product.saved', event }] : [];
    }
}
