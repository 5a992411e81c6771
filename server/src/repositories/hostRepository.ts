/**
 * Host Repository
 *
 * Read access to the clinical host's records plus the two scoped writes the
 * sync performs (invoice number write-back, account meta link). Production
 * uses KyselyHostRepository; tests use the in-memory implementation.
 */

import type {
    HostAccount,
    HostCategory,
    HostChargeItemDefinition,
    HostDeliveryOrder,
    HostFacility,
    HostInvoice,
    HostLocation,
    HostOrganization,
    HostPaymentReconciliation,
    HostProduct,
    HostUser,
    InvoiceStatus,
    PaymentStatus,
} from '@care-erp/shared';
import { ValidationError } from '@care-erp/shared';

// ============================================
// BULK LISTING
// ============================================

/** Record sets the bulk sync walks */
export type BulkSyncKind = 'users' | 'products' | 'categories' | 'suppliers';

/** Filter keys accepted per record set (`--filter key=value`) */
export const LIST_FILTERS = {
    users: ['external_id', 'username', 'email'],
    products: ['external_id', 'title', 'status'],
    categories: ['external_id', 'title'],
    suppliers: ['external_id', 'name'],
} as const satisfies Record<BulkSyncKind, readonly string[]>;

export type ListFilterKey<K extends BulkSyncKind> = (typeof LIST_FILTERS)[K][number];

export interface ListOptions {
    filters?: Record<string, string>;
    /** Users only: include soft-deleted accounts */
    includeDeleted?: boolean;
    limit?: number;
    offset?: number;
}

/** One record of a bulk listing: what to sync and how to show it */
export interface SyncTargetRef {
    externalId: string;
    label: string;
}

/**
 * Narrow user-supplied filters to the keys allowed for a record set.
 *
 * @throws ValidationError naming the allowed keys
 */
export function checkFilters<K extends BulkSyncKind>(
    kind: K,
    filters: Record<string, string> = {}
): Array<[ListFilterKey<K>, string]> {
    const allowed: readonly string[] = LIST_FILTERS[kind];
    const checked: Array<[ListFilterKey<K>, string]> = [];
    for (const [key, value] of Object.entries(filters)) {
        if (!isFilterKey(kind, key)) {
            throw new ValidationError(`Unknown filter '${key}' for ${kind}. Allowed: ${allowed.join(', ')}`);
        }
        checked.push([key, value]);
    }
    return checked;
}

function isFilterKey<K extends BulkSyncKind>(kind: K, key: string): key is ListFilterKey<K> {
    const allowed: readonly string[] = LIST_FILTERS[kind];
    return allowed.includes(key);
}

// ============================================
// REPOSITORY
// ============================================

export interface HostRepository {
    findUser(externalId: string): Promise<HostUser | null>;
    findCategory(externalId: string): Promise<HostCategory | null>;
    findChargeItemDefinition(externalId: string): Promise<HostChargeItemDefinition | null>;
    findProduct(externalId: string): Promise<HostProduct | null>;
    findOrganization(externalId: string): Promise<HostOrganization | null>;
    findFacility(externalId: string): Promise<HostFacility | null>;
    /** Location scoped to its facility; null when it belongs elsewhere */
    findLocation(facilityExternalId: string, locationExternalId: string): Promise<HostLocation | null>;
    findAccount(externalId: string): Promise<HostAccount | null>;
    findInvoice(externalId: string): Promise<HostInvoice | null>;
    findPayment(externalId: string): Promise<HostPaymentReconciliation | null>;
    findDeliveryOrder(externalId: string): Promise<HostDeliveryOrder | null>;

    /** Persisted status, read before a save for transition detection */
    findInvoiceStatus(externalId: string): Promise<InvoiceStatus | null>;
    findPaymentStatus(externalId: string): Promise<PaymentStatus | null>;

    invoiceExists(externalId: string): Promise<boolean>;
    paymentExists(externalId: string): Promise<boolean>;

    listSyncTargets(kind: BulkSyncKind, options?: ListOptions): Promise<SyncTargetRef[]>;
    countSyncTargets(kind: BulkSyncKind, options?: ListOptions): Promise<number>;

    hasLocationAccess(userExternalId: string, locationExternalId: string): Promise<boolean>;

    /** Writes only the `number` column */
    setInvoiceNumber(externalId: string, number: string): Promise<void>;
    /** Replaces the account's opaque meta map */
    updateAccountMeta(externalId: string, meta: Record<string, unknown>): Promise<void>;
}
