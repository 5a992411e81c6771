/**
 * Host record snapshots
 *
 * Read-only views of the clinical host's records, loaded by the server's
 * host repository at sync time. Never persisted by this package.
 */

import type {
    AccountExtension,
    DeliveryOrderExtension,
    MonetaryComponent,
    PaymentExtension,
    SupplierMetadata,
    SupplyDeliveryExtension,
} from '../schemas/extensions.js';
import type {
    ChargeItemDefinitionStatusSchema,
    DeliveryOrderStatusSchema,
    InvoiceStatusSchema,
    PaymentStatusSchema,
} from '../schemas/statuses.js';
import type { z } from 'zod';

// ============================================
// STATUS UNIONS
// ============================================

export type InvoiceStatus = z.infer<typeof InvoiceStatusSchema>;

export type PaymentStatus = z.infer<typeof PaymentStatusSchema>;

export type ChargeItemDefinitionStatus = z.infer<typeof ChargeItemDefinitionStatusSchema>;

export type DeliveryOrderStatus = z.infer<typeof DeliveryOrderStatusSchema>;

/** Payment method codes used by the host's payment reconciliation */
export type PaymentMethodCode = 'cash' | 'ccca' | 'cchk' | 'cdac' | 'chck' | 'ddpo' | 'debc';

// ============================================
// CATALOG
// ============================================

export interface HostCategory {
    externalId: string;
    title: string;
    resourceType: string;
    parentExternalId: string | null;
}

export interface HostChargeItemDefinition {
    externalId: string;
    title: string;
    status: ChargeItemDefinitionStatus;
    priceComponents: MonetaryComponent[];
    category: HostCategory | null;
}

export interface HostProductKnowledge {
    externalId: string;
    name: string;
    alternateIdentifier: string | null;
}

export interface HostProduct {
    externalId: string;
    status: string;
    chargeItemDefinition: HostChargeItemDefinition | null;
    productKnowledge: HostProductKnowledge | null;
}

// ============================================
// PEOPLE & ORGANIZATIONS
// ============================================

export interface HostUser {
    externalId: string;
    username: string;
    prefix: string | null;
    firstName: string | null;
    lastName: string | null;
    suffix: string | null;
    email: string;
    phoneNumber: string;
    deleted: boolean;
}

export interface PatientIdentifier {
    configId: string;
    value: string;
}

export interface HostPatient {
    externalId: string;
    name: string;
    phoneNumber: string;
    gender: string | null;
    dateOfBirth: Date | null;
    address: string | null;
    identifiers: PatientIdentifier[];
}

export interface HostOrganization {
    externalId: string;
    name: string;
    orgType: string;
    metadata: SupplierMetadata;
}

export interface HostFacility {
    externalId: string;
    name: string;
    state: string | null;
}

export interface HostLocation {
    externalId: string;
    name: string;
    facilityExternalId: string;
}

// ============================================
// BILLING
// ============================================

export interface HostAccount {
    externalId: string;
    name: string;
    patient: HostPatient;
    /** External ids of the tags attached to the account */
    tagExternalIds: string[];
    /** Opaque per-plugin key/value map; see account payment method link */
    meta: Record<string, unknown>;
    /** `account_extension` namespace */
    extension: AccountExtension;
}

export interface HostChargeItem {
    externalId: string;
    title: string;
    quantity: string;
    definition: HostChargeItemDefinition | null;
    unitPriceComponents: MonetaryComponent[];
    totalPriceComponents: MonetaryComponent[];
    /** User who requested the billed service, when it can be resolved */
    requesterExternalId: string | null;
}

export interface HostEncounterContext {
    doctorName: string | null;
    admissionDate: Date | null;
    dischargeDate: Date | null;
    room: string | null;
}

export interface HostInvoice {
    externalId: string;
    number: string | null;
    status: InvoiceStatus;
    createdDate: Date;
    facility: HostFacility;
    patient: HostPatient;
    account: HostAccount | null;
    createdByExternalId: string | null;
    chargeItems: HostChargeItem[];
    encounter: HostEncounterContext | null;
}

export interface HostPaymentReconciliation {
    externalId: string;
    status: PaymentStatus;
    method: string;
    amount: string;
    paymentDatetime: Date;
    referenceNumber: string | null;
    isCreditNote: boolean;
    issuerType: string | null;
    account: HostAccount;
    targetInvoiceExternalId: string | null;
    location: HostLocation;
    createdByExternalId: string;
    extension: PaymentExtension;
}

// ============================================
// SUPPLY
// ============================================

export interface HostSupplyDelivery {
    externalId: string;
    status: string;
    suppliedItem: HostProduct | null;
    suppliedItemQuantity: string | null;
    extension: SupplyDeliveryExtension;
}

export interface HostDeliveryOrder {
    externalId: string;
    status: DeliveryOrderStatus;
    createdDate: Date;
    originExternalId: string | null;
    supplier: HostOrganization | null;
    deliveries: HostSupplyDelivery[];
    extension: DeliveryOrderExtension;
}
