/**
 * Host record builders for tests
 *
 * Every builder returns a complete, valid record; pass overrides for the
 * fields a test cares about.
 */

import type { MonetaryComponent, MonetaryComponentType } from '../schemas/extensions.js';
import type {
    HostAccount,
    HostCategory,
    HostChargeItem,
    HostChargeItemDefinition,
    HostDeliveryOrder,
    HostFacility,
    HostInvoice,
    HostLocation,
    HostOrganization,
    HostPatient,
    HostPaymentReconciliation,
    HostProduct,
    HostSupplyDelivery,
    HostUser,
} from '../types/index.js';

export function component(
    type: MonetaryComponentType,
    options: { code?: string; display?: string; amount?: string; factor?: string } = {}
): MonetaryComponent {
    return {
        monetaryComponentType: type,
        code: options.code ? { code: options.code, display: options.display ?? options.code } : null,
        factor: options.factor ?? null,
        amount: options.amount ?? null,
    };
}

export function makeCategory(overrides: Partial<HostCategory> = {}): HostCategory {
    return {
        externalId: 'cat-lab',
        title: 'Laboratory',
        resourceType: 'charge_item_definition',
        parentExternalId: 'cat-root',
        ...overrides,
    };
}

export function makeDefinition(overrides: Partial<HostChargeItemDefinition> = {}): HostChargeItemDefinition {
    return {
        externalId: 'cid-cbc',
        title: 'Complete Blood Count',
        status: 'active',
        priceComponents: [
            component('base', { amount: '250.00' }),
            component('informational', { code: 'purchase_price', amount: '120.00' }),
            component('tax', { code: 'gst_5', display: 'GST 5%', factor: '5' }),
        ],
        category: makeCategory(),
        ...overrides,
    };
}

export function makeFacility(overrides: Partial<HostFacility> = {}): HostFacility {
    return { externalId: 'fac-1', name: 'General Hospital', state: 'Tamil Nadu', ...overrides };
}

export function makeLocation(overrides: Partial<HostLocation> = {}): HostLocation {
    return { externalId: 'loc-counter-1', name: 'Front Desk', facilityExternalId: 'fac-1', ...overrides };
}

export function makePatient(overrides: Partial<HostPatient> = {}): HostPatient {
    return {
        externalId: 'pat-1',
        name: 'Asha Menon',
        phoneNumber: '+919800000001',
        gender: null,
        dateOfBirth: null,
        address: null,
        identifiers: [],
        ...overrides,
    };
}

export function makeAccount(overrides: Partial<HostAccount> = {}): HostAccount {
    return {
        externalId: 'acc-1',
        name: 'Asha Menon - OP',
        patient: makePatient(),
        tagExternalIds: [],
        meta: {},
        extension: {},
        ...overrides,
    };
}

export function makeChargeItem(overrides: Partial<HostChargeItem> = {}): HostChargeItem {
    return {
        externalId: 'ci-1',
        title: 'Complete Blood Count',
        quantity: '1.00',
        definition: makeDefinition(),
        unitPriceComponents: [
            component('base', { amount: '250.00' }),
            component('informational', { code: 'purchase_price', amount: '120.00' }),
        ],
        totalPriceComponents: [component('base', { amount: '250.00' })],
        requesterExternalId: null,
        ...overrides,
    };
}

export function makeInvoice(overrides: Partial<HostInvoice> = {}): HostInvoice {
    return {
        externalId: 'inv-1',
        number: null,
        status: 'issued',
        createdDate: new Date(2024, 2, 5, 10, 30),
        facility: makeFacility(),
        patient: makePatient(),
        account: makeAccount(),
        createdByExternalId: 'user-billing',
        chargeItems: [makeChargeItem()],
        encounter: null,
        ...overrides,
    };
}

export function makePayment(overrides: Partial<HostPaymentReconciliation> = {}): HostPaymentReconciliation {
    return {
        externalId: 'pay-1',
        status: 'active',
        method: 'cash',
        amount: '1250.50',
        paymentDatetime: new Date(2024, 2, 5, 11, 0),
        referenceNumber: null,
        isCreditNote: false,
        issuerType: 'patient',
        account: makeAccount(),
        targetInvoiceExternalId: 'inv-1',
        location: makeLocation(),
        createdByExternalId: 'user-cashier',
        extension: { is_credit_payment: false },
        ...overrides,
    };
}

export function makeUser(overrides: Partial<HostUser> = {}): HostUser {
    return {
        externalId: 'user-1',
        username: 'dr.rao',
        prefix: 'Dr.',
        firstName: 'Kiran',
        lastName: 'Rao',
        suffix: null,
        email: 'kiran.rao@example.org',
        phoneNumber: '+919800000002',
        deleted: false,
        ...overrides,
    };
}

export function makeOrganization(overrides: Partial<HostOrganization> = {}): HostOrganization {
    return {
        externalId: 'org-supplier-1',
        name: 'MedSupply Traders',
        orgType: 'product_supplier',
        metadata: { email: 'orders@medsupply.example', phone: '+914400000000' },
        ...overrides,
    };
}

export function makeProduct(overrides: Partial<HostProduct> = {}): HostProduct {
    return {
        externalId: 'prod-1',
        status: 'active',
        chargeItemDefinition: makeDefinition({ externalId: 'cid-paracetamol', title: 'Paracetamol 500mg' }),
        productKnowledge: { externalId: 'pk-1', name: 'Paracetamol', alternateIdentifier: '30049099' },
        ...overrides,
    };
}

export function makeSupplyDelivery(overrides: Partial<HostSupplyDelivery> = {}): HostSupplyDelivery {
    return {
        externalId: 'sd-1',
        status: 'completed',
        suppliedItem: makeProduct(),
        suppliedItemQuantity: '100',
        extension: { free_quantity: 0, purchase_discount: 0 },
        ...overrides,
    };
}

export function makeDeliveryOrder(overrides: Partial<HostDeliveryOrder> = {}): HostDeliveryOrder {
    return {
        externalId: 'do-1',
        status: 'completed',
        createdDate: new Date(2024, 2, 6, 9, 0),
        originExternalId: null,
        supplier: makeOrganization(),
        deliveries: [makeSupplyDelivery()],
        extension: { total_discount: 0 },
        ...overrides,
    };
}
