/**
 * Kysely Host Repository
 *
 * Reads host records from the `emr_*` tables and assembles the snapshots
 * the mappers consume. JSONB columns are validated here, at the boundary,
 * so downstream code only sees typed sub-records.
 */

import { z } from 'zod';
import type { Selectable } from 'kysely';
import {
    AccountExtensionSchema,
    CHARGE_ITEM_CATEGORY_RESOURCE_TYPE,
    ChargeItemDefinitionStatusSchema,
    DeliveryOrderExtensionSchema,
    DeliveryOrderStatusSchema,
    InvoiceStatusSchema,
    MonetaryComponentListSchema,
    PaymentExtensionSchema,
    PaymentStatusSchema,
    SUPPLIER_ORG_TYPE,
    SupplierMetadataSchema,
    SupplyDeliveryExtensionSchema,
    readExtension,
} from '@care-erp/shared';
import type {
    HostAccount,
    HostCategory,
    HostChargeItem,
    HostChargeItemDefinition,
    HostDeliveryOrder,
    HostEncounterContext,
    HostFacility,
    HostInvoice,
    HostLocation,
    HostOrganization,
    HostPatient,
    HostPaymentReconciliation,
    HostProduct,
    HostSupplyDelivery,
    HostUser,
    InvoiceStatus,
    PaymentStatus,
} from '@care-erp/shared';
import type { KyselyDB } from '../db/index.js';
import type { EmrChargeItemDefinition, EmrOrganization, EmrResourceCategory, EmrUser } from '../db/schema.js';
import type { BulkSyncKind, HostRepository, ListOptions, SyncTargetRef } from './hostRepository.js';
import { checkFilters } from './hostRepository.js';

// ============================================
// JSON COLUMN SCHEMAS
// ============================================

const JsonMapSchema = z.record(z.string(), z.unknown()).nullish().transform((value) => value ?? {});

const TagListSchema = z.array(z.string()).nullish().transform((value) => value ?? []);

const IdentifierListSchema = z
    .array(z.object({ config_external_id: z.string(), value: z.string() }))
    .nullish()
    .transform((list) => (list ?? []).map((item) => ({ configId: item.config_external_id, value: item.value })));

const EncounterContextSchema = z
    .object({
        doctor_name: z.string().nullish(),
        admission_date: z.coerce.date().nullish(),
        discharge_date: z.coerce.date().nullish(),
        room: z.string().nullish(),
    })
    .nullish()
    .transform((raw): HostEncounterContext | null =>
        raw
            ? {
                doctorName: raw.doctor_name ?? null,
                admissionDate: raw.admission_date ?? null,
                dischargeDate: raw.discharge_date ?? null,
                room: raw.room ?? null,
            }
            : null
    );

// ============================================
// ROW MAPPERS
// ============================================

function toUser(row: Selectable<EmrUser>): HostUser {
    return {
        externalId: row.external_id,
        username: row.username,
        prefix: row.prefix,
        firstName: row.first_name,
        lastName: row.last_name,
        suffix: row.suffix,
        email: row.email,
        phoneNumber: row.phone_number,
        deleted: row.deleted,
    };
}

function toCategory(row: Selectable<EmrResourceCategory>): HostCategory {
    return {
        externalId: row.external_id,
        title: row.title,
        resourceType: row.resource_type,
        parentExternalId: row.parent_external_id,
    };
}

function toOrganization(row: Selectable<EmrOrganization>): HostOrganization {
    return {
        externalId: row.external_id,
        name: row.name,
        orgType: row.org_type,
        metadata: SupplierMetadataSchema.parse(row.metadata ?? {}),
    };
}

// ============================================
// REPOSITORY
// ============================================

export class KyselyHostRepository implements HostRepository {
    constructor(private readonly db: KyselyDB) {}

    async findUser(externalId: string): Promise<HostUser | null> {
        const row = await this.db
            .selectFrom('emr_user')
            .selectAll()
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        return row ? toUser(row) : null;
    }

    async findCategory(externalId: string): Promise<HostCategory | null> {
        const row = await this.db
            .selectFrom('emr_resource_category')
            .selectAll()
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        return row ? toCategory(row) : null;
    }

    async findChargeItemDefinition(externalId: string): Promise<HostChargeItemDefinition | null> {
        const definitions = await this.loadDefinitions([externalId]);
        return definitions.get(externalId) ?? null;
    }

    async findProduct(externalId: string): Promise<HostProduct | null> {
        const products = await this.loadProducts([externalId]);
        return products.get(externalId) ?? null;
    }

    async findOrganization(externalId: string): Promise<HostOrganization | null> {
        const row = await this.db
            .selectFrom('emr_organization')
            .selectAll()
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        return row ? toOrganization(row) : null;
    }

    async findFacility(externalId: string): Promise<HostFacility | null> {
        const row = await this.db
            .selectFrom('emr_facility')
            .select(['external_id', 'name', 'state'])
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        return row ? { externalId: row.external_id, name: row.name, state: row.state } : null;
    }

    async findLocation(facilityExternalId: string, locationExternalId: string): Promise<HostLocation | null> {
        const row = await this.db
            .selectFrom('emr_facility_location')
            .select(['external_id', 'name', 'facility_external_id'])
            .where('external_id', '=', locationExternalId)
            .where('facility_external_id', '=', facilityExternalId)
            .executeTakeFirst();
        return row
            ? { externalId: row.external_id, name: row.name, facilityExternalId: row.facility_external_id }
            : null;
    }

    async findAccount(externalId: string): Promise<HostAccount | null> {
        const row = await this.db
            .selectFrom('emr_account')
            .selectAll()
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        if (!row) return null;

        const patient = await this.findPatient(row.patient_external_id);
        if (!patient) return null;

        const extensions = JsonMapSchema.parse(row.extensions);
        return {
            externalId: row.external_id,
            name: row.name,
            patient,
            tagExternalIds: TagListSchema.parse(row.tags),
            meta: JsonMapSchema.parse(row.meta),
            extension: readExtension(extensions, 'account_extension', AccountExtensionSchema),
        };
    }

    async findInvoice(externalId: string): Promise<HostInvoice | null> {
        const row = await this.db
            .selectFrom('emr_invoice')
            .selectAll()
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        if (!row) return null;

        const [facility, patient, account, chargeItems] = await Promise.all([
            this.findFacility(row.facility_external_id),
            this.findPatient(row.patient_external_id),
            row.account_external_id ? this.findAccount(row.account_external_id) : Promise.resolve(null),
            this.loadChargeItems(row.external_id),
        ]);
        if (!facility || !patient) return null;

        return {
            externalId: row.external_id,
            number: row.number,
            status: InvoiceStatusSchema.parse(row.status),
            createdDate: row.created_date,
            facility,
            patient,
            account,
            createdByExternalId: row.created_by_external_id,
            chargeItems,
            encounter: EncounterContextSchema.parse(row.encounter_context),
        };
    }

    async findPayment(externalId: string): Promise<HostPaymentReconciliation | null> {
        const row = await this.db
            .selectFrom('emr_payment_reconciliation as payment')
            .innerJoin('emr_facility_location as location', 'location.external_id', 'payment.location_external_id')
            .selectAll('payment')
            .select([
                'location.name as location_name',
                'location.facility_external_id as location_facility_external_id',
            ])
            .where('payment.external_id', '=', externalId)
            .executeTakeFirst();
        if (!row) return null;

        const account = await this.findAccount(row.account_external_id);
        if (!account) return null;

        const extensions = JsonMapSchema.parse(row.extensions);
        return {
            externalId: row.external_id,
            status: PaymentStatusSchema.parse(row.status),
            method: row.method,
            amount: row.amount,
            paymentDatetime: row.payment_datetime,
            referenceNumber: row.reference_number,
            isCreditNote: row.is_credit_note,
            issuerType: row.issuer_type,
            account,
            targetInvoiceExternalId: row.target_invoice_external_id,
            location: {
                externalId: row.location_external_id,
                name: row.location_name,
                facilityExternalId: row.location_facility_external_id,
            },
            createdByExternalId: row.created_by_external_id,
            extension: readExtension(extensions, 'payment_extension', PaymentExtensionSchema),
        };
    }

    async findDeliveryOrder(externalId: string): Promise<HostDeliveryOrder | null> {
        const row = await this.db
            .selectFrom('emr_delivery_order')
            .selectAll()
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        if (!row) return null;

        const supplier = row.supplier_external_id ? await this.findOrganization(row.supplier_external_id) : null;

        const deliveryRows = await this.db
            .selectFrom('emr_supply_delivery')
            .selectAll()
            .where('order_external_id', '=', row.external_id)
            .orderBy('external_id')
            .execute();

        const productIds = deliveryRows
            .map((delivery) => delivery.supplied_item_external_id)
            .filter((id): id is string => id !== null);
        const products = await this.loadProducts(productIds);

        const deliveries: HostSupplyDelivery[] = deliveryRows.map((delivery) => ({
            externalId: delivery.external_id,
            status: delivery.status,
            suppliedItem: delivery.supplied_item_external_id
                ? products.get(delivery.supplied_item_external_id) ?? null
                : null,
            suppliedItemQuantity: delivery.supplied_item_quantity,
            extension: readExtension(
                JsonMapSchema.parse(delivery.extensions),
                'supply_delivery_extension',
                SupplyDeliveryExtensionSchema
            ),
        }));

        return {
            externalId: row.external_id,
            status: DeliveryOrderStatusSchema.parse(row.status),
            createdDate: row.created_date,
            originExternalId: row.origin_external_id,
            supplier,
            deliveries,
            extension: readExtension(
                JsonMapSchema.parse(row.extensions),
                'supply_delivery_order_extension',
                DeliveryOrderExtensionSchema
            ),
        };
    }

    async findInvoiceStatus(externalId: string): Promise<InvoiceStatus | null> {
        const row = await this.db
            .selectFrom('emr_invoice')
            .select('status')
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        return row ? InvoiceStatusSchema.parse(row.status) : null;
    }

    async findPaymentStatus(externalId: string): Promise<PaymentStatus | null> {
        const row = await this.db
            .selectFrom('emr_payment_reconciliation')
            .select('status')
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        return row ? PaymentStatusSchema.parse(row.status) : null;
    }

    async invoiceExists(externalId: string): Promise<boolean> {
        const row = await this.db
            .selectFrom('emr_invoice')
            .select('external_id')
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        return row !== undefined;
    }

    async paymentExists(externalId: string): Promise<boolean> {
        const row = await this.db
            .selectFrom('emr_payment_reconciliation')
            .select('external_id')
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        return row !== undefined;
    }

    async listSyncTargets(kind: BulkSyncKind, options: ListOptions = {}): Promise<SyncTargetRef[]> {
        const limit = options.limit ?? 1000;
        const offset = options.offset ?? 0;

        switch (kind) {
            case 'users': {
                const rows = await this.usersQuery(options)
                    .select(['external_id', 'username as label'])
                    .orderBy('external_id')
                    .limit(limit)
                    .offset(offset)
                    .execute();
                return rows.map((row) => ({ externalId: row.external_id, label: row.label }));
            }
            case 'products': {
                const rows = await this.productsQuery(options)
                    .select(['external_id', 'title as label'])
                    .orderBy('external_id')
                    .limit(limit)
                    .offset(offset)
                    .execute();
                return rows.map((row) => ({ externalId: row.external_id, label: row.label }));
            }
            case 'categories': {
                const rows = await this.categoriesQuery(options)
                    .select(['external_id', 'title as label'])
                    .orderBy('external_id')
                    .limit(limit)
                    .offset(offset)
                    .execute();
                return rows.map((row) => ({ externalId: row.external_id, label: row.label }));
            }
            case 'suppliers': {
                const rows = await this.suppliersQuery(options)
                    .select(['external_id', 'name as label'])
                    .orderBy('external_id')
                    .limit(limit)
                    .offset(offset)
                    .execute();
                return rows.map((row) => ({ externalId: row.external_id, label: row.label }));
            }
        }
    }

    async countSyncTargets(kind: BulkSyncKind, options: ListOptions = {}): Promise<number> {
        let row: { count: string } | undefined;
        switch (kind) {
            case 'users':
                row = await this.usersQuery(options)
                    .select((eb) => eb.fn.countAll<string>().as('count'))
                    .executeTakeFirst();
                break;
            case 'products':
                row = await this.productsQuery(options)
                    .select((eb) => eb.fn.countAll<string>().as('count'))
                    .executeTakeFirst();
                break;
            case 'categories':
                row = await this.categoriesQuery(options)
                    .select((eb) => eb.fn.countAll<string>().as('count'))
                    .executeTakeFirst();
                break;
            case 'suppliers':
                row = await this.suppliersQuery(options)
                    .select((eb) => eb.fn.countAll<string>().as('count'))
                    .executeTakeFirst();
                break;
        }
        return Number(row?.count ?? 0);
    }

    async hasLocationAccess(userExternalId: string, locationExternalId: string): Promise<boolean> {
        const row = await this.db
            .selectFrom('emr_location_access')
            .select('location_external_id')
            .where('user_external_id', '=', userExternalId)
            .where('location_external_id', '=', locationExternalId)
            .executeTakeFirst();
        return row !== undefined;
    }

    async setInvoiceNumber(externalId: string, number: string): Promise<void> {
        await this.db
            .updateTable('emr_invoice')
            .set({ number })
            .where('external_id', '=', externalId)
            .execute();
    }

    async updateAccountMeta(externalId: string, meta: Record<string, unknown>): Promise<void> {
        await this.db
            .updateTable('emr_account')
            .set({ meta: JSON.stringify(meta) })
            .where('external_id', '=', externalId)
            .execute();
    }

    // ============================================
    // HELPERS
    // ============================================

    private usersQuery(options: ListOptions) {
        let query = this.db.selectFrom('emr_user');
        if (!options.includeDeleted) {
            query = query.where('deleted', '=', false);
        }
        for (const [key, value] of checkFilters('users', options.filters)) {
            query = query.where(key, '=', value);
        }
        return query;
    }

    private productsQuery(options: ListOptions) {
        let query = this.db.selectFrom('emr_charge_item_definition').where('deleted', '=', false);
        for (const [key, value] of checkFilters('products', options.filters)) {
            query = query.where(key, '=', value);
        }
        return query;
    }

    private categoriesQuery(options: ListOptions) {
        let query = this.db
            .selectFrom('emr_resource_category')
            .where('deleted', '=', false)
            .where('resource_type', '=', CHARGE_ITEM_CATEGORY_RESOURCE_TYPE);
        for (const [key, value] of checkFilters('categories', options.filters)) {
            query = query.where(key, '=', value);
        }
        return query;
    }

    private suppliersQuery(options: ListOptions) {
        let query = this.db
            .selectFrom('emr_organization')
            .where('deleted', '=', false)
            .where('org_type', '=', SUPPLIER_ORG_TYPE);
        for (const [key, value] of checkFilters('suppliers', options.filters)) {
            query = query.where(key, '=', value);
        }
        return query;
    }

    private async findPatient(externalId: string): Promise<HostPatient | null> {
        const row = await this.db
            .selectFrom('emr_patient')
            .selectAll()
            .where('external_id', '=', externalId)
            .executeTakeFirst();
        if (!row) return null;
        return {
            externalId: row.external_id,
            name: row.name,
            phoneNumber: row.phone_number,
            gender: row.gender,
            dateOfBirth: row.date_of_birth,
            address: row.address,
            identifiers: IdentifierListSchema.parse(row.identifiers),
        };
    }

    private async loadDefinitions(externalIds: string[]): Promise<Map<string, HostChargeItemDefinition>> {
        const definitions = new Map<string, HostChargeItemDefinition>();
        if (externalIds.length === 0) return definitions;

        const rows: Array<Selectable<EmrChargeItemDefinition>> = await this.db
            .selectFrom('emr_charge_item_definition')
            .selectAll()
            .where('external_id', 'in', externalIds)
            .execute();

        const categoryIds = [...new Set(
            rows.map((row) => row.category_external_id).filter((id): id is string => id !== null)
        )];
        const categories = new Map<string, HostCategory>();
        if (categoryIds.length > 0) {
            const categoryRows = await this.db
                .selectFrom('emr_resource_category')
                .selectAll()
                .where('external_id', 'in', categoryIds)
                .execute();
            for (const categoryRow of categoryRows) {
                categories.set(categoryRow.external_id, toCategory(categoryRow));
            }
        }

        for (const row of rows) {
            definitions.set(row.external_id, {
                externalId: row.external_id,
                title: row.title,
                status: ChargeItemDefinitionStatusSchema.parse(row.status),
                priceComponents: MonetaryComponentListSchema.parse(row.price_components),
                category: row.category_external_id ? categories.get(row.category_external_id) ?? null : null,
            });
        }
        return definitions;
    }

    private async loadProducts(externalIds: string[]): Promise<Map<string, HostProduct>> {
        const products = new Map<string, HostProduct>();
        if (externalIds.length === 0) return products;

        const rows = await this.db
            .selectFrom('emr_product as product')
            .leftJoin(
                'emr_product_knowledge as knowledge',
                'knowledge.external_id',
                'product.product_knowledge_external_id'
            )
            .select([
                'product.external_id',
                'product.status',
                'product.charge_item_definition_external_id',
                'knowledge.external_id as knowledge_external_id',
                'knowledge.name as knowledge_name',
                'knowledge.alternate_identifier as knowledge_alternate_identifier',
            ])
            .where('product.external_id', 'in', externalIds)
            .execute();

        const definitionIds = rows
            .map((row) => row.charge_item_definition_external_id)
            .filter((id): id is string => id !== null);
        const definitions = await this.loadDefinitions([...new Set(definitionIds)]);

        for (const row of rows) {
            products.set(row.external_id, {
                externalId: row.external_id,
                status: row.status,
                chargeItemDefinition: row.charge_item_definition_external_id
                    ? definitions.get(row.charge_item_definition_external_id) ?? null
                    : null,
                productKnowledge:
                    row.knowledge_external_id !== null && row.knowledge_name !== null
                        ? {
                            externalId: row.knowledge_external_id,
                            name: row.knowledge_name,
                            alternateIdentifier: row.knowledge_alternate_identifier,
                        }
                        : null,
            });
        }
        return products;
    }

    private async loadChargeItems(invoiceExternalId: string): Promise<HostChargeItem[]> {
        const rows = await this.db
            .selectFrom('emr_charge_item')
            .selectAll()
            .where('invoice_external_id', '=', invoiceExternalId)
            .orderBy('external_id')
            .execute();

        const definitionIds = rows
            .map((row) => row.charge_item_definition_external_id)
            .filter((id): id is string => id !== null);
        const definitions = await this.loadDefinitions([...new Set(definitionIds)]);

        return rows.map((row) => ({
            externalId: row.external_id,
            title: row.title,
            quantity: row.quantity,
            definition: row.charge_item_definition_external_id
                ? definitions.get(row.charge_item_definition_external_id) ?? null
                : null,
            unitPriceComponents: MonetaryComponentListSchema.parse(row.unit_price_components),
            totalPriceComponents: MonetaryComponentListSchema.parse(row.total_price_components),
            requesterExternalId: row.requester_external_id,
        }));
    }
}
