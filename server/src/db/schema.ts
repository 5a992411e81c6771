/**
 * Database table shapes
 *
 * `emr_*` tables belong to the clinical host and are only read (plus the
 * scoped invoice-number and account-meta writes). `erp_reconciliation_job`
 * is owned by this plugin; its DDL lives in server/sql/.
 *
 * JSONB columns are typed `unknown` and validated with zod where loaded.
 */

import type { ColumnType, Generated } from 'kysely';

/** pg returns NUMERIC as string */
type Numeric = ColumnType<string, string | number, string | number>;

type Timestamp = ColumnType<Date, Date | string, Date | string>;

type Json = ColumnType<unknown, string, string>;

export interface EmrUser {
    external_id: string;
    username: string;
    prefix: string | null;
    first_name: string | null;
    last_name: string | null;
    suffix: string | null;
    email: string;
    phone_number: string;
    deleted: boolean;
}

export interface EmrResourceCategory {
    external_id: string;
    title: string;
    resource_type: string;
    parent_external_id: string | null;
    deleted: boolean;
}

export interface EmrChargeItemDefinition {
    external_id: string;
    title: string;
    status: string;
    price_components: Json;
    category_external_id: string | null;
    deleted: boolean;
}

export interface EmrProductKnowledge {
    external_id: string;
    name: string;
    alternate_identifier: string | null;
}

export interface EmrProduct {
    external_id: string;
    status: string;
    charge_item_definition_external_id: string | null;
    product_knowledge_external_id: string | null;
}

export interface EmrOrganization {
    external_id: string;
    name: string;
    org_type: string;
    metadata: Json;
    deleted: boolean;
}

export interface EmrFacility {
    external_id: string;
    name: string;
    state: string | null;
}

export interface EmrFacilityLocation {
    external_id: string;
    name: string;
    facility_external_id: string;
}

/** Locations a user may operate, resolved by the host from organization membership */
export interface EmrLocationAccess {
    user_external_id: string;
    location_external_id: string;
}

export interface EmrPatient {
    external_id: string;
    name: string;
    phone_number: string;
    gender: string | null;
    date_of_birth: Timestamp | null;
    address: string | null;
    /** `[{ config_external_id, value }]` */
    identifiers: Json;
}

export interface EmrAccount {
    external_id: string;
    name: string;
    patient_external_id: string;
    /** external ids of attached tags */
    tags: Json;
    meta: Json;
    extensions: Json;
}

export interface EmrInvoice {
    external_id: string;
    number: string | null;
    status: string;
    created_date: Timestamp;
    facility_external_id: string;
    patient_external_id: string;
    account_external_id: string | null;
    created_by_external_id: string | null;
    /** `{ doctor_name, admission_date, discharge_date, room }` of the billed encounter */
    encounter_context: Json | null;
}

export interface EmrChargeItem {
    external_id: string;
    invoice_external_id: string;
    title: string;
    quantity: Numeric;
    charge_item_definition_external_id: string | null;
    unit_price_components: Json;
    total_price_components: Json;
    requester_external_id: string | null;
}

export interface EmrPaymentReconciliation {
    external_id: string;
    status: string;
    method: string;
    amount: Numeric;
    payment_datetime: Timestamp;
    reference_number: string | null;
    is_credit_note: boolean;
    issuer_type: string | null;
    account_external_id: string;
    target_invoice_external_id: string | null;
    location_external_id: string;
    created_by_external_id: string;
    extensions: Json;
}

export interface EmrDeliveryOrder {
    external_id: string;
    status: string;
    created_date: Timestamp;
    origin_external_id: string | null;
    supplier_external_id: string | null;
    extensions: Json;
}

export interface EmrSupplyDelivery {
    external_id: string;
    order_external_id: string;
    status: string;
    supplied_item_external_id: string | null;
    supplied_item_quantity: Numeric | null;
    extensions: Json;
}

export interface ErpReconciliationJob {
    id: Generated<string>;
    kind: string;
    target_external_id: string;
    state: string;
    scheduled_at: Timestamp;
    run_at: Timestamp;
    attempts: Generated<number>;
    last_error: string | null;
    updated_at: Timestamp;
}

export interface DB {
    emr_user: EmrUser;
    emr_resource_category: EmrResourceCategory;
    emr_charge_item_definition: EmrChargeItemDefinition;
    emr_product_knowledge: EmrProductKnowledge;
    emr_product: EmrProduct;
    emr_organization: EmrOrganization;
    emr_facility: EmrFacility;
    emr_facility_location: EmrFacilityLocation;
    emr_location_access: EmrLocationAccess;
    emr_patient: EmrPatient;
    emr_account: EmrAccount;
    emr_invoice: EmrInvoice;
    emr_charge_item: EmrChargeItem;
    emr_payment_reconciliation: EmrPaymentReconciliation;
    emr_delivery_order: EmrDeliveryOrder;
    emr_supply_delivery: EmrSupplyDelivery;
    erp_reconciliation_job: ErpReconciliationJob;
}
