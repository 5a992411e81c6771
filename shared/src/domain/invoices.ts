/**
 * Account Move Mapping - Pure Functions
 *
 * Builds ERP account moves: customer invoices from host invoices and
 * vendor bills from completed delivery orders.
 *
 * Pricing policy differs between the two:
 * - customer invoice lines need a base price (strict lookup)
 * - vendor bill lines fall back to "0" (lenient lookup)
 */

import type {
  HostChargeItem,
  HostChargeItemDefinition,
  HostDeliveryOrder,
  HostEncounterContext,
  HostInvoice,
  HostOrganization,
  HostProduct,
  HostSupplyDelivery,
} from '../types/index.js';
import type { AccountMoveRequestInput, InvoiceItemInput, ProductData, ProductStatus } from '../schemas/erpRequests.js';
import { formatInvoiceDate, isoDateToInvoiceDate } from '../utils/dateHelpers.js';
import { PRODUCT_NAME_PREFIX } from './constants.js';
import { buildPatientPartner, buildSupplierPartner } from './partners.js';
import { buildCategoryData, buildProductData } from './products.js';
import { getAllDiscounts, getBasePrice, getPurchasePrice, toAmount } from './pricing.js';

// ============================================
// CUSTOMER INVOICE
// ============================================

export interface InvoiceInsurance {
  tagExternalId: string;
  companyId: number;
}

export interface InvoiceBuildContext {
  defaultState: string;
  /** Identifier config whose value is sent as x_identifier */
  patientIdentifierConfigId: string | null;
  /** ERP payment method linked to the account */
  paymentMethodId: number | null;
  insurance: InvoiceInsurance | null;
}

export function buildInvoiceItem(chargeItem: HostChargeItem, definition: HostChargeItemDefinition): InvoiceItemInput {
  const basePrice = getBasePrice(chargeItem.unitPriceComponents, { strict: true });
  const product = buildProductData(definition, { basePrice });

  return {
    product_data: { ...product, cost: toAmount(getPurchasePrice(chargeItem.unitPriceComponents)) },
    quantity: chargeItem.quantity,
    sale_price: basePrice,
    x_care_id: chargeItem.externalId,
    discounts: getAllDiscounts(chargeItem.unitPriceComponents, chargeItem.totalPriceComponents),
    ...(chargeItem.requesterExternalId ? { agent_id: chargeItem.requesterExternalId } : {}),
  };
}

function encounterFields(encounter: HostEncounterContext | null): Partial<AccountMoveRequestInput> {
  if (!encounter) return {};
  return {
    ...(encounter.doctorName ? { doctor_name: encounter.doctorName } : {}),
    ...(encounter.admissionDate ? { admission_date: formatInvoiceDate(encounter.admissionDate) } : {}),
    ...(encounter.dischargeDate ? { discharge_date: formatInvoiceDate(encounter.dischargeDate) } : {}),
    ...(encounter.room ? { room_number: encounter.room } : {}),
  };
}

/**
 * Charge items without a charge item definition are not billable in the
 * ERP and are left out.
 */
export function buildInvoiceRequest(invoice: HostInvoice, ctx: InvoiceBuildContext): AccountMoveRequestInput {
  const items = invoice.chargeItems.flatMap((chargeItem) =>
    chargeItem.definition ? [buildInvoiceItem(chargeItem, chargeItem.definition)] : []
  );
  const date = formatInvoiceDate(invoice.createdDate);
  const identifier = ctx.patientIdentifierConfigId
    ? invoice.patient.identifiers.find((i) => i.configId === ctx.patientIdentifierConfigId)?.value
    : undefined;

  return {
    x_care_id: invoice.externalId,
    bill_type: 'customer',
    invoice_date: date,
    due_date: date,
    partner_data: buildPatientPartner(invoice.patient, invoice.facility.state || ctx.defaultState),
    invoice_items: items,
    reason: '',
    ...(identifier ? { x_identifier: identifier } : {}),
    ...(invoice.createdByExternalId ? { x_created_by: invoice.createdByExternalId } : {}),
    ...(ctx.paymentMethodId !== null ? { payment_method_id: ctx.paymentMethodId } : {}),
    ...(ctx.insurance
      ? { insurance_tag: [ctx.insurance.tagExternalId], insurance_company_id: ctx.insurance.companyId }
      : {}),
    ...encounterFields(invoice.encounter),
  };
}

// ============================================
// VENDOR BILL
// ============================================

const PRODUCT_STATUSES: readonly ProductStatus[] = ['active', 'retired', 'draft'];

function toProductStatus(status: string): ProductStatus {
  return PRODUCT_STATUSES.find((s) => s === status) ?? 'active';
}

function buildSuppliedProduct(product: HostProduct): ProductData {
  const hsn = product.productKnowledge?.alternateIdentifier ?? '';
  if (product.chargeItemDefinition) {
    return buildProductData(product.chargeItemDefinition, { hsn });
  }
  return {
    product_name: `${PRODUCT_NAME_PREFIX}${product.productKnowledge?.name ?? product.externalId}`,
    x_care_id: product.externalId,
    mrp: 0,
    cost: 0,
    category: buildCategoryData(null),
    taxes: [],
    hsn,
    status: toProductStatus(product.status),
  };
}

export function buildVendorBillItem(delivery: HostSupplyDelivery, product: HostProduct): InvoiceItemInput {
  const components = product.chargeItemDefinition?.priceComponents;
  const purchasePrice = getPurchasePrice(components);
  const salePrice = purchasePrice !== '0' ? purchasePrice : getBasePrice(components);
  const freeQuantity = delivery.extension.free_quantity;

  return {
    product_data: buildSuppliedProduct(product),
    quantity: delivery.suppliedItemQuantity ?? '0',
    sale_price: salePrice,
    x_care_id: delivery.externalId,
    ...(freeQuantity > 0 ? { free_qty: String(freeQuantity) } : {}),
  };
}

/**
 * Only completed deliveries with a supplied item become bill lines.
 * The vendor's own bill number and date, when entered, replace the
 * host's reference and creation date.
 */
export function buildVendorBillRequest(
  order: HostDeliveryOrder,
  supplier: HostOrganization,
  defaultState: string
): AccountMoveRequestInput {
  const items = order.deliveries.flatMap((delivery) =>
    delivery.status === 'completed' && delivery.suppliedItem
      ? [buildVendorBillItem(delivery, delivery.suppliedItem)]
      : []
  );
  const createdDate = formatInvoiceDate(order.createdDate);
  const { vendor_bill_number: billNumber, vendor_bill_date: billDate } = order.extension;

  return {
    x_care_id: order.externalId,
    bill_type: 'vendor',
    invoice_date: (billDate && isoDateToInvoiceDate(billDate)) || createdDate,
    due_date: createdDate,
    partner_data: buildSupplierPartner(supplier, defaultState),
    invoice_items: items,
    reason: '',
    ...(billNumber ? { payment_reference: billNumber } : {}),
  };
}
