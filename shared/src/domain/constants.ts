/**
 * Domain Constants
 *
 * ERP endpoints, status classes and fixed payload values shared by the
 * sync resources, the reconciliation task and the CLI.
 */

import type { InvoiceStatus, PaymentStatus, PaymentMethodCode } from '../types/index.js';
import type { JournalType } from '../schemas/erpRequests.js';

/**
 * ERP endpoint paths, relative to the configured base URL
 */
export const ERP_ENDPOINTS = {
  addUser: 'api/add/user',
  addPartner: 'api/add/partner',
  addProduct: 'api/add/product',
  addCategory: 'api/add/category',
  accountMove: 'api/account/move',
  accountMoveReturn: 'api/account/move/return',
  payment: 'api/account/move/payment',
  paymentCancel: 'api/account/move/payment/cancel',
  cashSession: 'api/care/cash/session',
  cashSessionClose: 'api/care/cash/session/close',
  cashSessionCurrent: 'api/care/cash/session/current',
  cashSessionList: 'api/care/cash/session/list',
  cashCounters: 'api/care/cash/counters',
  cashTransfer: 'api/care/cash/transfer',
  cashTransferList: 'api/care/cash/transfer/list',
  cashTransferPending: 'api/care/cash/transfer/pending/',
  insuranceCompanySearch: 'api/insurance/companies/search',
  sponsorSearch: 'api/sponsors/search',
  paymentMethodSearch: 'api/payment/methods/search',
  paymentMethodLines: 'api/payment/method/lines',
  paymentMethodById: 'api/v1/payment/method',
  health: 'api/health',
} as const;

/** Reason sent with compensating calls issued by reconciliation */
export const ROLLBACK_CLEANUP_REASON = 'Care transaction rollback cleanup';

/** Prefix of every product name pushed to the ERP */
export const PRODUCT_NAME_PREFIX = 'CARE: ';

/** Category used for supplied items without a charge item definition */
export const UNCATEGORIZED_CATEGORY = {
  category_name: 'Uncategorized',
  parent_x_care_id: '',
  x_care_id: '',
} as const;

/** Informational price component codes */
export const PRICE_CODES = {
  purchasePrice: 'purchase_price',
} as const;

export const INVOICE_CANCELLED_STATUSES: readonly InvoiceStatus[] = ['cancelled', 'entered_in_error', 'voided'];

/** Only an invoice that reached the ERP can be returned */
export const INVOICE_RETURNABLE_STATUSES: readonly InvoiceStatus[] = ['issued', 'balanced'];

export const PAYMENT_CANCELLED_STATUSES: readonly PaymentStatus[] = ['cancelled', 'entered_in_error'];

/**
 * Host payment method → ERP journal. Anything unmapped posts to bank.
 */
export const PAYMENT_METHOD_JOURNALS: Record<PaymentMethodCode, JournalType> = {
  cash: 'cash',
  ccca: 'card', // credit card
  cchk: 'bank', // certified check
  cdac: 'bank', // checking/debit account
  chck: 'bank',
  ddpo: 'bank', // direct deposit
  debc: 'bank', // debit card
};

export const DEFAULT_JOURNAL: JournalType = 'bank';

/** Resource type of categories that group charge item definitions */
export const CHARGE_ITEM_CATEGORY_RESOURCE_TYPE = 'charge_item_definition';

export const SUPPLIER_ORG_TYPE = 'product_supplier';
