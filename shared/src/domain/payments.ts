/**
 * Payment Mapping - Pure Functions
 *
 * Builds the ERP payment for a host payment reconciliation. The amount is
 * forwarded as the host's decimal string, never through a float.
 */

import { ValidationError } from '../errors/sync.js';
import type { HostPaymentReconciliation, PaymentMethodCode } from '../types/index.js';
import type { JournalType, PaymentRequestInput } from '../schemas/erpRequests.js';
import { formatPaymentDate } from '../utils/dateHelpers.js';
import { DEFAULT_JOURNAL, PAYMENT_METHOD_JOURNALS } from './constants.js';
import { buildPatientPartner } from './partners.js';

function isPaymentMethodCode(method: string): method is PaymentMethodCode {
  return Object.hasOwn(PAYMENT_METHOD_JOURNALS, method);
}

/** A credit payment always posts to the credit journal */
export function resolveJournal(payment: Pick<HostPaymentReconciliation, 'method' | 'extension'>): JournalType {
  if (payment.extension.is_credit_payment) return 'credit';
  return isPaymentMethodCode(payment.method) ? PAYMENT_METHOD_JOURNALS[payment.method] : DEFAULT_JOURNAL;
}

/**
 * Refunds (credit notes) are sent, everything else received.
 *
 * @throws ValidationError for a credit payment on a credit note
 */
export function buildPaymentRequest(payment: HostPaymentReconciliation, defaultState: string): PaymentRequestInput {
  if (payment.extension.is_credit_payment && payment.isCreditNote) {
    throw new ValidationError('Credit (Care of Account) payments cannot be used for refunds');
  }

  const journal = resolveJournal(payment);
  return {
    x_care_id: payment.externalId,
    journal_x_care_id: payment.targetInvoiceExternalId ?? '',
    amount: payment.amount,
    journal_input: journal,
    payment_date: formatPaymentDate(payment.paymentDatetime),
    payment_mode: payment.isCreditNote ? 'send' : 'receive',
    partner_data: buildPatientPartner(payment.account.patient, defaultState),
    customer_type: 'customer',
    counter_data: {
      x_care_id: payment.location.externalId,
      cashier_id: payment.createdByExternalId,
      counter_name: payment.location.name,
    },
    bank_reference: payment.referenceNumber,
    payment_method_line_id: journal === 'credit' ? (payment.extension.payment_method_line_id ?? null) : null,
  };
}
