/**
 * ERP Date Formatting
 *
 * The ERP takes invoice dates as DD-MM-YYYY and payment dates as
 * YYYY-MM-DD. Both are formatted in the server's local time zone, the
 * same calendar day the host shows its users.
 */

import { format, isValid, parse } from 'date-fns';

export const ERP_INVOICE_DATE_FORMAT = 'dd-MM-yyyy';
export const ERP_PAYMENT_DATE_FORMAT = 'yyyy-MM-dd';

/** Invoice, due and admission dates: DD-MM-YYYY */
export function formatInvoiceDate(date: Date): string {
    return format(date, ERP_INVOICE_DATE_FORMAT);
}

/** Payment and birth dates: YYYY-MM-DD */
export function formatPaymentDate(date: Date): string {
    return format(date, ERP_PAYMENT_DATE_FORMAT);
}

/**
 * Re-format an ISO calendar date (YYYY-MM-DD) entered in a host extension
 * form as an invoice date.
 * @returns null when the input is not a valid calendar date
 */
export function isoDateToInvoiceDate(isoDate: string): string | null {
    const parsed = parse(isoDate, ERP_PAYMENT_DATE_FORMAT, new Date());
    return isValid(parsed) ? formatInvoiceDate(parsed) : null;
}
