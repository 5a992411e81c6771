/**
 * Unit tests for payment mapping and the credit payment rules
 */

import { buildPaymentRequest, resolveJournal } from '../payments.js';
import { PaymentRequestSchema } from '../../schemas/erpRequests.js';
import { parseRequest } from '../../validators/index.js';
import { ValidationError } from '../../errors/index.js';
import { makePayment } from '../../testing/fixtures.js';

describe('resolveJournal', () => {
    it('maps host payment methods onto ERP journals', () => {
        expect(resolveJournal(makePayment({ method: 'cash' }))).toBe('cash');
        expect(resolveJournal(makePayment({ method: 'ccca' }))).toBe('card');
        expect(resolveJournal(makePayment({ method: 'debc' }))).toBe('bank');
        expect(resolveJournal(makePayment({ method: 'chck' }))).toBe('bank');
    });

    it('posts unknown methods to bank', () => {
        expect(resolveJournal(makePayment({ method: 'upi' }))).toBe('bank');
        expect(resolveJournal(makePayment({ method: 'toString' }))).toBe('bank');
    });

    it('uses the credit journal for credit payments', () => {
        expect(resolveJournal(makePayment({ method: 'cash', extension: { is_credit_payment: true } }))).toBe('credit');
    });
});

describe('buildPaymentRequest', () => {
    it('builds a received payment against the target invoice', () => {
        const request = buildPaymentRequest(makePayment(), 'kerala');

        expect(request).toMatchObject({
            x_care_id: 'pay-1',
            journal_x_care_id: 'inv-1',
            amount: '1250.50',
            journal_input: 'cash',
            payment_date: '2024-03-05',
            payment_mode: 'receive',
            customer_type: 'customer',
            counter_data: { x_care_id: 'loc-counter-1', cashier_id: 'user-cashier', counter_name: 'Front Desk' },
            bank_reference: null,
            payment_method_line_id: null,
        });
        expect(request.partner_data.state).toBe('kerala');
    });

    it('sends money back for a credit note', () => {
        expect(buildPaymentRequest(makePayment({ isCreditNote: true }), 'kerala').payment_mode).toBe('send');
    });

    it('leaves the journal reference empty without a target invoice', () => {
        expect(buildPaymentRequest(makePayment({ targetInvoiceExternalId: null }), 'kerala').journal_x_care_id).toBe('');
    });

    it('rejects a credit payment used for a refund', () => {
        const payment = makePayment({
            isCreditNote: true,
            extension: { is_credit_payment: true, payment_method_line_id: 7 },
        });
        expect(() => buildPaymentRequest(payment, 'kerala')).toThrow(ValidationError);
        expect(() => buildPaymentRequest(payment, 'kerala')).toThrow(
            'Credit (Care of Account) payments cannot be used for refunds'
        );
    });
});

describe('PaymentRequestSchema', () => {
    it('rejects a credit payment without a payment method line', () => {
        const draft = buildPaymentRequest(makePayment({ extension: { is_credit_payment: true } }), 'kerala');
        expect(() => parseRequest(PaymentRequestSchema, draft)).toThrow(ValidationError);
        expect(() => parseRequest(PaymentRequestSchema, draft)).toThrow(
            /^payment_method_line_id: payment_method_line_id is required for credit \(Care of Account\) payments/
        );
    });

    it('accepts a credit payment with a payment method line', () => {
        const draft = buildPaymentRequest(
            makePayment({ extension: { is_credit_payment: true, payment_method_line_id: 7 } }),
            'kerala'
        );
        const parsed = parseRequest(PaymentRequestSchema, draft);
        expect(parsed.journal_input).toBe('credit');
        expect(parsed.payment_method_line_id).toBe(7);
    });

    it('does not require a payment method line for other journals', () => {
        const parsed = parseRequest(PaymentRequestSchema, buildPaymentRequest(makePayment({ method: 'ccca' }), 'kerala'));
        expect(parsed.payment_method_line_id).toBeNull();
    });

    it('rejects a non-decimal amount', () => {
        const draft = buildPaymentRequest(makePayment({ amount: '12,50' }), 'kerala');
        expect(() => parseRequest(PaymentRequestSchema, draft)).toThrow('amount: Amount must be a decimal number');
    });
});
