/**
 * ERP request schemas
 *
 * Wire shapes sent to the ERP's custom JSON API. Every payload carries the
 * host external id as `x_care_id`; the ERP upserts by that key.
 * Cross-field business rules live here so a malformed payload is rejected
 * before any network call.
 */

import { z } from 'zod';

// ============================================
// CATALOG
// ============================================

export const CategoryDataSchema = z.object({
    category_name: z.string().min(1),
    parent_x_care_id: z.string().default(''),
    x_care_id: z.string(),
});

export const TaxDataSchema = z.object({
    tax_name: z.string(),
    tax_percentage: z.number().finite(),
});

export const ProductStatusSchema = z.enum(['active', 'retired', 'draft']);

export const ProductDataSchema = z.object({
    product_name: z.string().min(1),
    x_care_id: z.string().min(1),
    cost: z.number().finite(),
    mrp: z.number().finite(),
    category: CategoryDataSchema,
    taxes: z.array(TaxDataSchema).default([]),
    hsn: z.string().default(''),
    status: ProductStatusSchema,
});

// ============================================
// PARTNERS & USERS
// ============================================

export const PartnerTypeSchema = z.enum(['person', 'company']);
export const PartnerStatusSchema = z.enum(['active', 'retired', 'draft']);

export const PartnerDataSchema = z.object({
    name: z.string().min(1),
    x_care_id: z.string().min(1),
    email: z.string(),
    phone: z.string(),
    state: z.string(),
    partner_type: PartnerTypeSchema,
    agent: z.boolean(),
    pan: z.string().optional(),
    status: PartnerStatusSchema.optional(),
    gender: z.string().optional(),
    birthdate: z.string().optional(),
    street: z.string().optional(),
});

export const UserTypeSchema = z.enum(['portal', 'internal']);

export const UserDataSchema = z.object({
    x_care_id: z.string().min(1),
    name: z.string().min(1),
    login: z.string().min(1),
    email: z.string(),
    user_type: UserTypeSchema,
    phone: z.string(),
    state: z.string(),
    partner_data: PartnerDataSchema,
});

// ============================================
// INVOICES & VENDOR BILLS
// ============================================

export const DiscountGroupSchema = z.object({
    x_care_id: z.string(),
    name: z.string(),
});

export const DiscountTypeSchema = z.enum(['amount', 'factor']);

export const InvoiceDiscountSchema = z.object({
    name: z.string(),
    discount_group: DiscountGroupSchema,
    discount_type: DiscountTypeSchema,
    rate: z.number().finite().default(0),
    disc_amt: z.number().finite().default(0),
});

export const InvoiceItemSchema = z.object({
    product_data: ProductDataSchema,
    quantity: z.string().default('1.0'),
    sale_price: z.string().default('0.0'),
    free_qty: z.string().default('0.0'),
    x_care_id: z.string().min(1),
    agent_id: z.string().optional(),
    discounts: z
        .array(InvoiceDiscountSchema)
        .max(1, 'More than 1 discount per item is not allowed')
        .nullable()
        .default(null),
});

export const BillTypeSchema = z.enum(['vendor', 'customer']);

export const AccountMoveRequestSchema = z.object({
    x_care_id: z.string().min(1),
    bill_type: BillTypeSchema,
    /** DD-MM-YYYY */
    invoice_date: z.string().regex(/^\d{2}-\d{2}-\d{4}$/),
    /** DD-MM-YYYY */
    due_date: z.string().regex(/^\d{2}-\d{2}-\d{4}$/),
    partner_data: PartnerDataSchema,
    invoice_items: z.array(InvoiceItemSchema),
    reason: z.string(),
    insurance_tag: z.array(z.string()).optional(),
    payment_method_id: z.number().int().optional(),
    x_identifier: z.string().optional(),
    x_created_by: z.string().optional(),
    payment_reference: z.string().optional(),
    insurance_company_id: z.number().int().optional(),
    doctor_name: z.string().optional(),
    admission_date: z.string().optional(),
    discharge_date: z.string().optional(),
    room_number: z.string().optional(),
});

export const AccountMoveReturnRequestSchema = z.object({
    x_care_id: z.string().min(1),
    reason: z.string(),
});

// ============================================
// PAYMENTS
// ============================================

export const JournalTypeSchema = z.enum(['cash', 'bank', 'card', 'credit']);
export const PaymentModeSchema = z.enum(['send', 'receive']);
export const CustomerTypeSchema = z.enum(['customer', 'vendor']);

/** Decimal amount kept as a string end to end */
export const DecimalStringSchema = z.string().regex(/^-?\d+(\.\d+)?$/, 'Amount must be a decimal number');

export const BillCounterDataSchema = z.object({
    x_care_id: z.string(),
    cashier_id: z.string(),
    counter_name: z.string(),
});

export const PaymentRequestSchema = z
    .object({
        x_care_id: z.string().min(1),
        journal_x_care_id: z.string().default(''),
        amount: DecimalStringSchema.default('0.0'),
        journal_input: JournalTypeSchema,
        /** YYYY-MM-DD */
        payment_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
        payment_mode: PaymentModeSchema,
        partner_data: PartnerDataSchema,
        customer_type: CustomerTypeSchema,
        counter_data: BillCounterDataSchema,
        bank_reference: z.string().nullable().default(null),
        /** Which charity/fund pays a credit payment */
        payment_method_line_id: z.number().int().positive().nullable().default(null),
    })
    .superRefine((data, ctx) => {
        if (data.journal_input === 'credit' && !data.payment_method_line_id) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['payment_method_line_id'],
                message:
                    'payment_method_line_id is required for credit (Care of Account) payments. ' +
                    'Use GET /api/payment-method-line to fetch available payment methods.',
            });
        }
    });

export const PaymentCancelRequestSchema = z.object({
    x_care_id: z.string().min(1),
    reason: z.string().nullable().default(null),
});

// ============================================
// TYPES
// ============================================

export type CategoryData = z.infer<typeof CategoryDataSchema>;
export type TaxData = z.infer<typeof TaxDataSchema>;
export type ProductStatus = z.infer<typeof ProductStatusSchema>;
export type ProductData = z.infer<typeof ProductDataSchema>;
export type PartnerType = z.infer<typeof PartnerTypeSchema>;
export type PartnerStatus = z.infer<typeof PartnerStatusSchema>;
export type PartnerData = z.infer<typeof PartnerDataSchema>;
export type UserType = z.infer<typeof UserTypeSchema>;
export type UserData = z.infer<typeof UserDataSchema>;
export type DiscountGroup = z.infer<typeof DiscountGroupSchema>;
export type DiscountType = z.infer<typeof DiscountTypeSchema>;
export type InvoiceDiscount = z.infer<typeof InvoiceDiscountSchema>;
export type InvoiceItemInput = z.input<typeof InvoiceItemSchema>;
export type InvoiceItem = z.infer<typeof InvoiceItemSchema>;
export type BillType = z.infer<typeof BillTypeSchema>;
export type AccountMoveRequestInput = z.input<typeof AccountMoveRequestSchema>;
export type AccountMoveRequest = z.infer<typeof AccountMoveRequestSchema>;
export type AccountMoveReturnRequest = z.infer<typeof AccountMoveReturnRequestSchema>;
export type JournalType = z.infer<typeof JournalTypeSchema>;
export type PaymentMode = z.infer<typeof PaymentModeSchema>;
export type CustomerType = z.infer<typeof CustomerTypeSchema>;
export type BillCounterData = z.infer<typeof BillCounterDataSchema>;
export type PaymentRequestInput = z.input<typeof PaymentRequestSchema>;
export type PaymentRequest = z.infer<typeof PaymentRequestSchema>;
export type PaymentCancelRequest = z.infer<typeof PaymentCancelRequestSchema>;
