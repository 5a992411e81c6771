/**
 * ERP lookup schemas
 *
 * Search results for sponsors, insurance companies, payment methods and
 * payment method lines, reshaped before they are returned to the host UI.
 */

import { z } from 'zod';

export const SearchQuerySchema = z.object({
    search_key: z.string().default(''),
});

export const PaymentMethodLineQuerySchema = z.object({
    journal_type: z.string().default('credit'),
});

export const InsuranceCompanyDataSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    /** The ERP sends `false` for an empty code */
    code: z.union([z.string(), z.boolean()]),
    description: z.string().nullable().default(null),
    account_id: z.number().int().nullable().default(null),
    account_name: z.string().nullable().default(null),
    active: z.boolean(),
    claim_count: z.number().int().default(0),
});

export const SponsorDataSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    code: z.string().default(''),
    phone: z.string().default(''),
    email: z.string().default(''),
    city: z.string().default(''),
    account_id: z.number().int().nullable().default(null),
    account_name: z.string().default(''),
    active: z.boolean().default(true),
    invoice_count: z.number().int().default(0),
});

export const PaymentMethodLineDataSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    code: z.string().nullable().default(null),
    journal_id: z.number().int(),
    journal_name: z.string(),
});

/** Payment methods are forwarded as the ERP returns them */
export const PaymentMethodDataSchema = z
    .object({
        id: z.number().int(),
        name: z.string(),
    })
    .passthrough();

export const SetAccountPaymentMethodSchema = z.object({
    odoo_payment_method_id: z.number().int().positive().nullable(),
});

export type InsuranceCompanyData = z.infer<typeof InsuranceCompanyDataSchema>;
export type SponsorData = z.infer<typeof SponsorDataSchema>;
export type PaymentMethodLineData = z.infer<typeof PaymentMethodLineDataSchema>;
export type PaymentMethodData = z.infer<typeof PaymentMethodDataSchema>;
export type SetAccountPaymentMethodInput = z.infer<typeof SetAccountPaymentMethodSchema>;
