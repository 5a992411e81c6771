/**
 * ERP response schemas
 *
 * Only the identifiers this plugin reads back are modeled; the rest of a
 * reply is ignored.
 */

import { z } from 'zod';

const RecordRefSchema = z.object({ id: z.number().int() });

export const InvoiceReplySchema = z.object({
    invoice: z.object({
        id: z.number().int(),
        /** ERP-assigned invoice number, written back onto the host invoice */
        name: z.string().nullish(),
    }),
});

export const ReverseInvoiceReplySchema = z.object({ reverse_invoice: RecordRefSchema });

export const PaymentReplySchema = z.object({ payment: RecordRefSchema });

/** Upsert endpoints may omit the record; the id is then unknown */
export const ProductReplySchema = z.object({ product: RecordRefSchema.nullish() });
export const CategoryReplySchema = z.object({ category: RecordRefSchema.nullish() });
export const PartnerReplySchema = z.object({ partner: RecordRefSchema.nullish() });
export const UserReplySchema = z.object({ user: RecordRefSchema.nullish() });

export type InvoiceReply = z.infer<typeof InvoiceReplySchema>;
