/**
 * Host extension and metadata sub-records
 *
 * The host stores plugin data in free-form JSON maps (`extensions`,
 * `metadata`, `meta`). Each namespace the sync reads is modeled here as an
 * explicit optional structure and validated where the record is loaded,
 * so call sites never do ad hoc key lookups.
 */

import { z } from 'zod';

// ============================================
// PRIMITIVES
// ============================================

/**
 * Decimal value as it arrives from JSON: number or numeric string.
 * Normalized to a string so the upstream precision is kept.
 */
export const DecimalInputSchema = z
    .union([z.string().regex(/^-?\d+(\.\d+)?$/, 'Invalid decimal'), z.number().finite()])
    .transform((value) => String(value));

// ============================================
// PRICING
// ============================================

export const MonetaryComponentTypeSchema = z.enum(['base', 'surcharge', 'discount', 'tax', 'informational']);

export const CodingSchema = z.object({
    system: z.string().optional(),
    code: z.string(),
    display: z.string().default(''),
});

/** Raw host price component (snake_case JSON) → camelCase domain shape */
export const MonetaryComponentSchema = z
    .object({
        monetary_component_type: MonetaryComponentTypeSchema,
        code: CodingSchema.nullish(),
        factor: DecimalInputSchema.nullish(),
        amount: DecimalInputSchema.nullish(),
    })
    .transform((raw) => ({
        monetaryComponentType: raw.monetary_component_type,
        code: raw.code ?? null,
        factor: raw.factor ?? null,
        amount: raw.amount ?? null,
    }));

export const MonetaryComponentListSchema = z.array(MonetaryComponentSchema).nullish().transform((list) => list ?? []);

// ============================================
// EXTENSIONS
// ============================================

/** `supply_delivery_extension` on a supply delivery */
export const SupplyDeliveryExtensionSchema = z.object({
    free_quantity: z.number().int().min(0).default(0),
    purchase_discount: z.number().min(0).default(0),
});

/** `supply_delivery_order_extension` on a delivery order */
export const DeliveryOrderExtensionSchema = z.object({
    vendor_bill_number: z.string().optional(),
    vendor_bill_date: z.string().date().optional(),
    total_discount: z.number().min(0).default(0),
});

/**
 * `payment_extension` on a payment reconciliation.
 * A credit payment is funded by a third party (Care of Account).
 */
export const PaymentExtensionSchema = z.object({
    is_credit_payment: z.boolean().default(false),
    payment_method_line_id: z.number().int().positive().nullish(),
});

/**
 * `account_extension` on an account. Keys are configurable
 * (the insurance company key comes from config), values stay loose.
 */
export const AccountExtensionSchema = z.record(z.string(), z.unknown());

export const SupplierMetadataSchema = z.object({
    email: z.string().default(''),
    phone: z.string().default(''),
    state: z.string().optional(),
});

/**
 * Parse one namespace of an extensions map. A missing namespace yields
 * the schema defaults; a malformed one is rejected.
 */
export function readExtension<T extends z.ZodTypeAny>(
    extensions: Record<string, unknown> | null | undefined,
    namespace: string,
    schema: T
): z.output<T> {
    return schema.parse(extensions?.[namespace] ?? {});
}

export type MonetaryComponentType = z.infer<typeof MonetaryComponentTypeSchema>;
export type Coding = z.infer<typeof CodingSchema>;
export type MonetaryComponent = z.output<typeof MonetaryComponentSchema>;
export type SupplyDeliveryExtension = z.output<typeof SupplyDeliveryExtensionSchema>;
export type DeliveryOrderExtension = z.output<typeof DeliveryOrderExtensionSchema>;
export type PaymentExtension = z.output<typeof PaymentExtensionSchema>;
export type AccountExtension = z.output<typeof AccountExtensionSchema>;
export type SupplierMetadata = z.output<typeof SupplierMetadataSchema>;
