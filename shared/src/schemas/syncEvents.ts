/**
 * Host persistence events
 *
 * One event per saved host record. The event carries just the state the
 * dispatcher needs to pick a transition; sync resources reload the full
 * record themselves.
 */

import { z } from 'zod';
import { DeliveryOrderStatusSchema, InvoiceStatusSchema, PaymentStatusSchema } from './statuses.js';

const base = {
    externalId: z.string().min(1),
    created: z.boolean().default(false),
    /** Fields named by a scoped save; null for a full save */
    updateFields: z.array(z.string()).nullable().default(null),
};

export const SyncEventSchema = z.discriminatedUnion('entity', [
    z.object({ entity: z.literal('user'), ...base }),
    z.object({
        entity: z.literal('invoice'),
        ...base,
        status: InvoiceStatusSchema,
        /** Status before this write; null when unknown or on create */
        previousStatus: InvoiceStatusSchema.nullable().default(null),
    }),
    z.object({
        entity: z.literal('payment_reconciliation'),
        ...base,
        status: PaymentStatusSchema,
        previousStatus: PaymentStatusSchema.nullable().default(null),
    }),
    z.object({ entity: z.literal('charge_item_definition'), ...base }),
    z.object({ entity: z.literal('resource_category'), ...base, resourceType: z.string() }),
    z.object({ entity: z.literal('organization'), ...base, orgType: z.string() }),
    z.object({
        entity: z.literal('delivery_order'),
        ...base,
        status: DeliveryOrderStatusSchema,
        originExternalId: z.string().nullable().default(null),
    }),
    z.object({
        entity: z.literal('product'),
        ...base,
        chargeItemDefinitionExternalId: z.string().nullable().default(null),
    }),
]);

export type SyncEvent = z.infer<typeof SyncEventSchema>;
export type SyncEventInput = z.input<typeof SyncEventSchema>;
export type SyncEntity = SyncEvent['entity'];
export type SyncEventOf<E extends SyncEntity> = Extract<SyncEvent, { entity: E }>;
