/**
 * Cash session and cash transfer schemas
 *
 * Inbound request bodies accepted by the cash proxy routes and the
 * canonical shapes ERP replies are reshaped into. Session and transfer
 * state lives in the ERP; nothing here is persisted locally.
 */

import { z } from 'zod';
import { DecimalInputSchema } from './extensions.js';

// ============================================
// SESSIONS
// ============================================

export const SessionStatusSchema = z.enum(['open', 'closed']);

export const OpenSessionRequestSchema = z.object({
    counter_x_care_id: z.string().min(1, 'counter_x_care_id is required'),
    opening_balance: z.number().min(0).default(0),
});

export const CloseSessionRequestSchema = z.object({
    counter_x_care_id: z.string().min(1, 'counter_x_care_id is required'),
});

export const CurrentSessionRequestSchema = z.object({
    counter_x_care_id: z.string({ required_error: 'counter_x_care_id is required' }).min(1, 'counter_x_care_id is required'),
});

export const ListSessionsQuerySchema = z.object({
    status: SessionStatusSchema.optional(),
});

export const SessionDataSchema = z.object({
    id: z.number().int(),
    status: z.string(),
    opening_balance: z.number(),
    expected_amount: z.number(),
    counter_id: z.number().int(),
    counter_x_care_id: z.string(),
    external_user_id: z.string(),
    external_user_name: z.string(),
    counter_name: z.string(),
    opened_at: z.string(),
    closed_at: z.string().nullable().default(null),
    closing_expected: z.number(),
    closing_declared: z.number(),
    closing_difference: z.number(),
    difference_status: z.string().nullable().default(null),
    payment_count: z.number().int(),
    pending_outgoing_count: z.number().int(),
    pending_incoming_count: z.number().int(),
});

export const OpenSessionInfoSchema = z.object({
    session_id: z.number().int(),
    external_user_id: z.string(),
    external_user_name: z.string(),
});

export const CounterDataSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    x_care_id: z.string(),
    is_main_cash: z.boolean().default(false),
    has_open_session: z.boolean().default(false),
    open_sessions: z.array(OpenSessionInfoSchema).default([]),
    open_session_count: z.number().int().default(0),
});

// ============================================
// TRANSFERS
// ============================================

export const TransferStatusSchema = z.enum(['pending', 'accepted', 'rejected', 'cancelled']);

const DenominationsSchema = z.record(z.string(), z.number().int().min(0));

export const CreateTransferRequestSchema = z.object({
    from_counter_x_care_id: z.string().min(1),
    to_session_id: z.string().min(1),
    amount: z.string().regex(/^\d+(\.\d+)?$/, 'Amount must be a positive decimal number'),
    /** Required by the ERP for transfers into main cash */
    denominations: DenominationsSchema.nullable().default(null),
});

export const AcceptTransferRequestSchema = z.object({
    counter_x_care_id: z.string().min(1),
    session_id: z.string().min(1),
});

export const RejectTransferRequestSchema = z.object({
    counter_x_care_id: z.string().min(1),
    session_id: z.string().min(1),
    reason: z.string().nullable().default(null),
});

export const CancelTransferRequestSchema = z.object({
    counter_x_care_id: z.string().min(1),
    reason: z.string().nullable().default(null),
});

export const ListTransfersQuerySchema = z.object({
    status: TransferStatusSchema.optional(),
    counter_x_care_id: z.string().min(1).optional(),
    from_session_id: z.string().min(1).optional(),
});

export const PendingTransfersQuerySchema = z.object({
    counter_x_care_id: z.string({ required_error: 'counter_x_care_id is required' }).min(1, 'counter_x_care_id is required'),
});

export const TransferDataSchema = z.object({
    id: z.number().int(),
    status: z.string(),
    amount: DecimalInputSchema,
    from_session_id: z.number().int(),
    from_user_name: z.string(),
    from_counter_name: z.string(),
    to_session_id: z.number().int(),
    to_user_name: z.string(),
    to_counter_name: z.string(),
    created_by_name: z.string(),
    created_at: z.string(),
    resolved_by_name: z.string().nullable().default(null),
    resolved_at: z.string().nullable().default(null),
    reject_reason: z.string().nullable().default(null),
    denominations: DenominationsSchema.nullable().default(null),
});

// ============================================
// ERP REPLY ENVELOPES
// ============================================

/** Every cash endpoint replies with `success` and an optional `message` */
export const ErpCashReplySchema = z
    .object({
        success: z.boolean().default(false),
        message: z.string().nullish(),
    })
    .passthrough();

export type SessionStatus = z.infer<typeof SessionStatusSchema>;
export type OpenSessionRequest = z.infer<typeof OpenSessionRequestSchema>;
export type CloseSessionRequest = z.infer<typeof CloseSessionRequestSchema>;
export type SessionData = z.infer<typeof SessionDataSchema>;
export type CounterData = z.infer<typeof CounterDataSchema>;
export type TransferStatus = z.infer<typeof TransferStatusSchema>;
export type CreateTransferRequest = z.infer<typeof CreateTransferRequestSchema>;
export type AcceptTransferRequest = z.infer<typeof AcceptTransferRequestSchema>;
export type RejectTransferRequest = z.infer<typeof RejectTransferRequestSchema>;
export type CancelTransferRequest = z.infer<typeof CancelTransferRequestSchema>;
export type TransferData = z.infer<typeof TransferDataSchema>;
