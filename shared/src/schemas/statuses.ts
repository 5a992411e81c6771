/**
 * Host status enums
 */

import { z } from 'zod';

export const InvoiceStatusSchema = z.enum(['draft', 'issued', 'balanced', 'cancelled', 'entered_in_error', 'voided']);
export const PaymentStatusSchema = z.enum(['active', 'cancelled', 'draft', 'entered_in_error']);
export const DeliveryOrderStatusSchema = z.enum(['draft', 'pending', 'completed', 'abandoned', 'entered_in_error']);
export const ChargeItemDefinitionStatusSchema = z.enum(['active', 'retired', 'draft']);
