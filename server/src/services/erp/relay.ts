/**
 * ERP relay for proxy routes
 *
 * Proxy routes report every failure of the ERP exchange as a validation
 * error with a route-specific prefix. Validation and not-found errors
 * raised while reading the reply pass through as they are.
 */

import { ZodError } from 'zod';
import { ErpCashReplySchema, formatIssues } from '@care-erp/shared';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { erpLogger } from '../../utils/logger.js';
import type { ErpRpc, HttpMethod } from './client.js';

export interface RelayRequest {
    endpoint: string;
    payload?: Record<string, unknown>;
    method?: HttpMethod;
}

export type ErpCashReply = ReturnType<typeof ErpCashReplySchema.parse>;

function describe(error: unknown): string {
    if (error instanceof ZodError) return formatIssues(error.issues);
    if (error instanceof Error) return error.message;
    return String(error);
}

/**
 * Call the ERP and read the reply.
 *
 * @param errorPrefix - e.g. "Error opening cash session"
 */
export async function relay<T>(
    erp: ErpRpc,
    request: RelayRequest,
    errorPrefix: string,
    read: (body: unknown) => T,
): Promise<T> {
    try {
        const body = await erp.call(request.endpoint, request.payload ?? {}, request.method ?? 'POST');
        return read(body);
    } catch (error: unknown) {
        if (error instanceof ValidationError || error instanceof NotFoundError) {
            throw error;
        }
        erpLogger.error({ err: error, endpoint: request.endpoint }, errorPrefix);
        throw new ValidationError(`${errorPrefix}: ${describe(error)}`);
    }
}

/**
 * Cash endpoints answer `{ success: false, message }` for business failures.
 */
export function expectSuccess(body: unknown, failure: string): ErpCashReply {
    const reply = ErpCashReplySchema.parse(body);
    if (!reply.success) {
        throw new ValidationError(reply.message || failure);
    }
    return reply;
}

/** Read a list field of a reply; a missing list is empty */
export function listField(body: unknown, field: string): unknown[] {
    const reply = ErpCashReplySchema.parse(body);
    const value = reply[field];
    return Array.isArray(value) ? value : [];
}
