/**
 * Request validation for outbound ERP payloads
 *
 * Wraps zod parsing so schema and business-rule failures surface as a
 * ValidationError before anything is sent.
 */

import type { z } from 'zod';
import { ValidationError } from '../errors/sync.js';

/**
 * Flatten zod issues into one readable message:
 * `path.to.field: message; other: message`
 */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
    return issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Validate and normalize a payload against its request schema.
 *
 * @throws ValidationError carrying the zod issues as details
 *
 * @example
 * const data = parseRequest(PaymentRequestSchema, draft);
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: z.input<T>): z.output<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new ValidationError(formatIssues(result.error.issues), result.error.issues);
    }
    return result.data;
}
