/**
 * Async Handler & Typed Route Middleware
 *
 * asyncHandler - wraps async route handlers to catch errors automatically
 * typedRoute  - combines Zod validation + asyncHandler for type-safe routes
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { z } from 'zod';
import { ValidationError, formatIssues } from '@care-erp/shared';

// ============================================
// Core types
// ============================================

type AsyncRequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
) => Promise<void | Response>;

type TypedHandler<T> = (
    input: T,
    req: Request,
    res: Response,
) => Promise<void | Response>;

/** Where typedRoute reads its input from */
export type InputSource = 'body' | 'query';

// ============================================
// asyncHandler
// ============================================

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

// ============================================
// typedRoute - Zod validation + asyncHandler
// ============================================

/**
 * Validate an untyped request value against a schema.
 * Failures become a ValidationError, rendered as a 400 by the error handler.
 */
export function validateInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new ValidationError(formatIssues(result.error.issues), result.error.issues);
    }
    return result.data;
}

/**
 * Combines Zod validation of the body (or query) with asyncHandler.
 *
 * @example
 * router.post('/', typedRoute(OpenSessionRequestSchema, 'body', async (body, req, res) => {
 *     const { counter_x_care_id } = body; // ← fully typed
 *     res.status(201).json(result);
 * }));
 */
export function typedRoute<T extends z.ZodTypeAny>(
    schema: T,
    source: InputSource,
    handler: TypedHandler<z.output<T>>,
): RequestHandler {
    return asyncHandler(async (req: Request, res: Response) => {
        const input = validateInput(schema, source === 'body' ? req.body : req.query);
        await handler(input, req, res);
    });
}

export default asyncHandler;
