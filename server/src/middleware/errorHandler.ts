/**
 * Centralized Error Handler Middleware
 * Normalizes errors thrown in routes into the envelope
 * `{ "errors": [{ "type": ..., "msg": ... }] }`
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { formatIssues } from '@care-erp/shared';
import {
    ValidationError,
    NotFoundError,
    UnauthorizedError,
    ForbiddenError,
} from '../utils/errors.js';
import logger from '../utils/logger.js';

/** Machine-readable error kinds of the envelope */
export type ErrorEnvelopeType =
    | 'validation_error'
    | 'object_not_found'
    | 'permission_denied'
    | 'not_authenticated'
    | 'server_error';

export interface ErrorEnvelope {
    errors: Array<{ type: ErrorEnvelopeType; msg: string }>;
}

function envelope(type: ErrorEnvelopeType, msg: string): ErrorEnvelope {
    return { errors: [{ type, msg }] };
}

/**
 * Global error handling middleware
 */
export const errorHandler: ErrorRequestHandler = (
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    if (err instanceof ValidationError) {
        res.status(400).json(envelope('validation_error', err.message));
        return;
    }

    if (err instanceof ZodError) {
        res.status(400).json(envelope('validation_error', formatIssues(err.issues)));
        return;
    }

    if (err instanceof NotFoundError) {
        res.status(404).json(envelope('object_not_found', err.message));
        return;
    }

    if (err instanceof ForbiddenError) {
        res.status(403).json(envelope('permission_denied', err.message));
        return;
    }

    if (err instanceof UnauthorizedError) {
        res.status(401).json(envelope('not_authenticated', err.message));
        return;
    }

    logger.error({
        err,
        method: req.method,
        path: req.path,
        userExternalId: req.user?.userExternalId,
    }, 'Unhandled route error');

    res.status(500).json(envelope('server_error', 'Internal server error'));
};

export default errorHandler;
