/**
 * Custom error classes for better error handling
 * Use these instead of generic Error for specific error types
 *
 * Payload errors (ValidationError, NotFoundError) live in the shared package
 * because the domain builders raise them; they are re-exported here so the
 * server has one import site.
 */
import { ValidationError, NotFoundError } from '@care-erp/shared';

export { ValidationError, NotFoundError };

/**
 * Base interface for custom errors with HTTP status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/**
 * Unauthorized error - thrown when authentication fails
 *
 * @example
 * throw new UnauthorizedError('Invalid token');
 */
export class UnauthorizedError extends Error implements CustomError {
    readonly name = 'UnauthorizedError' as const;
    readonly statusCode = 401 as const;

    constructor(message: string = 'Authentication credentials were not provided') {
        super(message);
        Object.setPrototypeOf(this, UnauthorizedError.prototype);
    }
}

/**
 * Forbidden error - thrown when user lacks permissions
 *
 * @example
 * throw new ForbiddenError('You do not have access to location Front Desk');
 */
export class ForbiddenError extends Error implements CustomError {
    readonly name = 'ForbiddenError' as const;
    readonly statusCode = 403 as const;

    constructor(message: string = 'Forbidden') {
        super(message);
        Object.setPrototypeOf(this, ForbiddenError.prototype);
    }
}

// ============================================
// ERP TRANSPORT ERRORS
// ============================================

/**
 * Base for every failure reported by the ERP client.
 * `status` is the HTTP status when the ERP answered, null otherwise.
 */
export class ErpError extends Error implements CustomError {
    readonly statusCode = 502 as const;
    readonly endpoint: string;
    readonly status: number | null;

    constructor(message: string, endpoint: string, status: number | null = null) {
        super(message);
        this.name = 'ErpError';
        this.endpoint = endpoint;
        this.status = status;
        Object.setPrototypeOf(this, ErpError.prototype);
    }
}

/**
 * Timeout or refused connection. The only ERP error reconciliation retries.
 */
export class ErpConnectionError extends ErpError {
    constructor(message: string, endpoint: string) {
        super(message, endpoint, null);
        this.name = 'ErpConnectionError';
        Object.setPrototypeOf(this, ErpConnectionError.prototype);
    }
}

/** ERP answered with a 4xx */
export class ErpClientError extends ErpError {
    constructor(message: string, endpoint: string, status: number) {
        super(message, endpoint, status);
        this.name = 'ErpClientError';
        Object.setPrototypeOf(this, ErpClientError.prototype);
    }
}

/** ERP answered with a 5xx */
export class ErpServerError extends ErpError {
    constructor(message: string, endpoint: string, status: number) {
        super(message, endpoint, status);
        this.name = 'ErpServerError';
        Object.setPrototypeOf(this, ErpServerError.prototype);
    }
}

/**
 * 2xx reply whose body does not have the documented shape.
 */
export class ErpResponseError extends ErpError {
    readonly body: unknown;

    constructor(message: string, endpoint: string, body: unknown) {
        super(message, endpoint, null);
        this.name = 'ErpResponseError';
        this.body = body;
        Object.setPrototypeOf(this, ErpResponseError.prototype);
    }
}

/**
 * Type guard to check if an error is a custom error with statusCode
 */
export function isCustomError(error: unknown): error is CustomError {
    return (
        error instanceof Error &&
        'statusCode' in error &&
        typeof error.statusCode === 'number'
    );
}
