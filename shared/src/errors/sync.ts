/**
 * Sync Error Classes
 *
 * Errors raised while turning host records into ERP payloads. They are
 * thrown before any network call, so the triggering host write sees them
 * synchronously. The server's error middleware maps them onto HTTP
 * statuses through `statusCode`.
 */

/**
 * Local payload construction or business-rule violation.
 * Never sent to the ERP.
 *
 * @example
 * throw new ValidationError('More than 1 discount per item is not allowed. Found 2 discounts.');
 */
export class ValidationError extends Error {
    readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * A referenced host record does not exist.
 *
 * @example
 * throw new NotFoundError('Invoice not found', 'Invoice', externalId);
 */
export class NotFoundError extends Error {
    readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;
    readonly resourceType: string;
    readonly resourceId: string | number | null;

    constructor(message: string, resourceType: string, resourceId: string | number | null = null) {
        super(message);
        this.resourceType = resourceType;
        this.resourceId = resourceId;
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}
