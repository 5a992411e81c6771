/**
 * Account ↔ ERP payment method link
 *
 * Stored in the account's opaque meta map as `meta[namespace][key]`.
 * Removing the last key removes the namespace too.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readPaymentMethodLink(meta: Record<string, unknown>, namespace: string, key: string): number | null {
    const scope = meta[namespace];
    if (!isRecord(scope)) return null;

    const value = scope[key];
    if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
    if (typeof value === 'string' && /^\d+$/.test(value) && Number(value) > 0) return Number(value);
    return null;
}

/**
 * @returns a new meta map; the input is not modified
 */
export function writePaymentMethodLink(
    meta: Record<string, unknown>,
    namespace: string,
    key: string,
    paymentMethodId: number | null
): Record<string, unknown> {
    const next = { ...meta };
    const current = next[namespace];
    const scope: Record<string, unknown> = isRecord(current) ? { ...current } : {};

    if (paymentMethodId !== null) {
        next[namespace] = { ...scope, [key]: paymentMethodId };
        return next;
    }

    delete scope[key];
    if (Object.keys(scope).length === 0) {
        delete next[namespace];
    } else {
        next[namespace] = scope;
    }
    return next;
}
