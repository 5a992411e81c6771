/**
 * @care-erp/shared - host record types, ERP payload schemas and mappers
 *
 * Everything here is pure: the server package does the I/O.
 */

export type * from './types/index.js';

export * from './schemas/index.js';
export * from './domain/index.js';
export * from './errors/index.js';
export * from './validators/index.js';
export * from './utils/dateHelpers.js';
