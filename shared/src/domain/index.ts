/**
 * Domain Layer
 *
 * Pure mapping from host records to ERP payloads. No I/O.
 */

export * from './constants.js';
export * from './pricing.js';
export * from './partners.js';
export * from './products.js';
export * from './insurance.js';
export * from './invoices.js';
export * from './payments.js';
