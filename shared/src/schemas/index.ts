/**
 * Shared Zod schemas
 *
 * Host-side sub-records and events, ERP wire requests and replies,
 * cash proxy and lookup shapes.
 */

export * from './statuses.js';
export * from './extensions.js';
export * from './syncEvents.js';
export * from './erpRequests.js';
export * from './erpResponses.js';
export * from './cash.js';
export * from './lookups.js';
