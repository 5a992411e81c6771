/**
 * Shared Error Utilities
 *
 * Export barrel for domain-specific error classes.
 */

export { ValidationError, NotFoundError } from './sync.js';
