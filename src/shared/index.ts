/**
 * Shared Infrastructure
 *
 * Framework-independent building blocks used by the HTTP layer.
 *
 * Modules:
 * - errors: Structured errors, HTTP error mapping and the sentinel registry
 * - validation: Schema validation with translated messages
 */

export * from './errors';
export * from './validation';
