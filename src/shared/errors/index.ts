/**
 * Errors Module
 *
 * Structured error types, HTTP error mapping and the sentinel registry.
 */

export * from './chain';
export * from './coerce';
export * from './domainError';
export * from './httpError';
export * from './registry';
export * from './sentinels';
export * from './types';
export * from './validationErrors';
