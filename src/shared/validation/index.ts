/**
 * Validation Module
 *
 * Schema validation with zod and translated (pt-BR) field messages.
 */

export * from './fieldNames';
export * from './translator';
export * from './types';
export * from './validator';
