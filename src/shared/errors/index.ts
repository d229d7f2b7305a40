/**
 * Errors Module
 *
 * Shared error types and the error log.
 */

export * from './types';
export * from './logger';
