/**
 * LLM Module
 *
 * Unified LLM client and the text-completion capability built on it.
 */

export * from './types';
export * from './client';
export * from './cache';
export * from './completion';
