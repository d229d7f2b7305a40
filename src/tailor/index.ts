/**
 * Tailor
 *
 * Variant-aware content selection, multi-candidate generation with judging
 * and fallback, and ATS compatibility scoring.
 */

export * from './types';
export * from './errors';
export * from './config';
export * from './validation';
export * from './matcher/textNormalizer';
export * from './matcher/keywordMatcher';
export * from './matcher/sections';
export * from './selector/contentSelector';
export * from './renderer/helpers';
export * from './renderer/templateRepository';
export * from './renderer/renderer';
export * from './generation/truthfulness';
export * from './generation/candidateGenerator';
export * from './generation/workerPool';
export * from './generation/orchestrator';
export * from './judge/judge';
export * from './ats/keywordExtractor';
export * from './ats/atsScorer';
export * from './logging/logger';
export * from './pipeline';
