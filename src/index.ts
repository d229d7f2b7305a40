export * from './tailor';
export {
  LLMClient,
  LLMCache,
  LLMTextCompletion,
  LLMRequestError,
  parseJsonResponse,
  createLLMClientFromEnv,
  type LLMConfig,
  type LLMProvider,
  type CompletionConstraints
} from './shared/llm';
export { AppError, ErrorCategory, ErrorSeverity, ErrorLogger } from './shared/errors';
export { logger, createComponentLogger } from './shared/logging/logger';
export type { ValidationError, ValidationResult } from './shared/validation/types';
