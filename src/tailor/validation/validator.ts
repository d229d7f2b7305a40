/**
 * Tailor Validators
 *
 * Boundary checks for input that arrives as untyped data (parsed YAML or
 * JSON). Each validator returns a ValidationResult; the `assert` forms
 * return the typed value or throw InvalidInputError.
 */

import type { z } from 'zod';
import type { ValidationError, ValidationResult } from '../../shared/validation/types';
import type { HistoryDocument, VariantConfig } from '../types';
import { InvalidInputError } from '../errors/types';
import { GenerationConfigSchema, HistoryDocumentSchema, VariantConfigSchema } from './schemas';

/**
 * Converts Zod validation errors to ValidationResult
 */
export function zodErrorToValidationResult(error: z.ZodError): ValidationResult {
  const errors: ValidationError[] = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message
  }));

  return {
    isValid: false,
    errors
  };
}

function check(schema: z.ZodTypeAny, value: unknown): ValidationResult {
  const result = schema.safeParse(value);
  return result.success ? { isValid: true, errors: [] } : zodErrorToValidationResult(result.error);
}

export function validateHistoryDocument(history: unknown): ValidationResult {
  return check(HistoryDocumentSchema, history);
}

export function validateVariantConfig(variant: unknown): ValidationResult {
  return check(VariantConfigSchema, variant);
}

export function validateGenerationConfig(config: unknown): ValidationResult {
  return check(GenerationConfigSchema, config);
}

/**
 * @throws InvalidInputError listing every invalid field
 */
export function assertHistoryDocument(history: unknown): HistoryDocument {
  const result = HistoryDocumentSchema.safeParse(history);
  if (!result.success) {
    throw new InvalidInputError('History document', zodErrorToValidationResult(result.error).errors);
  }
  return result.data;
}

/**
 * @throws InvalidInputError listing every invalid field
 */
export function assertVariantConfig(variant: unknown): VariantConfig {
  const result = VariantConfigSchema.safeParse(variant);
  if (!result.success) {
    throw new InvalidInputError('Variant configuration', zodErrorToValidationResult(result.error).errors);
  }
  return result.data;
}
