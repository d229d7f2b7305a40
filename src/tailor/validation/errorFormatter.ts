/**
 * Error Formatter
 *
 * Formats validation errors into descriptive error responses.
 */

import type { ValidationError, ValidationResult } from '../../shared/validation/types';
import { InvalidInputError, type ErrorResponse } from '../errors/types';

/**
 * @param context what was being validated, e.g. "History document"
 */
export function formatValidationError(validationResult: ValidationResult, context: string): ErrorResponse {
  if (validationResult.isValid) {
    throw new Error('Cannot format validation error for valid result');
  }

  return new InvalidInputError(context, validationResult.errors).toErrorResponse();
}

export function formatSingleError(error: ValidationError): string {
  return `Field '${error.field || '(root)'}': ${error.message}`;
}
