/**
 * Tailor Error Types
 *
 * Error codes and typed errors for selection, rendering, generation, judging
 * and scoring. Selection and template errors are configuration bugs and
 * propagate to the caller; generation errors are recoverable per candidate.
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../../shared/errors/types';
import type { ValidationError } from '../../shared/validation/types';

export enum TailorErrorCode {
  SELECTION_FAILED = 'SELECTION_FAILED',
  TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND',
  TEMPLATE_INVALID = 'TEMPLATE_INVALID',
  MISSING_CONTEXT = 'MISSING_CONTEXT',
  GENERATION_TIMEOUT = 'GENERATION_TIMEOUT',
  GENERATION_PROVIDER_ERROR = 'GENERATION_PROVIDER_ERROR',
  GENERATION_RATE_LIMITED = 'GENERATION_RATE_LIMITED',
  TRUTHFULNESS_FAILED = 'TRUTHFULNESS_FAILED',
  CAPABILITY_UNAVAILABLE = 'CAPABILITY_UNAVAILABLE',
  ALL_CANDIDATES_FAILED = 'ALL_CANDIDATES_FAILED',
  JUDGE_INPUT = 'JUDGE_INPUT',
  INVALID_INPUT = 'INVALID_INPUT',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR'
}

/**
 * Error response structure for external consumers
 */
export interface ErrorResponse {
  error: TailorErrorCode;
  message: string;
  details: string;
  timestamp: string;
  run_id?: string;
  validation_errors?: ValidationError[];
  retryable: boolean;
  suggested_action?: string;
}

interface TailorErrorOptions {
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  validationErrors?: ValidationError[];
  retryable?: boolean;
  suggestedAction?: string;
}

export class TailorError extends AppError {
  public readonly code: TailorErrorCode;
  public readonly validationErrors?: ValidationError[];
  public readonly retryable: boolean;

  constructor(
    code: TailorErrorCode,
    userMessage: string,
    technicalDetails: string,
    options: TailorErrorOptions = {}
  ) {
    super({
      category: options.category ?? ErrorCategory.UNEXPECTED,
      severity: options.severity ?? ErrorSeverity.MEDIUM,
      userMessage,
      technicalDetails,
      timestamp: new Date(),
      context: options.context,
      recoverable: options.retryable ?? false,
      suggestedAction: options.suggestedAction
    });

    this.name = 'TailorError';
    this.code = code;
    this.validationErrors = options.validationErrors;
    this.retryable = options.retryable ?? false;
  }

  toErrorResponse(runId?: string): ErrorResponse {
    return {
      error: this.code,
      message: this.userMessage,
      details: this.technicalDetails,
      timestamp: this.timestamp.toISOString(),
      run_id: runId,
      validation_errors: this.validationErrors,
      retryable: this.retryable,
      suggested_action: this.suggestedAction
    };
  }
}

// ============================================================================
// Selection
// ============================================================================

export class SelectionError extends TailorError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(TailorErrorCode.SELECTION_FAILED, 'Variant configuration does not fit the history document', reason, {
      category: ErrorCategory.SELECTION,
      severity: ErrorSeverity.HIGH,
      context,
      suggestedAction: 'Fix the variant configuration or the history document'
    });
    this.name = 'SelectionError';
  }
}

// ============================================================================
// Templates
// ============================================================================

export class TemplateError extends TailorError {
  constructor(code: TailorErrorCode, userMessage: string, reason: string, context?: Record<string, unknown>) {
    super(code, userMessage, reason, {
      category: ErrorCategory.TEMPLATE,
      severity: ErrorSeverity.HIGH,
      context,
      suggestedAction: 'Check the template name and the fields it references'
    });
    this.name = 'TemplateError';
  }
}

export class TemplateNotFoundError extends TemplateError {
  constructor(public readonly templateName: string, public readonly format: string) {
    super(
      TailorErrorCode.TEMPLATE_NOT_FOUND,
      `Template "${templateName}" not found`,
      `No template registered for ${templateName}.${format}`,
      { templateName, format }
    );
    this.name = 'TemplateNotFoundError';
  }
}

export class MissingContextError extends TemplateError {
  constructor(public readonly templateName: string, reason: string) {
    super(
      TailorErrorCode.MISSING_CONTEXT,
      `Template "${templateName}" references a field the content set does not provide`,
      reason,
      { templateName }
    );
    this.name = 'MissingContextError';
  }
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Base for the per-candidate failures the orchestrator absorbs
 */
export class GenerationError extends TailorError {
  constructor(code: TailorErrorCode, userMessage: string, reason: string, options: TailorErrorOptions = {}) {
    super(code, userMessage, reason, {
      category: ErrorCategory.GENERATION,
      severity: ErrorSeverity.MEDIUM,
      retryable: true,
      ...options
    });
    this.name = 'GenerationError';
  }
}

export class GenerationTimeout extends GenerationError {
  constructor(timeoutMs: number, reason = `No completion within ${timeoutMs}ms`) {
    super(TailorErrorCode.GENERATION_TIMEOUT, 'Text generation timed out', reason, {
      category: ErrorCategory.NETWORK,
      context: { timeoutMs },
      suggestedAction: 'Retry or raise the timeout'
    });
    this.name = 'GenerationTimeout';
  }
}

export class GenerationProviderError extends GenerationError {
  constructor(reason: string, status?: number) {
    super(TailorErrorCode.GENERATION_PROVIDER_ERROR, 'Text generation provider returned an error', reason, {
      category: ErrorCategory.NETWORK,
      context: status === undefined ? undefined : { status }
    });
    this.name = 'GenerationProviderError';
  }
}

export class GenerationRateLimited extends GenerationError {
  constructor(reason: string) {
    super(TailorErrorCode.GENERATION_RATE_LIMITED, 'Text generation rate limit exceeded', reason, {
      category: ErrorCategory.NETWORK,
      suggestedAction: 'Wait before retrying'
    });
    this.name = 'GenerationRateLimited';
  }
}

export class TruthfulnessError extends GenerationError {
  constructor(public readonly unsupportedTerms: string[]) {
    super(
      TailorErrorCode.TRUTHFULNESS_FAILED,
      'Generated document introduced facts absent from the source',
      `Unsupported terms: ${unsupportedTerms.join(', ')}`,
      { context: { unsupportedTerms } }
    );
    this.name = 'TruthfulnessError';
  }
}

export class CapabilityUnavailableError extends GenerationError {
  constructor() {
    super(
      TailorErrorCode.CAPABILITY_UNAVAILABLE,
      'AI generation requested but no text-completion capability is configured',
      'No TextCompletion supplied',
      {
        category: ErrorCategory.CONFIGURATION,
        retryable: false,
        suggestedAction: 'Set an API key or use deterministic mode'
      }
    );
    this.name = 'CapabilityUnavailableError';
  }
}

export class AllCandidatesFailedError extends TailorError {
  constructor(public readonly codes: TailorErrorCode[]) {
    super(
      TailorErrorCode.ALL_CANDIDATES_FAILED,
      'Every generated candidate failed',
      `Candidate failures: ${codes.join(', ') || 'none completed'}`,
      {
        category: ErrorCategory.GENERATION,
        severity: ErrorSeverity.HIGH,
        context: { codes },
        suggestedAction: 'Enable fallback or inspect the per-candidate failures'
      }
    );
    this.name = 'AllCandidatesFailedError';
  }
}

// ============================================================================
// Judge & configuration
// ============================================================================

export class JudgeInputError extends TailorError {
  constructor() {
    super(TailorErrorCode.JUDGE_INPUT, 'No candidates to judge', 'Judge called with an empty candidate list', {
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL
    });
    this.name = 'JudgeInputError';
  }
}

export class ConfigurationError extends TailorError {
  constructor(field: string, reason: string, validationErrors?: ValidationError[]) {
    super(TailorErrorCode.CONFIGURATION_ERROR, 'Configuration error', `Invalid configuration for ${field}: ${reason}`, {
      category: ErrorCategory.CONFIGURATION,
      severity: ErrorSeverity.CRITICAL,
      context: { field },
      validationErrors,
      suggestedAction: 'Check configuration settings'
    });
    this.name = 'ConfigurationError';
  }
}

export class InvalidInputError extends TailorError {
  constructor(subject: string, validationErrors: ValidationError[]) {
    super(
      TailorErrorCode.INVALID_INPUT,
      `${subject} validation failed`,
      validationErrors.map(e => `${e.field}: ${e.message}`).join('; '),
      {
        category: ErrorCategory.VALIDATION,
        validationErrors,
        suggestedAction: 'Check input format and required fields'
      }
    );
    this.name = 'InvalidInputError';
  }
}

/**
 * Error code for anything thrown while producing a candidate
 */
export function errorCodeOf(error: unknown): TailorErrorCode {
  return error instanceof TailorError ? error.code : TailorErrorCode.GENERATION_PROVIDER_ERROR;
}
