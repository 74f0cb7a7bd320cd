/**
 * Pipeline Error Handling
 *
 * Every failure inside a run is a PipelineError with a category. The category
 * decides whether the failure aborts the run (stage-fatal) or is recorded as a
 * warning beside the stage output (local).
 *
 * @module pipeline/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  // Missing or unreadable source files
  | 'INPUT_ERROR'

  // OCR / extraction / embedding backend failed after retries
  | 'EXTERNAL_SERVICE_ERROR'

  // Malformed structured-extraction output
  | 'PARSE_ERROR'

  // A classified document without a usable date
  | 'VERSIONING_ERROR'

  // One side of a version pair lacks structured fields
  | 'COMPARISON_ERROR'

  // A required report field could not be resolved
  | 'REPORT_ERROR'

  // Environment or resource files
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'

  | 'INTERNAL_ERROR';

const VALID_CATEGORIES = new Set<string>([
  'INPUT_ERROR',
  'EXTERNAL_SERVICE_ERROR',
  'PARSE_ERROR',
  'VERSIONING_ERROR',
  'COMPARISON_ERROR',
  'REPORT_ERROR',
  'CONFIGURATION_ERROR',
  'VALIDATION_ERROR',
  'INTERNAL_ERROR',
]);

export function isErrorCategory(value: string): value is ErrorCategory {
  return VALID_CATEGORIES.has(value);
}

/**
 * Categories recorded as warnings instead of aborting the run
 */
const LOCAL_CATEGORIES = new Set<ErrorCategory>(['COMPARISON_ERROR', 'REPORT_ERROR']);

export function isStageFatal(category: ErrorCategory): boolean {
  return !LOCAL_CATEGORIES.has(category);
}

/**
 * Map foreign error class names to categories.
 * ValidationError comes from utils/validation, CircuitBreakerOpenError from the LLM client.
 */
const ERROR_NAME_TO_CATEGORY = new Map<string, ErrorCategory>([
  ['ValidationError', 'VALIDATION_ERROR'],
  ['CircuitBreakerOpenError', 'EXTERNAL_SERVICE_ERROR'],
  ['AbortError', 'EXTERNAL_SERVICE_ERROR'],
  ['TimeoutError', 'EXTERNAL_SERVICE_ERROR'],
  ['SqliteError', 'EXTERNAL_SERVICE_ERROR'],
]);

// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Where the failure happened. Filled in progressively: the engine that throws
 * knows the document, the controller adds company and stage.
 */
export interface ErrorContext {
  company?: string;
  stage?: string;
  document?: string;
  field?: string;
  [key: string]: unknown;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class PipelineError extends Error {
  public readonly category: ErrorCategory;
  public readonly details: ErrorContext;

  constructor(category: ErrorCategory, message: string, details: ErrorContext = {}) {
    super(message);
    this.name = 'PipelineError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get document(): string | undefined {
    return this.details.document;
  }

  /**
   * Copy of this error with extra context merged in. Existing keys win so the
   * innermost thrower's context is kept.
   */
  withContext(context: ErrorContext): PipelineError {
    const merged = new PipelineError(this.category, this.message, { ...context, ...this.details });
    merged.name = this.name;
    merged.stack = this.stack;
    return merged;
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(
    error: unknown,
    defaultCategory: ErrorCategory = 'INTERNAL_ERROR',
    context: ErrorContext = {}
  ): PipelineError {
    if (error instanceof PipelineError) {
      return Object.keys(context).length > 0 ? error.withContext(context) : error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY.get(error.name) ?? defaultCategory;
      return new PipelineError(category, error.message, {
        ...context,
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new PipelineError(defaultCategory, String(error), {
      ...context,
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SUBCLASSES
// ═══════════════════════════════════════════════════════════════════════════════

export class InputError extends PipelineError {
  constructor(message: string, details?: ErrorContext) {
    super('INPUT_ERROR', message, details);
    this.name = 'InputError';
  }
}

export class ExternalServiceError extends PipelineError {
  constructor(message: string, details?: ErrorContext) {
    super('EXTERNAL_SERVICE_ERROR', message, details);
    this.name = 'ExternalServiceError';
  }
}

export class ParseError extends PipelineError {
  constructor(message: string, details?: ErrorContext) {
    super('PARSE_ERROR', message, details);
    this.name = 'ParseError';
  }
}

export class VersioningError extends PipelineError {
  constructor(message: string, details?: ErrorContext) {
    super('VERSIONING_ERROR', message, details);
    this.name = 'VersioningError';
  }
}

export class ComparisonError extends PipelineError {
  constructor(message: string, details?: ErrorContext) {
    super('COMPARISON_ERROR', message, details);
    this.name = 'ComparisonError';
  }
}

export class ReportError extends PipelineError {
  constructor(message: string, details?: ErrorContext) {
    super('REPORT_ERROR', message, details);
    this.name = 'ReportError';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, details?: ErrorContext) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

const RECOVERY_HINTS: Record<ErrorCategory, string> = {
  INPUT_ERROR: 'Check that data/{company}/ exists and contains readable PDF files',
  EXTERNAL_SERVICE_ERROR:
    'Check OLLAMA_BASE_URL and that the model is pulled; raise EXTERNAL_TIMEOUT_MS for large documents',
  PARSE_ERROR: 'The model returned malformed JSON; retry or switch OLLAMA_MODEL',
  VERSIONING_ERROR:
    'The document has no recognisable date; inspect {company}_date_results.json and the OCR text',
  COMPARISON_ERROR: 'One version lacks structured fields; inspect {company}_extraction_results.json',
  REPORT_ERROR: 'No document states this field; the report keeps it as null',
  CONFIGURATION_ERROR: 'Check environment variables and the resources/ catalog files',
  VALIDATION_ERROR: 'Check the shape of the file or value named in the message',
  INTERNAL_ERROR: 'Unexpected failure; rerun with the stack trace from stderr',
};

export function getRecoveryHint(category: ErrorCategory): string {
  return RECOVERY_HINTS[category];
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
