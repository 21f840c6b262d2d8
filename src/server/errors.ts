/**
 * Curator Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * The only failure absorbed inside the core is a label/description
 * conflict on write, which resolves to the existing entity.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for curator failures
 * Each category maps to a specific failure mode so callers can decide
 * whether to create, correct, retry or give up.
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Resolution errors
  | 'NOT_FOUND'
  | 'INVALID_REFERENCE'

  // Schema errors
  | 'UNKNOWN_DATATYPE'
  | 'PROPERTY_NOT_FOUND'

  // Write errors
  | 'DUPLICATE_LABEL_DESCRIPTION'

  // Wiki errors
  | 'WIKI_PAGE_OPERATION_FAILED'
  | 'LOGIN_FAILED'
  | 'WIKIBASE_API_ERROR'

  // Transport errors
  | 'BACKEND_UNAVAILABLE'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map foreign error class names to categories.
 * SqliteError comes from better-sqlite3, TypeError from fetch on network failure,
 * ZodError from config parsing outside validateInput().
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
  SqliteError: 'BACKEND_UNAVAILABLE',
  AbortError: 'BACKEND_UNAVAILABLE',
  TimeoutError: 'BACKEND_UNAVAILABLE',
};

// ═══════════════════════════════════════════════════════════════════════════════
// CURATOR ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * CuratorError - Structured error class for all curator failures
 *
 * Provides category, message, and optional details (offending reference,
 * upstream payload) for logging or retrying at a higher layer.
 */
export class CuratorError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CuratorError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CuratorError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): CuratorError {
    if (error instanceof CuratorError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      return new CuratorError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new CuratorError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Narrow an unknown value to a CuratorError of the given category
 */
export function isCuratorError(error: unknown, category?: ErrorCategory): error is CuratorError {
  return error instanceof CuratorError && (category === undefined || error.category === category);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format CuratorError for tool response
 * ALWAYS includes category, message, and details
 */
export function formatErrorResponse(error: CuratorError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create validation error
 */
export function validationError(message: string, details?: Record<string, unknown>): CuratorError {
  return new CuratorError('VALIDATION_ERROR', message, details);
}

/**
 * Create not found error for a reference that has no local counterpart
 */
export function notFoundError(reference: string, kind: string): CuratorError {
  return new CuratorError('NOT_FOUND', `No local ${kind} found for "${reference}"`, {
    reference,
    kind,
  });
}

/**
 * Create invalid reference error
 */
export function invalidReferenceError(reference: string): CuratorError {
  return new CuratorError(
    'INVALID_REFERENCE',
    `Invalid reference "${reference}". Expected a local id (Q123/P123), a wd:/wdt: prefixed remote id, or a label.`,
    { reference }
  );
}

/**
 * Create unknown datatype error
 */
export function unknownDatatypeError(propertyId: string, datatype: string): CuratorError {
  return new CuratorError('UNKNOWN_DATATYPE', `Property ${propertyId} has unsupported datatype "${datatype}"`, {
    propertyId,
    datatype,
  });
}

/**
 * Create property not found error, keeping the resolution failure as cause
 */
export function propertyNotFoundError(reference: string, cause?: CuratorError): CuratorError {
  return new CuratorError('PROPERTY_NOT_FOUND', `Property "${reference}" could not be resolved`, {
    reference,
    cause: cause?.category,
  });
}

/**
 * Create duplicate error for a conflict whose existing entity id could not be recovered
 */
export function duplicateLabelDescriptionError(label: string, payload: unknown): CuratorError {
  return new CuratorError(
    'DUPLICATE_LABEL_DESCRIPTION',
    `An entity labelled "${label}" with the same description already exists, but its id was not reported`,
    { label, upstream: payload }
  );
}

/**
 * Create wiki page operation error carrying the upstream payload
 */
export function wikiPageOperationError(operation: 'delete' | 'move', page: string, payload: unknown): CuratorError {
  return new CuratorError('WIKI_PAGE_OPERATION_FAILED', `Wiki page ${operation} failed for "${page}"`, {
    operation,
    page,
    upstream: payload,
  });
}

/**
 * Create Wikibase API error carrying the upstream payload
 */
export function wikibaseApiError(action: string, payload: unknown): CuratorError {
  const info = extractErrorInfo(payload);
  return new CuratorError('WIKIBASE_API_ERROR', `Wikibase API action "${action}" failed${info ? `: ${info}` : ''}`, {
    action,
    upstream: payload,
  });
}

/**
 * Create backend unavailable error for network/database failures
 */
export function backendUnavailableError(
  backend: string,
  error: unknown,
  details?: Record<string, unknown>
): CuratorError {
  const message = error instanceof Error ? error.message : String(error);
  return new CuratorError('BACKEND_UNAVAILABLE', `${backend} unavailable: ${message}`, {
    backend,
    originalName: error instanceof Error ? error.name : undefined,
    ...details,
  });
}

function extractErrorInfo(payload: unknown): string | undefined {
  if (payload && typeof payload === 'object' && 'info' in payload) {
    const info = payload.info;
    return typeof info === 'string' ? info : undefined;
  }
  return undefined;
}
