/**
 * Solace Custom Error Classes
 *
 * Provides type-safe error handling across the application. Every failure a
 * capability can raise is one of these; only ValidationError, NotFoundError
 * and TurnAbortedError ever reach a caller.
 */

/**
 * Base application error
 */
export class SolaceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'SolaceError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
      timestamp: Date.now(),
    };
  }
}

/**
 * Validation error (400)
 */
export class ValidationError extends SolaceError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends SolaceError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Configuration error (500)
 */
export class ConfigurationError extends SolaceError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Embedding capability cannot be used at all (missing or rejected credential)
 */
export class EmbeddingUnavailable extends SolaceError {
  constructor(message: string, details?: unknown) {
    super(message, 'EMBEDDING_UNAVAILABLE', 503, details);
    this.name = 'EmbeddingUnavailable';
  }
}

/**
 * Transient embedding failure (network, non-2xx, malformed body, timeout)
 */
export class EmbeddingError extends SolaceError {
  constructor(message: string, details?: unknown) {
    super(message, 'EMBEDDING_ERROR', 502, details);
    this.name = 'EmbeddingError';
  }
}

/**
 * Classifier backend cannot be loaded or reached
 */
export class ClassificationUnavailable extends SolaceError {
  constructor(message: string, details?: unknown) {
    super(message, 'CLASSIFICATION_UNAVAILABLE', 503, details);
    this.name = 'ClassificationUnavailable';
  }
}

/**
 * Any other classifier invocation failure
 */
export class ClassificationError extends SolaceError {
  constructor(message: string, details?: unknown) {
    super(message, 'CLASSIFICATION_ERROR', 422, details);
    this.name = 'ClassificationError';
  }
}

export type TierFailureReason =
  | 'unavailable'
  | 'timeout'
  | 'http_error'
  | 'malformed_response'
  | 'empty_completion'
  | 'generic_reply'
  | 'provider_error';

/**
 * Internal signal that moves the suggestion pipeline to its next tier
 */
export class SuggestionTierFailure extends SolaceError {
  constructor(
    public readonly tier: string,
    public readonly reason: TierFailureReason,
    message: string,
    details?: unknown
  ) {
    super(message, 'SUGGESTION_TIER_FAILURE', 502, details);
    this.name = 'SuggestionTierFailure';
  }
}

/**
 * Every suggestion tier, including the rule-based one, failed
 */
export class AllTiersExhausted extends SolaceError {
  constructor(message: string, details?: unknown) {
    super(message, 'ALL_TIERS_EXHAUSTED', 500, details);
    this.name = 'AllTiersExhausted';
  }
}

/**
 * The caller aborted a turn before its reply was recorded
 */
export class TurnAbortedError extends SolaceError {
  constructor(message: string = 'Turn aborted before a reply was recorded') {
    super(message, 'TURN_ABORTED', 499);
    this.name = 'TurnAbortedError';
  }
}

/**
 * Type guard for SolaceError
 */
export const isSolaceError = (error: unknown): error is SolaceError => {
  return error instanceof SolaceError;
};

/**
 * Error handler utility
 */
export const handleError = (error: unknown): SolaceError => {
  if (isSolaceError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new SolaceError(
      error.message,
      'UNKNOWN_ERROR',
      500,
      { originalError: error.name }
    );
  }

  return new SolaceError(
    'An unknown error occurred',
    'UNKNOWN_ERROR',
    500,
    { originalError: String(error) }
  );
};

/**
 * Human-readable message for any thrown value
 */
export const errorMessage = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
