/**
 * Short URLs Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Underlying persistence unavailable or failed.
 */
export interface StoreError {
  readonly type: 'StoreError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Malformed or missing input.
 */
export interface ValidationError {
  readonly type: 'ValidationError';
  readonly message: string;
  readonly field: string;
}

/**
 * Unknown short code.
 */
export interface NotFoundError {
  readonly type: 'NotFoundError';
  readonly message: string;
  readonly shortCode: string;
}

/**
 * Every proposed code collided with an existing record.
 * Transient: the whole request can be retried.
 */
export interface GenerationExhaustedError {
  readonly type: 'GenerationExhaustedError';
  readonly message: string;
  readonly attempts: number;
  readonly retryable: true;
}

/**
 * Insert rejected because the short code is taken.
 * Consumed by the shorten retry loop, never returned to callers.
 */
export interface DuplicateCodeError {
  readonly type: 'DuplicateCodeError';
  readonly message: string;
  readonly shortCode: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

/**
 * All possible short URL errors.
 */
export type ShortUrlError =
  | StoreError
  | ValidationError
  | NotFoundError
  | GenerationExhaustedError
  | DuplicateCodeError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a StoreError.
 */
export const createStoreError = (message: string, cause?: unknown): StoreError => ({
  type: 'StoreError',
  message,
  retryable: true,
  cause,
});

/**
 * Creates a ValidationError.
 */
export const createValidationError = (field: string, message: string): ValidationError => ({
  type: 'ValidationError',
  message,
  field,
});

/**
 * Creates a NotFoundError.
 */
export const createNotFoundError = (shortCode: string): NotFoundError => ({
  type: 'NotFoundError',
  message: `Short code '${shortCode}' not found`,
  shortCode,
});

/**
 * Creates a GenerationExhaustedError.
 */
export const createGenerationExhaustedError = (attempts: number): GenerationExhaustedError => ({
  type: 'GenerationExhaustedError',
  message: `Unable to generate a unique short code after ${String(attempts)} attempts`,
  attempts,
  retryable: true,
});

/**
 * Creates a DuplicateCodeError.
 */
export const createDuplicateCodeError = (shortCode: string): DuplicateCodeError => ({
  type: 'DuplicateCodeError',
  message: `Short code '${shortCode}' already exists`,
  shortCode,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps error types to HTTP status codes.
 */
export const SHORT_URL_ERROR_HTTP_STATUS: Record<ShortUrlError['type'], number> = {
  StoreError: 500,
  ValidationError: 400,
  NotFoundError: 404,
  GenerationExhaustedError: 503,
  DuplicateCodeError: 500,
};

/**
 * Gets HTTP status code for an error.
 */
export const getHttpStatusForError = (error: ShortUrlError): number => {
  return SHORT_URL_ERROR_HTTP_STATUS[error.type];
};

/**
 * Narrows an error to the duplicate-code case.
 */
export const isDuplicateCodeError = (error: ShortUrlError): error is DuplicateCodeError => {
  return error.type === 'DuplicateCodeError';
};

/**
 * Server faults are logged as errors; client faults are not.
 */
export const isServerFault = (error: ShortUrlError): boolean => {
  return getHttpStatusForError(error) >= 500;
};
