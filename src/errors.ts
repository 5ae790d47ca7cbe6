/**
 * Structured error types for the API catalog
 *
 * Provides type-safe error handling with machine-readable error codes
 * and structured error details for logging and command line output.
 */

export class CatalogError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CatalogError';
  }
}

/**
 * Raised when the raw document cannot become a SchemaDocument.
 * Aborts the whole import before anything is written.
 */
export class DecodeError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DECODE_ERROR', details);
    this.name = 'DecodeError';
  }
}

export class NotFoundError extends CatalogError {
  constructor(entity: string, key: string) {
    super(
      `${entity} not found: ${key}`,
      'NOT_FOUND',
      { entity, key }
    );
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class SourceError extends CatalogError {
  constructor(message: string, source: string, statusCode?: number) {
    super(message, 'SOURCE_ERROR', statusCode !== undefined ? { source, statusCode } : { source });
    this.name = 'SourceError';
  }
}

/**
 * Helper function to check if an error is a CatalogError
 */
export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isCatalogError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
