/**
 * Custom Error Classes
 *
 * Standardized error types for better error handling and debugging.
 * `statusCode` is what the HTTP layer answers with when the error escapes a route.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * A referenced record does not exist
 */
export class NotFoundError extends AppError {
  constructor(message: string, public entity: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

/**
 * Error for external API failures
 */
export class ApiError extends AppError {
  constructor(
    message: string,
    public url: string,
    public statusCode: number,
    cause?: Error
  ) {
    super(message, 'API_ERROR', statusCode, cause);
  }
}

/**
 * A game's spreadsheet could not be fetched or decoded.
 * Aborts that game's ingestion only.
 */
export class SourceUnavailableError extends AppError {
  constructor(message: string, public gameId: string, public url: string, cause?: Error) {
    super(message, 'SOURCE_UNAVAILABLE', 502, cause);
  }
}

/**
 * Error for database operations
 */
export class DatabaseError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'DATABASE_ERROR', 500, cause);
  }
}

/**
 * Error for cache/Redis operations
 */
export class CacheError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'CACHE_ERROR', 500, cause);
  }
}

/**
 * Error for Kafka operations
 */
export class KafkaError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'KAFKA_ERROR', 500, cause);
  }
}

/**
 * A prediction model needs more history than is stored
 */
export class InsufficientDataError extends AppError {
  constructor(message: string, public required: number, public available: number) {
    super(message, 'INSUFFICIENT_DATA', 422);
  }
}

/**
 * Another ingestion run for the same game holds the lock
 */
export class IngestionInProgressError extends AppError {
  constructor(public gameId: string) {
    super(`Ingestion already running for ${gameId}`, 'INGESTION_IN_PROGRESS', 409);
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
