/**
 * Application error types
 * Each error type maps to a specific HTTP status code for the API layer,
 * and to one branch of the entry resolver for the core.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Health data provider temporarily inaccessible (device locked, network, timeout)
 * Always recoverable through the cache fallback
 */
export class ProviderUnavailableError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'PROVIDER_UNAVAILABLE', 502, details);
  }
}

/**
 * Read authorization for the health data provider is absent
 */
export class AuthorizationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'AUTHORIZATION_ABSENT', 403, details);
  }
}

/**
 * Persisted cache record is malformed - treated exactly like a missing record
 */
export class CacheCorruptionError extends AppError {
  constructor(fileName: string, details?: unknown) {
    super(`Cache record ${fileName} is corrupt`, 'CACHE_CORRUPT', 500, { fileName, details });
  }
}

/**
 * Shared storage container is missing or misconfigured
 */
export class ContainerUnavailableError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONTAINER_UNAVAILABLE', 500, details);
  }
}

/**
 * A cache write did not complete; the previous record stays in place
 */
export class CacheWriteError extends AppError {
  constructor(fileName: string, details?: unknown) {
    super(`Failed to write cache record ${fileName}`, 'CACHE_WRITE_FAILED', 500, {
      fileName,
      details,
    });
  }
}

/**
 * Notification channel rejected or could not receive a delivery request
 */
export class NotificationDeliveryError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'NOTIFICATION_FAILED', 502, details);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
