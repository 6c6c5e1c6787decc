import { Logger } from '@nestjs/common';

/**
 * Base class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get a string representation of the error
   */
  toString(): string {
    return `${this.name}(${this.code}): ${this.message}`;
  }

  /**
   * Convert to an object for logging or API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      metadata: this.metadata,
      stack: this.stack,
    };
  }
}

/**
 * Error for RPC-related issues
 */
export class RpcError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    public readonly method?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'RPC_ERROR', { ...metadata, endpoint, method });
  }
}

/**
 * Error for compact target values that cannot be decoded
 */
export class MalformedCompactTargetError extends AppError {
  constructor(
    message: string,
    public readonly bits?: unknown,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'MALFORMED_COMPACT_TARGET', { ...metadata, bits });
  }
}

/**
 * Error for a difficulty computed against a zero target
 */
export class DivisionByZeroError extends AppError {
  constructor(
    message: string,
    public readonly bits?: number,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'DIVISION_BY_ZERO', { ...metadata, bits });
  }
}

/**
 * Error for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly configKey?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'CONFIGURATION_ERROR', { ...metadata, configKey });
  }
}

/**
 * Error for validation issues
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    metadata?: Record<string, unknown>,
  ) {
    super(message, 'VALIDATION_ERROR', { ...metadata, field, value });
  }
}

/**
 * Extract a message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Utility class for consistent error handling across the application
 */
export class ErrorHandler {
  private readonly logger: Logger;

  constructor(context: string) {
    this.logger = new Logger(context);
  }

  /**
   * Log and wrap an error if it's not already an AppError
   */
  handleError(error: unknown, defaultMessage = 'An unexpected error occurred', metadata?: Record<string, unknown>): AppError {
    if (error instanceof AppError) {
      this.logger.error(`${error.name}(${error.code}): ${error.message}`, error.stack);
      return error;
    }

    const message = error instanceof Error && error.message ? error.message : defaultMessage;
    const appError = new AppError(message, 'UNKNOWN_ERROR', {
      ...metadata,
      originalError: String(error),
    });

    this.logger.error(`${appError.name}(${appError.code}): ${appError.message}`, appError.stack);
    return appError;
  }

  /**
   * Create and log a specific RPC error
   */
  handleRpcError(message: string, endpoint?: string, method?: string, metadata?: Record<string, unknown>): RpcError {
    const error = new RpcError(message, endpoint, method, metadata);
    this.logger.error(
      `${error.name}(${error.code}): ${message} [endpoint: ${endpoint || 'unknown'}, method: ${method || 'unknown'}]`,
      error.stack,
    );
    return error;
  }

  /**
   * Create and log a specific validation error
   */
  handleValidationError(
    message: string,
    field?: string,
    value?: unknown,
    metadata?: Record<string, unknown>,
  ): ValidationError {
    const error = new ValidationError(message, field, value, metadata);
    this.logger.error(`${error.name}(${error.code}): ${message} [field: ${field || 'unknown'}]`, error.stack);
    return error;
  }
}
