import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for the health plugins
 * Extends native Error with a code, a severity and free-form context
 */
export class PluginError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'PluginError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends PluginError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * An external status tool could not be started or did not finish
 */
export class CommandError extends PluginError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.LOW, context, originalError);
    this.name = 'CommandError';
  }
}

export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';
