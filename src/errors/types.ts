/**
 * Error types and error codes for the health plugins
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  CONFIGURATION_ERROR = 1001,

  // External command errors (2000-2999)
  COMMAND_NOT_FOUND = 2000,
  COMMAND_NOT_EXECUTABLE = 2001,
  COMMAND_TIMEOUT = 2002,
  COMMAND_FAILED = 2003,

  // Plugin dispatch errors (3000-3999)
  PLUGIN_NOT_FOUND = 3000,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  timestamp: number;
  stack?: string;
}
