/**
 * Supervisor Error - Base error class for Script Supervisor
 */

import { ErrorCategory, ErrorCode, getErrorCategory, getErrorMessage, getErrorName } from './error-codes';

/**
 * Error raised by the supervisor core and surfaced by the web adapter
 */
export class SupervisorError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, context?: string, details?: Record<string, unknown>) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'SupervisorError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.details = details;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SupervisorError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SupervisorError);
    }
  }

  /**
   * Symbolic name, e.g. ALREADY_RUNNING
   */
  get errorName(): string {
    return getErrorName(this.code);
  }
}

/**
 * Type guard for SupervisorError with an optional code check
 */
export function isSupervisorError(error: unknown, code?: ErrorCode): error is SupervisorError {
  if (!(error instanceof SupervisorError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
