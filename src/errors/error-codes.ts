/**
 * Error Codes for Script Supervisor
 *
 * E1xx: Configuration errors - rejected before any state change
 * E2xx: Lifecycle errors - caller asked for a transition the current state forbids
 * E3xx: Process errors - spawning or running the external script
 * E4xx: Observer errors - delivery to log subscribers (never fatal)
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIG = 'CONFIG',
  LIFECYCLE = 'LIFECYCLE',
  PROCESS = 'PROCESS',
  OBSERVER = 'OBSERVER',
}

/**
 * Error Codes
 */
export enum ErrorCode {
  // E1xx: Configuration
  E101_INVALID_CONFIG = 'E101',
  E102_CONFIG_NOT_FOUND = 'E102',

  // E2xx: Lifecycle
  E201_ALREADY_RUNNING = 'E201',
  E202_NOT_RUNNING = 'E202',

  // E3xx: Process
  E301_SPAWN_FAILURE = 'E301',
  E302_PROCESS_CRASHED = 'E302',

  // E4xx: Observer
  E401_OBSERVER_OVERFLOW = 'E401',
}

/**
 * Error messages for each error code
 */
const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.E101_INVALID_CONFIG]: 'Run configuration is invalid',
  [ErrorCode.E102_CONFIG_NOT_FOUND]: 'Run configuration not found',
  [ErrorCode.E201_ALREADY_RUNNING]: 'A run is already in progress',
  [ErrorCode.E202_NOT_RUNNING]: 'No run is in progress',
  [ErrorCode.E301_SPAWN_FAILURE]: 'Failed to launch the script',
  [ErrorCode.E302_PROCESS_CRASHED]: 'Script exited abnormally',
  [ErrorCode.E401_OBSERVER_OVERFLOW]: 'Observer queue overflowed, oldest records dropped',
};

/**
 * Symbolic names surfaced to API clients
 */
const ERROR_NAMES: Record<ErrorCode, string> = {
  [ErrorCode.E101_INVALID_CONFIG]: 'INVALID_CONFIG',
  [ErrorCode.E102_CONFIG_NOT_FOUND]: 'CONFIG_NOT_FOUND',
  [ErrorCode.E201_ALREADY_RUNNING]: 'ALREADY_RUNNING',
  [ErrorCode.E202_NOT_RUNNING]: 'NOT_RUNNING',
  [ErrorCode.E301_SPAWN_FAILURE]: 'SPAWN_FAILURE',
  [ErrorCode.E302_PROCESS_CRASHED]: 'PROCESS_CRASHED',
  [ErrorCode.E401_OBSERVER_OVERFLOW]: 'OBSERVER_OVERFLOW',
};

/**
 * HTTP status used by the web adapter for each code
 */
const HTTP_STATUS: Record<ErrorCode, number> = {
  [ErrorCode.E101_INVALID_CONFIG]: 400,
  [ErrorCode.E102_CONFIG_NOT_FOUND]: 404,
  [ErrorCode.E201_ALREADY_RUNNING]: 409,
  [ErrorCode.E202_NOT_RUNNING]: 409,
  [ErrorCode.E301_SPAWN_FAILURE]: 500,
  [ErrorCode.E302_PROCESS_CRASHED]: 500,
  [ErrorCode.E401_OBSERVER_OVERFLOW]: 500,
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const codeStr = code.toString();
  if (codeStr.startsWith('E1')) {
    return ErrorCategory.CONFIG;
  }
  if (codeStr.startsWith('E2')) {
    return ErrorCategory.LIFECYCLE;
  }
  if (codeStr.startsWith('E3')) {
    return ErrorCategory.PROCESS;
  }
  if (codeStr.startsWith('E4')) {
    return ErrorCategory.OBSERVER;
  }
  throw new Error(`Unknown error code: ${code}`);
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code] ?? `Unknown error: ${code}`;
}

/**
 * Get the symbolic name (e.g. ALREADY_RUNNING) for an error code
 */
export function getErrorName(code: ErrorCode): string {
  return ERROR_NAMES[code] ?? 'INTERNAL_ERROR';
}

/**
 * Get the HTTP status the web adapter responds with
 */
export function getHttpStatus(code: ErrorCode): number {
  return HTTP_STATUS[code] ?? 500;
}

/**
 * Caller errors are rejected synchronously and never change run state
 */
export function isCallerError(code: ErrorCode): boolean {
  const category = getErrorCategory(code);
  return category === ErrorCategory.CONFIG || category === ErrorCategory.LIFECYCLE;
}
