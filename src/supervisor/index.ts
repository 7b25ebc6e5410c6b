/**
 * Supervisor Exports
 */

// Types
export * from './types';

// Supervisor Core
export { RunSupervisor, DEFAULT_DRAIN_TIMEOUT_MS } from './run-supervisor';
export type { RunSupervisorOptions } from './run-supervisor';

// Logger
export {
  SupervisorLogger,
  SUPERVISOR_LOG_CATEGORIES,
  isSupervisorLogCategory,
} from './supervisor-logger';
export type {
  SupervisorLoggerOptions,
  SupervisorLogEntry,
  SupervisorLogLevel,
  SupervisorLogCategory,
  SupervisorLogSubscriber,
} from './supervisor-logger';
