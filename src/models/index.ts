/**
 * Model Exports
 */

export * from './run-state';
export * from './run-config';
export * from './log-record';
