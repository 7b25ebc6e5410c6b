/**
 * Log Streaming Exports
 */

export * from './log-classifier';
export * from './log-pump';
export * from './observer-session';
export * from './broadcaster';
