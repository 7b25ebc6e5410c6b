/**
 * Log Record Model
 *
 * One classified line of script output. Immutable once created;
 * ordering by sequence is canonical within a run.
 */

export type LogLevel = 'info' | 'warning' | 'error' | 'success';

export type LogSource = 'stdout' | 'stderr';

export const LOG_LEVELS: readonly LogLevel[] = ['info', 'warning', 'error', 'success'];

/**
 * Log record delivered to observers
 */
export interface LogRecord {
  readonly runId: string;
  /** 1-based, strictly increasing within a run */
  readonly sequence: number;
  /** ISO 8601 */
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly source: LogSource;
  readonly text: string;
}

/**
 * Create a frozen log record
 */
export function createLogRecord(
  runId: string,
  sequence: number,
  level: LogLevel,
  source: LogSource,
  text: string,
  timestamp: Date = new Date()
): LogRecord {
  return Object.freeze({
    runId,
    sequence,
    timestamp: timestamp.toISOString(),
    level,
    source,
    text,
  });
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}
