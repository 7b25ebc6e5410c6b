/**
 * Supervisor result types
 */

import { RunState } from '../models/run-state';

/**
 * Returned by start() once the process is running
 */
export interface RunStartResult {
  runId: string;
  state: RunState;
  pid: number | null;
  /** ISO 8601 */
  startedAt: string;
}

/**
 * Returned by stop() once the run reached a terminal state
 */
export interface StopAck {
  runId: string;
  state: RunState;
  /** SIGKILL was needed after the grace period */
  forced: boolean;
  /** The process had already exited on its own; nothing was signalled */
  alreadyExited: boolean;
}

/**
 * Snapshot of the supervisor for status queries
 */
export interface RunStatus {
  state: RunState;
  runId: string | null;
  configRef: string | null;
  pid: number | null;
  startedAt: string | null;
  endedAt: string | null;
  /** Elapsed since start; frozen once the run ended */
  elapsedMs: number;
  exitCode: number | null;
  signal: string | null;
  stopReason: string | null;
  lastError: string | null;
}
