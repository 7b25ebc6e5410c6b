/**
 * Supervisor Logger
 *
 * Structured operational log of the supervisor itself (not script output):
 * run starts and stops, state transitions, spawn failures, exits, observer
 * overflow, config problems.
 *
 * - In-memory buffer for recent entries
 * - Subscriber pattern for streaming to the web UI
 * - Echo to the console with a [supervisor] prefix unless disabled
 */

import { ErrorCode } from '../errors/error-codes';
import { RunState } from '../models/run-state';

export type SupervisorLogLevel = 'info' | 'warn' | 'error' | 'debug';

export type SupervisorLogCategory =
  | 'RUN_START'
  | 'RUN_STOP'
  | 'STATE_TRANSITION'
  | 'SPAWN'
  | 'PROCESS_EXIT'
  | 'OBSERVER'
  | 'CONFIG'
  | 'ERROR';

export const SUPERVISOR_LOG_CATEGORIES: readonly SupervisorLogCategory[] = [
  'RUN_START',
  'RUN_STOP',
  'STATE_TRANSITION',
  'SPAWN',
  'PROCESS_EXIT',
  'OBSERVER',
  'CONFIG',
  'ERROR',
];

export interface SupervisorLogEntry {
  timestamp: string;
  level: SupervisorLogLevel;
  category: SupervisorLogCategory;
  message: string;
  details?: Record<string, unknown>;
  runId?: string;
}

export interface SupervisorLogSubscriber {
  onLog(entry: SupervisorLogEntry): void;
}

export interface SupervisorLoggerOptions {
  maxEntries?: number;
  /** Echo entries to the console (default: true) */
  console?: boolean;
}

export class SupervisorLogger {
  private entries: SupervisorLogEntry[] = [];
  private subscribers: Set<SupervisorLogSubscriber> = new Set();
  private maxEntries: number;
  private echo: boolean;

  constructor(options: SupervisorLoggerOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.echo = options.console ?? true;
  }

  log(
    level: SupervisorLogLevel,
    category: SupervisorLogCategory,
    message: string,
    options: {
      details?: Record<string, unknown>;
      runId?: string;
    } = {}
  ): SupervisorLogEntry {
    const entry: SupervisorLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details: options.details,
      runId: options.runId,
    };

    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    if (this.echo) {
      this.writeConsole(entry);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch (error) {
        // A broken subscriber must not take the others down
        console.error('[supervisor] Log subscriber error:', error);
      }
    }

    return entry;
  }

  // Convenience methods for each category

  logRunStart(runId: string, details: { configRef?: string; command: string; pid: number | null }): SupervisorLogEntry {
    return this.log('info', 'RUN_START', `Run ${runId} started (pid ${details.pid ?? 'unknown'})`, {
      details: { ...details },
      runId,
    });
  }

  logStopRequest(runId: string, reason: string, gracePeriodMs: number): SupervisorLogEntry {
    return this.log('info', 'RUN_STOP', `Stop requested for run ${runId}: ${reason}`, {
      details: { reason, gracePeriodMs },
      runId,
    });
  }

  logForcedKill(runId: string, gracePeriodMs: number): SupervisorLogEntry {
    return this.log('warn', 'RUN_STOP', `Run ${runId} ignored SIGTERM for ${gracePeriodMs}ms, sent SIGKILL`, {
      details: { gracePeriodMs },
      runId,
    });
  }

  logStateTransition(from: RunState, to: RunState, runId?: string): SupervisorLogEntry {
    return this.log('debug', 'STATE_TRANSITION', `${from} -> ${to}`, {
      details: { from, to },
      runId,
    });
  }

  logSpawnFailure(command: string, error: Error | unknown, runId?: string): SupervisorLogEntry {
    return this.log('error', 'SPAWN', `Failed to launch ${command}`, {
      details: { command, error: error instanceof Error ? error.message : String(error) },
      runId,
    });
  }

  logProcessExit(
    runId: string,
    state: RunState,
    details: { exitCode: number | null; signal: string | null; durationMs: number }
  ): SupervisorLogEntry {
    const level: SupervisorLogLevel = state === RunState.FAILED ? 'error' : 'info';
    const how = details.signal ? `signal ${details.signal}` : `code ${details.exitCode}`;
    return this.log(level, 'PROCESS_EXIT', `Run ${runId} ended ${state} (${how})`, {
      details: { state, ...details },
      runId,
    });
  }

  logObserverOverflow(sessionId: string, dropped: number, runId?: string): SupervisorLogEntry {
    return this.log('warn', 'OBSERVER', `Observer ${sessionId} is falling behind, dropping oldest records`, {
      details: { code: ErrorCode.E401_OBSERVER_OVERFLOW, sessionId, dropped },
      runId,
    });
  }

  logObserver(message: string, details: Record<string, unknown> = {}): SupervisorLogEntry {
    return this.log('debug', 'OBSERVER', message, { details });
  }

  logConfig(level: SupervisorLogLevel, message: string, details: Record<string, unknown> = {}): SupervisorLogEntry {
    return this.log(level, 'CONFIG', message, { details });
  }

  logError(message: string, error: Error | unknown, runId?: string): SupervisorLogEntry {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;

    return this.log('error', 'ERROR', message, {
      details: {
        error: errorMessage,
        stack: errorStack,
      },
      runId,
    });
  }

  // Retrieval methods

  getAll(): SupervisorLogEntry[] {
    return [...this.entries];
  }

  getByRunId(runId: string): SupervisorLogEntry[] {
    return this.entries.filter((e) => e.runId === runId);
  }

  getByCategory(category: SupervisorLogCategory): SupervisorLogEntry[] {
    return this.entries.filter((e) => e.category === category);
  }

  /**
   * Entries strictly after an ISO timestamp
   */
  getSince(timestamp: string): SupervisorLogEntry[] {
    return this.entries.filter((e) => e.timestamp > timestamp);
  }

  getRecent(count: number = 50): SupervisorLogEntry[] {
    return count > 0 ? this.entries.slice(-count) : [];
  }

  clear(): void {
    this.entries = [];
  }

  // Subscription methods for real-time streaming

  subscribe(subscriber: SupervisorLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }

  private writeConsole(entry: SupervisorLogEntry): void {
    const line = `[supervisor] ${entry.timestamp} ${entry.level.toUpperCase()} ${entry.category} ${entry.message}`;
    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else if (entry.level === 'info') {
      console.log(line);
    }
  }
}

export function isSupervisorLogCategory(value: unknown): value is SupervisorLogCategory {
  return SUPERVISOR_LOG_CATEGORIES.some((category) => category === value);
}
