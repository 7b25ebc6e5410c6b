/**
 * Broadcaster
 *
 * Fan-out of log records to every live ObserverSession.
 *
 * - publish() appends to a small replay buffer and enqueues into every session;
 *   it never waits on a session (slow observers lose their own oldest records)
 * - subscribe() replays the buffer first, then delivers live records
 * - beginRun() clears the replay buffer and resets session cursors because
 *   sequence numbers restart with each run
 */

import { LogRecord } from '../models/log-record';
import { StateChangedEvent } from '../models/run-state';
import { ObserverSession, ObserverSessionStats } from './observer-session';

export interface BroadcasterOptions {
  /** Records kept for late joiners (default: 200) */
  replayBufferSize?: number;
  /** Per-session queue bound (default: 1000) */
  observerQueueSize?: number;
  /** Called at the start of each overflow episode of a session */
  onOverflow?: (session: ObserverSession) => void;
}

export interface SubscribeOptions {
  /** Replay only records after this sequence (resume after reconnect) */
  afterSequence?: number;
  /** Run the afterSequence cursor belongs to; ignored when it is not the current run */
  runId?: string;
}

export const DEFAULT_REPLAY_BUFFER_SIZE = 200;
export const DEFAULT_OBSERVER_QUEUE_SIZE = 1000;

export class Broadcaster {
  private readonly replayBufferSize: number;
  private readonly observerQueueSize: number;
  private readonly onOverflow?: (session: ObserverSession) => void;
  private readonly sessions: Map<string, ObserverSession> = new Map();
  private replay: LogRecord[] = [];
  private currentRunId: string | null = null;
  private publishedCount = 0;

  constructor(options: BroadcasterOptions = {}) {
    this.replayBufferSize = options.replayBufferSize ?? DEFAULT_REPLAY_BUFFER_SIZE;
    this.observerQueueSize = options.observerQueueSize ?? DEFAULT_OBSERVER_QUEUE_SIZE;
    this.onOverflow = options.onOverflow;
  }

  /**
   * Start a new run: empty replay buffer, reset cursors
   */
  beginRun(runId: string): void {
    this.currentRunId = runId;
    this.replay = [];
    for (const session of this.sessions.values()) {
      session.resetCursor();
    }
  }

  /**
   * Publish a log record to every session
   * Records from a run other than the current one are ignored.
   */
  publish(record: LogRecord): void {
    if (this.currentRunId !== null && record.runId !== this.currentRunId) {
      return;
    }

    this.replay.push(record);
    if (this.replay.length > this.replayBufferSize) {
      this.replay.splice(0, this.replay.length - this.replayBufferSize);
    }
    this.publishedCount++;

    const message = { type: 'log' as const, record };
    for (const session of this.sessions.values()) {
      session.enqueue(message);
    }
  }

  /**
   * Publish a state transition to every session
   */
  publishState(event: StateChangedEvent): void {
    const message = { type: 'state' as const, event };
    for (const session of this.sessions.values()) {
      session.enqueue(message);
    }
  }

  /**
   * Attach a new observer; it receives the replay buffer before live records
   */
  subscribe(options: SubscribeOptions = {}): ObserverSession {
    const session = new ObserverSession({
      capacity: this.observerQueueSize,
      onOverflow: this.onOverflow,
      onClose: (closed) => {
        this.sessions.delete(closed.id);
      },
    });

    const sameRun = options.runId === undefined || options.runId === this.currentRunId;
    const after = sameRun ? options.afterSequence ?? 0 : 0;
    for (const record of this.replay) {
      if (record.sequence > after) {
        session.enqueue({ type: 'log', record });
      }
    }

    this.sessions.set(session.id, session);
    return session;
  }

  /**
   * Detach an observer. Idempotent.
   */
  unsubscribe(session: ObserverSession | string): void {
    const target = typeof session === 'string' ? this.sessions.get(session) : session;
    if (!target) {
      return;
    }
    this.sessions.delete(target.id);
    target.close();
  }

  /**
   * Close every session (service shutdown)
   */
  closeAll(): void {
    for (const session of [...this.sessions.values()]) {
      this.unsubscribe(session);
    }
  }

  getReplay(): LogRecord[] {
    return [...this.replay];
  }

  get runId(): string | null {
    return this.currentRunId;
  }

  get subscriberCount(): number {
    return this.sessions.size;
  }

  /**
   * Records published since construction (all runs)
   */
  get totalPublished(): number {
    return this.publishedCount;
  }

  getSessionStats(): ObserverSessionStats[] {
    return [...this.sessions.values()].map(s => s.getStats());
  }
}
