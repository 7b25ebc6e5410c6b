/**
 * Observer Session
 *
 * One live log subscriber. Owns a bounded outbound queue; when the queue is
 * full the oldest queued log message is evicted (state messages are only
 * evicted when no log message is left). The producer never waits on a session.
 *
 * Consumption is pull-based and single-consumer:
 *   for await (const message of session) { ... }
 */

import { v4 as uuidv4 } from 'uuid';
import { LogRecord } from '../models/log-record';
import { StateChangedEvent } from '../models/run-state';

export type ObserverMessage =
  | { type: 'log'; record: LogRecord }
  | { type: 'state'; event: StateChangedEvent };

export interface ObserverSessionOptions {
  /** Maximum queued messages before drop-oldest eviction */
  capacity: number;
  id?: string;
  /** Called at the first eviction of an overflow episode */
  onOverflow?: (session: ObserverSession) => void;
  onClose?: (session: ObserverSession) => void;
}

export interface ObserverSessionStats {
  id: string;
  connectedAt: string;
  queued: number;
  dropped: number;
  lastDeliveredSequence: number;
  closed: boolean;
}

export class ObserverSession implements AsyncIterable<ObserverMessage> {
  readonly id: string;
  readonly connectedAt: Date = new Date();
  private readonly capacity: number;
  private readonly onOverflow?: (session: ObserverSession) => void;
  private readonly onClose?: (session: ObserverSession) => void;
  private queue: ObserverMessage[] = [];
  private waiter: ((message: ObserverMessage | null) => void) | null = null;
  private closed = false;
  private overflowing = false;
  private droppedCount = 0;
  private lastEnqueuedSequence = 0;
  private lastDeliveredSequence = 0;

  constructor(options: ObserverSessionOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${options.capacity}`);
    }
    this.id = options.id ?? `obs_${uuidv4()}`;
    this.capacity = options.capacity;
    this.onOverflow = options.onOverflow;
    this.onClose = options.onClose;
  }

  /**
   * Queue a message for delivery. Never blocks.
   * @returns false when the session is closed or the record was already queued
   */
  enqueue(message: ObserverMessage): boolean {
    if (this.closed) {
      return false;
    }

    if (message.type === 'log') {
      if (message.record.sequence <= this.lastEnqueuedSequence) {
        return false;
      }
      this.lastEnqueuedSequence = message.record.sequence;
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      this.markDelivered(message);
      resolve(message);
      return true;
    }

    if (this.queue.length >= this.capacity) {
      this.evictOldest();
    }
    this.queue.push(message);
    return true;
  }

  /**
   * Next message, waiting for one if the queue is empty
   * Resolves null once the session is closed.
   */
  next(): Promise<ObserverMessage | null> {
    const message = this.tryNext();
    if (message) {
      return Promise.resolve(message);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    if (this.waiter) {
      return Promise.reject(new Error(`Observer session ${this.id} already has a pending reader`));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Dequeue without waiting
   */
  tryNext(): ObserverMessage | undefined {
    const message = this.queue.shift();
    if (message) {
      this.markDelivered(message);
    }
    if (this.queue.length === 0) {
      this.overflowing = false;
    }
    return message;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ObserverMessage, void, undefined> {
    while (true) {
      const message = await this.next();
      if (message === null) {
        return;
      }
      yield message;
    }
  }

  /**
   * Forget the sequence cursor; called when a new run restarts numbering
   */
  resetCursor(): void {
    this.lastEnqueuedSequence = 0;
    this.lastDeliveredSequence = 0;
  }

  /**
   * Close the session. Idempotent. Pending messages are discarded.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.queue = [];
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
    this.onClose?.(this);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Sequence of the last log record handed to the consumer
   */
  get cursor(): number {
    return this.lastDeliveredSequence;
  }

  getStats(): ObserverSessionStats {
    return {
      id: this.id,
      connectedAt: this.connectedAt.toISOString(),
      queued: this.queue.length,
      dropped: this.droppedCount,
      lastDeliveredSequence: this.lastDeliveredSequence,
      closed: this.closed,
    };
  }

  private markDelivered(message: ObserverMessage): void {
    if (message.type === 'log') {
      this.lastDeliveredSequence = message.record.sequence;
    }
  }

  private evictOldest(): void {
    const logIndex = this.queue.findIndex(m => m.type === 'log');
    this.queue.splice(logIndex === -1 ? 0 : logIndex, 1);
    this.droppedCount++;
    if (!this.overflowing) {
      this.overflowing = true;
      this.onOverflow?.(this);
    }
  }
}
