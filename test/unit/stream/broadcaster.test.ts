import { describe, it, beforeEach } from 'mocha';
import { strict as assert } from 'assert';
import { createLogRecord, LogRecord } from '../../../src/models/log-record';
import { RunState } from '../../../src/models/run-state';
import { Broadcaster } from '../../../src/stream/broadcaster';
import { ObserverSession } from '../../../src/stream/observer-session';

function record(runId: string, sequence: number): LogRecord {
  return createLogRecord(runId, sequence, 'info', 'stdout', `line ${sequence}`);
}

function drainSequences(session: ObserverSession): number[] {
  const sequences: number[] = [];
  for (let message = session.tryNext(); message; message = session.tryNext()) {
    if (message.type === 'log') {
      sequences.push(message.record.sequence);
    }
  }
  return sequences;
}

describe('Broadcaster', () => {
  let broadcaster: Broadcaster;

  beforeEach(() => {
    broadcaster = new Broadcaster({ replayBufferSize: 5, observerQueueSize: 100 });
    broadcaster.beginRun('run_a');
  });

  it('delivers every published record to every subscriber', () => {
    const first = broadcaster.subscribe();
    const second = broadcaster.subscribe();
    broadcaster.publish(record('run_a', 1));
    broadcaster.publish(record('run_a', 2));

    assert.deepEqual(drainSequences(first), [1, 2]);
    assert.deepEqual(drainSequences(second), [1, 2]);
    assert.equal(broadcaster.totalPublished, 2);
  });

  it('replays the buffer to a late subscriber before live records', () => {
    broadcaster.publish(record('run_a', 1));
    broadcaster.publish(record('run_a', 2));
    const late = broadcaster.subscribe();
    broadcaster.publish(record('run_a', 3));

    assert.deepEqual(drainSequences(late), [1, 2, 3]);
  });

  it('keeps only the most recent records in the replay buffer', () => {
    for (let i = 1; i <= 8; i++) {
      broadcaster.publish(record('run_a', i));
    }
    assert.deepEqual(broadcaster.getReplay().map(r => r.sequence), [4, 5, 6, 7, 8]);
    assert.deepEqual(drainSequences(broadcaster.subscribe()), [4, 5, 6, 7, 8]);
  });

  it('resumes after a sequence of the current run', () => {
    for (let i = 1; i <= 4; i++) {
      broadcaster.publish(record('run_a', i));
    }
    assert.deepEqual(drainSequences(broadcaster.subscribe({ afterSequence: 2 })), [3, 4]);
    assert.deepEqual(drainSequences(broadcaster.subscribe({ afterSequence: 2, runId: 'run_a' })), [3, 4]);
  });

  it('replays everything when the resume cursor belongs to another run', () => {
    broadcaster.publish(record('run_a', 1));
    broadcaster.publish(record('run_a', 2));
    assert.deepEqual(drainSequences(broadcaster.subscribe({ afterSequence: 9, runId: 'run_old' })), [1, 2]);
  });

  it('beginRun clears the replay buffer and restarts cursors', () => {
    const session = broadcaster.subscribe();
    broadcaster.publish(record('run_a', 1));
    broadcaster.publish(record('run_a', 2));
    drainSequences(session);

    broadcaster.beginRun('run_b');
    assert.deepEqual(broadcaster.getReplay(), []);
    broadcaster.publish(record('run_b', 1));
    assert.deepEqual(drainSequences(session), [1]);
    assert.equal(broadcaster.runId, 'run_b');
  });

  it('ignores records from a run that is no longer current', () => {
    const session = broadcaster.subscribe();
    broadcaster.beginRun('run_b');
    broadcaster.publish(record('run_a', 7));
    assert.deepEqual(drainSequences(session), []);
    assert.equal(broadcaster.totalPublished, 0);
  });

  it('carries state events to subscribers', () => {
    const session = broadcaster.subscribe();
    broadcaster.publishState({
      runId: 'run_a',
      state: RunState.STOPPING,
      previous: RunState.RUNNING,
      timestamp: new Date().toISOString(),
      reason: 'requested',
    });
    const message = session.tryNext();
    assert.equal(message?.type, 'state');
    assert.equal(message?.type === 'state' ? message.event.reason : undefined, 'requested');
  });

  it('unsubscribe is idempotent and closes the session', () => {
    const session = broadcaster.subscribe();
    assert.equal(broadcaster.subscriberCount, 1);
    broadcaster.unsubscribe(session);
    broadcaster.unsubscribe(session);
    broadcaster.unsubscribe(session.id);
    assert.equal(broadcaster.subscriberCount, 0);
    assert.equal(session.isClosed, true);
  });

  it('a session closed by its consumer leaves the subscriber set', () => {
    const session = broadcaster.subscribe();
    session.close();
    assert.equal(broadcaster.subscriberCount, 0);
  });

  it('closeAll disconnects everyone', () => {
    const sessions = [broadcaster.subscribe(), broadcaster.subscribe(), broadcaster.subscribe()];
    broadcaster.closeAll();
    assert.equal(broadcaster.subscriberCount, 0);
    assert.ok(sessions.every(s => s.isClosed));
  });

  it('a stalled subscriber neither blocks publishing nor starves a fast one', async () => {
    let overflowed: string | undefined;
    const bounded = new Broadcaster({
      replayBufferSize: 10,
      observerQueueSize: 50,
      onOverflow: (session) => { overflowed = session.id; },
    });
    bounded.beginRun('run_a');
    const stalled = bounded.subscribe();
    const fast = bounded.subscribe();

    const received: number[] = [];
    const consumer = (async () => {
      for await (const message of fast) {
        if (message.type === 'log') {
          received.push(message.record.sequence);
        }
      }
    })();

    const started = Date.now();
    for (let i = 1; i <= 10000; i++) {
      bounded.publish(record('run_a', i));
      if (i % 10 === 0) {
        await new Promise(resolve => setImmediate(resolve));
      }
    }
    const elapsed = Date.now() - started;
    await new Promise(resolve => setImmediate(resolve));
    fast.close();
    await consumer;

    assert.ok(elapsed < 5000, `publishing took ${elapsed}ms`);
    assert.equal(received.length, 10000);
    assert.equal(received[9999], 10000);
    assert.equal(stalled.size, 50);
    assert.equal(stalled.dropped, 9950);
    assert.equal(overflowed, stalled.id);
    assert.deepEqual(drainSequences(stalled).slice(0, 2), [9951, 9952]);
  });
});
