import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { createLogRecord } from '../../../src/models/log-record';
import { RunState, StateChangedEvent } from '../../../src/models/run-state';
import { ObserverMessage, ObserverSession } from '../../../src/stream/observer-session';

function log(sequence: number, text: string = `line ${sequence}`): ObserverMessage {
  return { type: 'log', record: createLogRecord('run_a', sequence, 'info', 'stdout', text) };
}

function state(to: RunState): ObserverMessage {
  const event: StateChangedEvent = {
    runId: 'run_a',
    state: to,
    previous: RunState.RUNNING,
    timestamp: new Date().toISOString(),
  };
  return { type: 'state', event };
}

function describeMessage(message: ObserverMessage | null | undefined): string {
  if (!message) {
    return String(message);
  }
  return message.type === 'log' ? `log:${message.record.sequence}` : `state:${message.event.state}`;
}

describe('ObserverSession', () => {
  it('rejects a non-positive capacity', () => {
    assert.throws(() => new ObserverSession({ capacity: 0 }), RangeError);
    assert.throws(() => new ObserverSession({ capacity: 1.5 }), RangeError);
  });

  it('assigns an id unless one is given', () => {
    assert.match(new ObserverSession({ capacity: 1 }).id, /^obs_[0-9a-f-]{36}$/);
    assert.equal(new ObserverSession({ capacity: 1, id: 'fixed' }).id, 'fixed');
  });

  it('delivers queued messages in order', async () => {
    const session = new ObserverSession({ capacity: 10 });
    session.enqueue(log(1));
    session.enqueue(state(RunState.STOPPING));
    session.enqueue(log(2));

    assert.equal(describeMessage(await session.next()), 'log:1');
    assert.equal(describeMessage(await session.next()), 'state:STOPPING');
    assert.equal(describeMessage(await session.next()), 'log:2');
    assert.equal(session.cursor, 2);
  });

  it('hands a message straight to a waiting reader', async () => {
    const session = new ObserverSession({ capacity: 10 });
    const pending = session.next();
    session.enqueue(log(1));
    assert.equal(describeMessage(await pending), 'log:1');
    assert.equal(session.size, 0);
  });

  it('ignores duplicate or out-of-order sequences', () => {
    const session = new ObserverSession({ capacity: 10 });
    assert.equal(session.enqueue(log(2)), true);
    assert.equal(session.enqueue(log(2)), false);
    assert.equal(session.enqueue(log(1)), false);
    assert.equal(session.size, 1);
  });

  it('resetCursor accepts sequence 1 again', () => {
    const session = new ObserverSession({ capacity: 10 });
    session.enqueue(log(5));
    session.tryNext();
    session.resetCursor();
    assert.equal(session.cursor, 0);
    assert.equal(session.enqueue(log(1)), true);
  });

  describe('overflow', () => {
    it('drops the oldest log message and counts it', () => {
      const overflows: string[] = [];
      const session = new ObserverSession({
        capacity: 3,
        onOverflow: (s) => overflows.push(s.id),
      });
      for (let i = 1; i <= 5; i++) {
        session.enqueue(log(i));
      }

      assert.equal(session.size, 3);
      assert.equal(session.dropped, 2);
      assert.equal(overflows.length, 1);
      assert.deepEqual(
        [session.tryNext(), session.tryNext(), session.tryNext()].map(describeMessage),
        ['log:3', 'log:4', 'log:5']
      );
    });

    it('evicts log messages before state messages', () => {
      const session = new ObserverSession({ capacity: 2 });
      session.enqueue(state(RunState.STOPPING));
      session.enqueue(log(1));
      session.enqueue(log(2));

      assert.deepEqual(
        [session.tryNext(), session.tryNext()].map(describeMessage),
        ['state:STOPPING', 'log:2']
      );
    });

    it('evicts the oldest state message when no log message is queued', () => {
      const session = new ObserverSession({ capacity: 1 });
      session.enqueue(state(RunState.STOPPING));
      session.enqueue(state(RunState.STOPPED));
      assert.equal(describeMessage(session.tryNext()), 'state:STOPPED');
      assert.equal(session.dropped, 1);
    });

    it('reports a new overflow episode after the queue drained', () => {
      let episodes = 0;
      const session = new ObserverSession({ capacity: 1, onOverflow: () => episodes++ });
      session.enqueue(log(1));
      session.enqueue(log(2));
      session.enqueue(log(3));
      assert.equal(episodes, 1);

      session.tryNext();
      session.enqueue(log(4));
      session.enqueue(log(5));
      assert.equal(episodes, 2);
      assert.equal(session.dropped, 3);
    });
  });

  describe('close', () => {
    it('resolves a pending reader with null and rejects new messages', async () => {
      let closedWith: string | undefined;
      const session = new ObserverSession({ capacity: 5, onClose: (s) => { closedWith = s.id; } });
      const pending = session.next();
      session.close();

      assert.equal(await pending, null);
      assert.equal(await session.next(), null);
      assert.equal(session.enqueue(log(1)), false);
      assert.equal(closedWith, session.id);
      assert.equal(session.isClosed, true);
    });

    it('is idempotent', () => {
      let closes = 0;
      const session = new ObserverSession({ capacity: 5, onClose: () => closes++ });
      session.close();
      session.close();
      assert.equal(closes, 1);
    });

    it('ends async iteration', async () => {
      const session = new ObserverSession({ capacity: 5 });
      session.enqueue(log(1));
      session.enqueue(log(2));
      const seen: string[] = [];
      const consumer = (async () => {
        for await (const message of session) {
          seen.push(describeMessage(message));
          if (seen.length === 2) {
            session.close();
          }
        }
      })();
      await consumer;
      assert.deepEqual(seen, ['log:1', 'log:2']);
    });
  });

  it('allows only one pending reader', async () => {
    const session = new ObserverSession({ capacity: 5 });
    const first = session.next();
    await assert.rejects(session.next(), /already has a pending reader/);
    session.close();
    assert.equal(await first, null);
  });

  it('getStats reports queue state', () => {
    const session = new ObserverSession({ capacity: 1, id: 'obs_stats' });
    session.enqueue(log(1));
    session.enqueue(log(2));
    const stats = session.getStats();
    assert.equal(stats.id, 'obs_stats');
    assert.equal(stats.queued, 1);
    assert.equal(stats.dropped, 1);
    assert.equal(stats.lastDeliveredSequence, 0);
    assert.equal(stats.closed, false);
  });
});
