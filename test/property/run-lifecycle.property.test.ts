/**
 * Property-based tests for the run lifecycle
 *
 * - Transitions only follow the state table
 * - At most one script process exists at any time, whatever the interleaving
 *   of start / stop / natural exit
 * - Every start and stop either succeeds or fails with ALREADY_RUNNING / NOT_RUNNING
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import * as fc from 'fast-check';
import { ErrorCode } from '../../src/errors/error-codes';
import { isSupervisorError } from '../../src/errors/supervisor-error';
import { validateRunConfig } from '../../src/models/run-config';
import {
  RunState,
  StateChangedEvent,
  classifyExit,
  getNextStates,
  isActiveState,
  isStartableState,
  isTerminalState,
  isValidTransition,
} from '../../src/models/run-state';
import { RunSupervisor } from '../../src/supervisor/run-supervisor';
import { FakeProcessHandle, createTracker } from '../helpers/fake-process-handle';
import { silentLogger } from '../helpers/scripts';

const MIN_RUNS = 100;

const ALL_STATES = Object.values(RunState);

type Command = 'start' | 'stop' | 'exit-ok' | 'exit-fail' | 'tick';

const commandArb = fc.constantFrom<Command>('start', 'stop', 'exit-ok', 'exit-fail', 'tick');

function tick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('Run lifecycle (Property-based)', () => {
  describe('state table', () => {
    it('every random walk from IDLE stays within the table', () => {
      fc.assert(
        fc.property(fc.array(fc.nat(), { maxLength: 50 }), (choices) => {
          let state = RunState.IDLE;
          for (const choice of choices) {
            const next = getNextStates(state);
            const to = next[choice % next.length];
            assert.ok(isValidTransition(state, to));
            if (isTerminalState(state)) {
              assert.equal(to, RunState.STARTING);
            }
            state = to;
          }
          return true;
        }),
        { numRuns: MIN_RUNS }
      );
    });

    it('a state is startable exactly when no run is in flight', () => {
      for (const state of ALL_STATES) {
        assert.equal(isStartableState(state), !isActiveState(state), state);
      }
    });

    it('exit classification depends only on the stop request and the code', () => {
      fc.assert(
        fc.property(fc.option(fc.integer({ min: 0, max: 255 }), { nil: null }), fc.boolean(), (code, stopRequested) => {
          const state = classifyExit(code, stopRequested);
          if (stopRequested) {
            return state === RunState.STOPPED;
          }
          return state === (code === 0 ? RunState.COMPLETED : RunState.FAILED);
        }),
        { numRuns: MIN_RUNS }
      );
    });
  });

  describe('supervisor under random interleavings', () => {
    it('never runs two processes and only makes valid transitions', async function () {
      this.timeout(120000);

      await fc.assert(
        fc.asyncProperty(
          fc.array(commandArb, { minLength: 1, maxLength: 15 }),
          fc.boolean(),
          async (commands, ignoresTerminate) => {
            const tracker = createTracker();
            const handles: FakeProcessHandle[] = [];
            const logger = silentLogger();
            const supervisor = new RunSupervisor({
              logger,
              drainTimeoutMs: 50,
              createHandle: () => {
                const handle = new FakeProcessHandle(tracker, ignoresTerminate);
                handles.push(handle);
                return handle;
              },
            });
            const config = validateRunConfig({ command: 'fake-script', gracePeriodMs: 5 }, {
              cwd: process.cwd(),
              gracePeriodMs: 5,
            });

            const badTransitions: string[] = [];
            let last = RunState.IDLE;
            supervisor.on('state-changed', (event: StateChangedEvent) => {
              if (event.previous !== last || !isValidTransition(event.previous, event.state)) {
                badTransitions.push(`${last}: ${event.previous} -> ${event.state}`);
              }
              last = event.state;
            });

            const unexpected: unknown[] = [];
            const pending: Promise<void>[] = [];
            const expectOnly = (promise: Promise<unknown>, ...codes: ErrorCode[]): void => {
              pending.push(promise.then(
                () => undefined,
                (error: unknown) => {
                  if (!codes.some(code => isSupervisorError(error, code))) {
                    unexpected.push(error);
                  }
                }
              ));
            };

            for (const command of commands) {
              const current = handles[handles.length - 1];
              switch (command) {
                case 'start':
                  expectOnly(supervisor.start(config), ErrorCode.E201_ALREADY_RUNNING);
                  break;
                case 'stop':
                  expectOnly(supervisor.stop(), ErrorCode.E202_NOT_RUNNING);
                  break;
                case 'exit-ok':
                  current?.finish(0);
                  break;
                case 'exit-fail':
                  current?.finish(1);
                  break;
                case 'tick':
                  await tick();
                  break;
              }
            }

            await supervisor.shutdown();
            await Promise.all(pending);

            assert.deepEqual(unexpected, []);
            assert.deepEqual(badTransitions, []);
            assert.equal(tracker.overlaps, 0);
            assert.equal(tracker.alive, 0);
            assert.equal(isActiveState(supervisor.currentState), false);
            assert.deepEqual(logger.getByCategory('ERROR'), []);
          }
        ),
        { numRuns: MIN_RUNS }
      );
    });
  });
});
