/**
 * Run Supervisor
 *
 * Owns at most one run of the external script and its lifecycle:
 *
 *   IDLE -> STARTING -> RUNNING -> STOPPING -> STOPPED
 *                          |-> COMPLETED | FAILED (natural exit)
 *
 * Every state check-and-set happens synchronously within one event-loop turn,
 * so concurrent start/stop/status calls never observe a half-made transition.
 *
 * Events:
 * - 'state-changed' (StateChangedEvent)
 * - 'log' (LogRecord)
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { ErrorCode } from '../errors/error-codes';
import { SupervisorError, isSupervisorError } from '../errors/supervisor-error';
import { LogRecord } from '../models/log-record';
import {
  buildRunEnv,
  DEFAULT_GRACE_PERIOD_MS,
  RunConfig,
  RunConfigDefaults,
  validateRunConfig,
} from '../models/run-config';
import {
  RunState,
  StateChangedEvent,
  classifyExit,
  isActiveState,
  isValidTransition,
} from '../models/run-state';
import { ExitStatus, ProcessHandle } from '../process/process-handle';
import { InMemoryProfileStore, ProfileStore, loadRunConfig } from '../config/profile-store';
import { Broadcaster, SubscribeOptions } from '../stream/broadcaster';
import { LogClassifier } from '../stream/log-classifier';
import { LogPump } from '../stream/log-pump';
import { ObserverSession, ObserverSessionStats } from '../stream/observer-session';
import { SupervisorLogger } from './supervisor-logger';
import { RunStartResult, RunStatus, StopAck } from './types';

export interface RunSupervisorOptions {
  profileStore?: ProfileStore;
  logger?: SupervisorLogger;
  classifier?: LogClassifier;
  /** Defaults for fields a profile leaves out */
  defaults?: Partial<RunConfigDefaults>;
  /** Bound on waiting for output after the process exited (default: 2000) */
  drainTimeoutMs?: number;
  replayBufferSize?: number;
  observerQueueSize?: number;
  /** Process handle factory (default: new ProcessHandle()) */
  createHandle?: () => ProcessHandle;
}

export const DEFAULT_DRAIN_TIMEOUT_MS = 2000;

/** Ended runs remembered so a late stop(runId) can be acknowledged */
const RUN_HISTORY_SIZE = 50;

/**
 * Everything the supervisor tracks for one run
 */
interface RunContext {
  runId: string;
  configRef: string | null;
  config: RunConfig;
  handle: ProcessHandle | null;
  startedAt: Date | null;
  endedAt: Date | null;
  exitStatus: ExitStatus | null;
  stopRequested: boolean;
  stopReason: string | null;
  forced: boolean;
  lastError: string | null;
  finalState: RunState | null;
  /** Resolves true once RUNNING, false when the spawn failed */
  launched: Promise<boolean>;
  /** Resolves once the run reached its terminal state */
  finalized: Promise<void>;
  stopPromise: Promise<StopAck> | null;
}

/**
 * Resolve after `promise` settles or `timeoutMs` passed
 * @returns true if the promise settled first
 */
function settlesWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    promise.then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

function describeExit(status: ExitStatus): string {
  return status.signal ? `killed by ${status.signal}` : `exit code ${status.code}`;
}

export class RunSupervisor extends EventEmitter {
  private readonly profileStore: ProfileStore;
  private readonly logger: SupervisorLogger;
  private readonly classifier: LogClassifier;
  private readonly defaults: RunConfigDefaults;
  private readonly drainTimeoutMs: number;
  private readonly createHandle: () => ProcessHandle;
  private readonly broadcaster: Broadcaster;
  private readonly history: Map<string, RunState> = new Map();
  private state: RunState = RunState.IDLE;
  private run: RunContext | null = null;

  constructor(options: RunSupervisorOptions = {}) {
    super();
    this.profileStore = options.profileStore ?? new InMemoryProfileStore();
    this.logger = options.logger ?? new SupervisorLogger();
    this.classifier = options.classifier ?? new LogClassifier();
    this.defaults = {
      cwd: options.defaults?.cwd ?? process.cwd(),
      gracePeriodMs: options.defaults?.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS,
    };
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
    this.createHandle = options.createHandle ?? (() => new ProcessHandle());
    this.broadcaster = new Broadcaster({
      replayBufferSize: options.replayBufferSize,
      observerQueueSize: options.observerQueueSize,
      onOverflow: (session) => {
        this.logger.logObserverOverflow(session.id, session.dropped, this.run?.runId);
      },
    });
  }

  // ===================
  // Lifecycle operations
  // ===================

  /**
   * Start a run from a profile reference or an explicit config
   * @throws SupervisorError E201 when a run is in flight
   * @throws SupervisorError E101 / E102 when the config cannot be resolved (no state change)
   * @throws SupervisorError E301 when the script cannot be launched (state returns to IDLE)
   */
  async start(target: string | RunConfig): Promise<RunStartResult> {
    this.assertStartable();

    const configRef = typeof target === 'string' ? target : null;
    const config = typeof target === 'string'
      ? await loadRunConfig(this.profileStore, target, this.defaults)
      : validateRunConfig(target, this.defaults);

    // Another start may have won while the profile was being read
    this.assertStartable();

    let resolveLaunched: (launched: boolean) => void = () => undefined;
    let resolveFinalized: () => void = () => undefined;
    const run: RunContext = {
      runId: `run_${uuidv4()}`,
      configRef,
      config,
      handle: null,
      startedAt: null,
      endedAt: null,
      exitStatus: null,
      stopRequested: false,
      stopReason: null,
      forced: false,
      lastError: null,
      finalState: null,
      launched: new Promise<boolean>((resolve) => {
        resolveLaunched = resolve;
      }),
      finalized: new Promise<void>((resolve) => {
        resolveFinalized = resolve;
      }),
      stopPromise: null,
    };

    this.run = run;
    this.broadcaster.beginRun(run.runId);
    this.transition(RunState.STARTING);

    // Listeners of STARTING may already be waiting on run.launched
    const launch = this.launch(run, resolveFinalized);
    launch.then(() => resolveLaunched(true), () => resolveLaunched(false));
    return launch;
  }

  /**
   * Stop the active run: SIGTERM, then SIGKILL after the grace period
   * Resolves once the run reached a terminal state.
   * @throws SupervisorError E202 when nothing is running
   */
  async stop(reason: string = 'requested', runId?: string): Promise<StopAck> {
    const run = this.run;

    if (runId !== undefined && (!run || run.runId !== runId)) {
      return this.acknowledgeEnded(runId);
    }

    if (!run || !isActiveState(this.state)) {
      if (run && runId !== undefined && run.finalState !== null) {
        return this.acknowledgeEnded(runId);
      }
      throw new SupervisorError(ErrorCode.E202_NOT_RUNNING, `state is ${this.state}`);
    }

    switch (this.state) {
      case RunState.STARTING: {
        const launched = await run.launched;
        if (!launched) {
          throw new SupervisorError(ErrorCode.E202_NOT_RUNNING, 'the run failed to start');
        }
        return this.stop(reason, run.runId);
      }

      case RunState.STOPPING:
        return run.stopPromise ?? run.finalized.then(() => this.ack(run, run.forced, false));

      default:
        break;
    }

    // Drain window: the process is gone, the run is finalizing on its own
    if (run.exitStatus !== null) {
      await run.finalized;
      return this.ack(run, false, true);
    }

    run.stopRequested = true;
    run.stopReason = reason;
    this.transition(RunState.STOPPING, { reason });
    run.stopPromise = this.performStop(run);
    return run.stopPromise;
  }

  /**
   * Current status. Synchronous, never throws.
   */
  status(): RunStatus {
    const run = this.run;
    const startedAt = run?.startedAt ?? null;
    const endedAt = run?.endedAt ?? null;

    return {
      state: this.state,
      runId: run?.runId ?? null,
      configRef: run?.configRef ?? null,
      pid: run?.handle?.pid ?? null,
      startedAt: startedAt ? startedAt.toISOString() : null,
      endedAt: endedAt ? endedAt.toISOString() : null,
      elapsedMs: startedAt ? (endedAt?.getTime() ?? Date.now()) - startedAt.getTime() : 0,
      exitCode: run?.exitStatus?.code ?? null,
      signal: run?.exitStatus?.signal ?? null,
      stopReason: run?.stopReason ?? null,
      lastError: run?.lastError ?? null,
    };
  }

  /**
   * Stop any active run and disconnect every observer
   */
  async shutdown(): Promise<void> {
    if (isActiveState(this.state)) {
      try {
        await this.stop('shutdown');
      } catch (error) {
        // The run may have failed to start while we were waiting on it
        if (!isSupervisorError(error, ErrorCode.E202_NOT_RUNNING)) {
          throw error;
        }
      }
    }
    this.broadcaster.closeAll();
  }

  get currentState(): RunState {
    return this.state;
  }

  /**
   * Defaults applied to profiles that leave fields out
   */
  getDefaults(): RunConfigDefaults {
    return { ...this.defaults };
  }

  // ===================
  // Observers
  // ===================

  subscribe(options: SubscribeOptions = {}): ObserverSession {
    const session = this.broadcaster.subscribe(options);
    this.logger.logObserver(`Observer ${session.id} connected`, {
      sessionId: session.id,
      subscribers: this.broadcaster.subscriberCount,
    });
    return session;
  }

  unsubscribe(session: ObserverSession | string): void {
    this.broadcaster.unsubscribe(session);
  }

  /**
   * Replay buffer of the current run
   */
  getRecentLogs(): LogRecord[] {
    return this.broadcaster.getReplay();
  }

  getObserverStats(): ObserverSessionStats[] {
    return this.broadcaster.getSessionStats();
  }

  // ===================
  // Internals
  // ===================

  private assertStartable(): void {
    if (isActiveState(this.state)) {
      throw new SupervisorError(ErrorCode.E201_ALREADY_RUNNING, `state is ${this.state}`, {
        runId: this.run?.runId,
      });
    }
  }

  private async launch(run: RunContext, resolveFinalized: () => void): Promise<RunStartResult> {
    const { config } = run;
    const handle = this.createHandle();

    try {
      await handle.spawn(config.command, config.args, {
        cwd: config.cwd,
        env: buildRunEnv(config),
      });
    } catch (error) {
      const failure = isSupervisorError(error)
        ? error
        : new SupervisorError(
            ErrorCode.E301_SPAWN_FAILURE,
            `${config.command}: ${error instanceof Error ? error.message : String(error)}`
          );
      run.lastError = failure.message;
      this.logger.logSpawnFailure(config.command, failure, run.runId);
      this.transition(RunState.IDLE, { reason: failure.message });
      resolveFinalized();
      throw failure;
    }

    const pump = new LogPump({
      runId: run.runId,
      classifier: this.classifier,
      sink: (record) => this.handleRecord(record),
      onSinkError: (error) => {
        this.logger.logError('Log delivery failed', error, run.runId);
      },
    });
    pump.start([
      { source: 'stdout', stream: handle.stdout },
      { source: 'stderr', stream: handle.stderr },
    ]);

    run.handle = handle;
    run.startedAt = handle.startedAt ?? new Date();
    this.transition(RunState.RUNNING);
    this.logger.logRunStart(run.runId, {
      configRef: run.configRef ?? undefined,
      command: config.command,
      pid: handle.pid,
    });

    this.watch(run, handle, pump).then(resolveFinalized, (error: unknown) => {
      this.logger.logError('Run finalization failed', error, run.runId);
      resolveFinalized();
    });

    return {
      runId: run.runId,
      state: RunState.RUNNING,
      pid: handle.pid,
      startedAt: run.startedAt.toISOString(),
    };
  }

  /**
   * Wait for exit, drain the output, then settle the terminal state
   */
  private async watch(run: RunContext, handle: ProcessHandle, pump: LogPump): Promise<void> {
    const exitStatus = await handle.wait();
    run.exitStatus = exitStatus;

    const drained = await settlesWithin(pump.drained, this.drainTimeoutMs);
    if (!drained) {
      this.logger.log('warn', 'PROCESS_EXIT', `Output of run ${run.runId} still open ${this.drainTimeoutMs}ms after exit, closing it`, {
        runId: run.runId,
      });
    }
    pump.stop();
    // Helpers the script left behind must not outlive the run
    handle.sweepGroup();

    const terminal = classifyExit(exitStatus.code, run.stopRequested);
    run.endedAt = new Date();
    run.finalState = terminal;
    if (terminal === RunState.FAILED) {
      run.lastError = new SupervisorError(ErrorCode.E302_PROCESS_CRASHED, describeExit(exitStatus)).message;
    }

    this.remember(run.runId, terminal);
    this.logger.logProcessExit(run.runId, terminal, {
      exitCode: exitStatus.code,
      signal: exitStatus.signal,
      durationMs: run.startedAt ? run.endedAt.getTime() - run.startedAt.getTime() : 0,
    });
    this.transition(terminal, {
      exitCode: exitStatus.code,
      signal: exitStatus.signal,
      reason: run.stopReason ?? undefined,
    });
  }

  private async performStop(run: RunContext): Promise<StopAck> {
    const handle = run.handle;
    const gracePeriodMs = run.config.gracePeriodMs;
    this.logger.logStopRequest(run.runId, run.stopReason ?? 'requested', gracePeriodMs);

    if (handle) {
      handle.terminate();
      const exited = await settlesWithin(handle.wait(), gracePeriodMs);
      if (!exited && handle.kill()) {
        run.forced = true;
        this.logger.logForcedKill(run.runId, gracePeriodMs);
      }
    }

    await run.finalized;
    return this.ack(run, run.forced, false);
  }

  private acknowledgeEnded(runId: string): StopAck {
    const state = this.history.get(runId);
    if (state === undefined) {
      throw new SupervisorError(ErrorCode.E202_NOT_RUNNING, `run ${runId} is not active`, { runId });
    }
    return { runId, state, forced: false, alreadyExited: true };
  }

  private ack(run: RunContext, forced: boolean, alreadyExited: boolean): StopAck {
    return {
      runId: run.runId,
      state: run.finalState ?? this.state,
      forced,
      alreadyExited,
    };
  }

  private remember(runId: string, state: RunState): void {
    this.history.set(runId, state);
    if (this.history.size > RUN_HISTORY_SIZE) {
      const oldest = this.history.keys().next();
      if (!oldest.done) {
        this.history.delete(oldest.value);
      }
    }
  }

  private handleRecord(record: LogRecord): void {
    this.broadcaster.publish(record);
    this.emit('log', record);
  }

  private transition(
    to: RunState,
    extra: { exitCode?: number | null; signal?: string | null; reason?: string } = {}
  ): void {
    const from = this.state;
    if (!isValidTransition(from, to)) {
      throw new Error(`Invalid run state transition: ${from} -> ${to}`);
    }
    this.state = to;

    const runId = this.run?.runId ?? null;
    const event: StateChangedEvent = {
      runId,
      state: to,
      previous: from,
      timestamp: new Date().toISOString(),
      ...extra,
    };

    this.logger.logStateTransition(from, to, runId ?? undefined);
    this.broadcaster.publishState(event);
    this.emit('state-changed', event);
  }
}
