/**
 * Run State Model
 *
 * IDLE -> STARTING -> RUNNING -> STOPPING -> {COMPLETED, FAILED, STOPPED}
 *
 * Also: STARTING -> IDLE (spawn failure), RUNNING -> COMPLETED | FAILED (natural exit),
 * terminal -> STARTING (next run).
 */

/**
 * Lifecycle state of the supervised script
 */
export enum RunState {
  IDLE = 'IDLE',
  STARTING = 'STARTING',
  RUNNING = 'RUNNING',
  STOPPING = 'STOPPING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  STOPPED = 'STOPPED',
}

/**
 * Allowed transitions, keyed by source state
 */
const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  [RunState.IDLE]: [RunState.STARTING],
  [RunState.STARTING]: [RunState.RUNNING, RunState.IDLE],
  [RunState.RUNNING]: [RunState.STOPPING, RunState.COMPLETED, RunState.FAILED],
  [RunState.STOPPING]: [RunState.STOPPED],
  [RunState.COMPLETED]: [RunState.STARTING],
  [RunState.FAILED]: [RunState.STARTING],
  [RunState.STOPPED]: [RunState.STARTING],
};

/**
 * Check if a state is terminal (no further transitions without a new start)
 */
export function isTerminalState(state: RunState): boolean {
  return state === RunState.COMPLETED ||
         state === RunState.FAILED ||
         state === RunState.STOPPED;
}

/**
 * Check if start() may be accepted from this state
 */
export function isStartableState(state: RunState): boolean {
  return state === RunState.IDLE || isTerminalState(state);
}

/**
 * Check if a run is in flight (start is rejected with ALREADY_RUNNING)
 */
export function isActiveState(state: RunState): boolean {
  return state === RunState.STARTING ||
         state === RunState.RUNNING ||
         state === RunState.STOPPING;
}

/**
 * Check if a transition is allowed
 */
export function isValidTransition(from: RunState, to: RunState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Get the states reachable from a state
 */
export function getNextStates(from: RunState): RunState[] {
  return [...TRANSITIONS[from]];
}

/**
 * Classify a natural exit into its terminal state
 * A non-zero code or a signal nobody asked for counts as FAILED.
 */
export function classifyExit(code: number | null, stopRequested: boolean): RunState {
  if (stopRequested) {
    return RunState.STOPPED;
  }
  return code === 0 ? RunState.COMPLETED : RunState.FAILED;
}

/**
 * Emitted on every transition and delivered to observers
 */
export interface StateChangedEvent {
  runId: string | null;
  state: RunState;
  previous: RunState;
  /** ISO 8601 */
  timestamp: string;
  exitCode?: number | null;
  signal?: string | null;
  reason?: string;
}
