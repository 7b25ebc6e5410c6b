/**
 * Process Handle
 *
 * Owns exactly one OS process invocation:
 * - spawn with an injected environment (at most once per instance)
 * - stdout / stderr as independent byte streams
 * - wait() for the exit status without blocking the event loop
 * - terminate() (SIGTERM) and kill() (SIGKILL), both no-ops once the process exited
 *
 * On POSIX the child leads its own process group and signals go to the whole
 * group, so helpers the script launched do not outlive the run.
 */

import { spawn, ChildProcess } from 'child_process';
import { Readable } from 'stream';
import { ErrorCode } from '../errors/error-codes';
import { SupervisorError } from '../errors/supervisor-error';

/**
 * Exit status of a finished process
 */
export interface ExitStatus {
  /** Exit code, null when terminated by a signal */
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface SpawnOptions {
  cwd?: string;
  env?: Record<string, string>;
}

export interface ProcessHandleOptions {
  /** Signal the whole process group (default: true except on Windows) */
  useProcessGroup?: boolean;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class ProcessHandle {
  private child: ChildProcess | null = null;
  private spawnAttempted = false;
  private exitPromise: Promise<ExitStatus> | null = null;
  private status: ExitStatus | null = null;
  private startTime: Date | null = null;
  private terminateSent = false;
  private killSent = false;
  private lastError: Error | null = null;
  private readonly useProcessGroup: boolean;

  constructor(options: ProcessHandleOptions = {}) {
    this.useProcessGroup = options.useProcessGroup ?? process.platform !== 'win32';
  }

  /**
   * Launch the process
   * Resolves once the OS reports the process running.
   * @throws SupervisorError E301 when the executable is missing or unlaunchable
   */
  async spawn(command: string, args: readonly string[] = [], options: SpawnOptions = {}): Promise<void> {
    if (this.spawnAttempted) {
      throw new Error('ProcessHandle.spawn() may only be called once');
    }
    this.spawnAttempted = true;

    let child: ChildProcess;
    try {
      child = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: this.useProcessGroup,
        windowsHide: true,
      });
    } catch (error) {
      throw new SupervisorError(
        ErrorCode.E301_SPAWN_FAILURE,
        `${command}: ${error instanceof Error ? error.message : String(error)}`,
        { command }
      );
    }

    this.exitPromise = new Promise<ExitStatus>((resolve) => {
      child.once('exit', (code, signal) => {
        this.status = { code, signal };
        resolve(this.status);
      });
    });

    try {
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', () => {
          child.off('error', reject);
          resolve();
        });
        child.once('error', reject);
      });
    } catch (error) {
      const code = errnoCode(error);
      throw new SupervisorError(
        ErrorCode.E301_SPAWN_FAILURE,
        `${command}: ${error instanceof Error ? error.message : String(error)}`,
        { command, errno: code }
      );
    }

    // Errors after spawn (e.g. failed signal delivery) must not crash the service
    child.on('error', (error) => {
      this.lastError = error;
    });

    this.child = child;
    this.startTime = new Date();
  }

  get pid(): number | null {
    return this.child?.pid ?? null;
  }

  get startedAt(): Date | null {
    return this.startTime;
  }

  /**
   * Exit status, null while the process is alive
   */
  get exitStatus(): ExitStatus | null {
    return this.status ? { ...this.status } : null;
  }

  get hasExited(): boolean {
    return this.status !== null;
  }

  get isAlive(): boolean {
    return this.child !== null && this.status === null;
  }

  get error(): Error | null {
    return this.lastError;
  }

  get stdout(): Readable {
    const stream = this.child?.stdout;
    if (!stream) {
      throw new Error('Process has not been spawned');
    }
    return stream;
  }

  get stderr(): Readable {
    const stream = this.child?.stderr;
    if (!stream) {
      throw new Error('Process has not been spawned');
    }
    return stream;
  }

  /**
   * Resolve with the exit status once the process exits
   */
  wait(): Promise<ExitStatus> {
    if (!this.exitPromise || !this.child) {
      return Promise.reject(new Error('Process has not been spawned'));
    }
    return this.exitPromise;
  }

  /**
   * Send the graceful stop signal
   * @returns true if a signal was sent
   */
  terminate(): boolean {
    if (!this.isAlive || this.terminateSent) {
      return false;
    }
    this.terminateSent = true;
    return this.signal('SIGTERM');
  }

  /**
   * Forced termination
   * @returns true if a signal was sent
   */
  kill(): boolean {
    if (!this.isAlive || this.killSent) {
      return false;
    }
    this.killSent = true;
    return this.signal('SIGKILL');
  }

  /**
   * SIGKILL whatever is left of the process group after the leader exited
   * (helpers still holding the output pipes open)
   */
  sweepGroup(): boolean {
    const pid = this.child?.pid;
    if (!this.useProcessGroup || pid === undefined || !this.hasExited) {
      return false;
    }
    try {
      process.kill(-pid, 'SIGKILL');
      return true;
    } catch (error) {
      if (errnoCode(error) !== 'ESRCH') {
        this.lastError = error instanceof Error ? error : new Error(String(error));
      }
      return false;
    }
  }

  get forceKilled(): boolean {
    return this.killSent;
  }

  private signal(sig: NodeJS.Signals): boolean {
    const child = this.child;
    if (!child || child.pid === undefined) {
      return false;
    }
    if (this.useProcessGroup) {
      try {
        process.kill(-child.pid, sig);
        return true;
      } catch (error) {
        // Group already gone or not permitted: fall back to the leader itself
        if (errnoCode(error) !== 'ESRCH') {
          this.lastError = error instanceof Error ? error : new Error(String(error));
        }
      }
    }
    return child.kill(sig);
  }
}
