/**
 * Run Config Model
 *
 * The validated parameter set for one invocation of the script. A deep-frozen
 * snapshot is taken at start; a running script never sees later edits.
 */

import { ErrorCode } from '../errors/error-codes';
import { SupervisorError } from '../errors/supervisor-error';

export type SettingValue = string | number | boolean | null;

/**
 * Validated run configuration
 */
export interface RunConfig {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  /** Explicit environment overrides (win over settings) */
  readonly env: Readonly<Record<string, string>>;
  /** Script settings, injected as environment variables */
  readonly settings: Readonly<Record<string, SettingValue>>;
  /** Wait after SIGTERM before SIGKILL */
  readonly gracePeriodMs: number;
}

/**
 * Defaults applied to fields a profile leaves out
 */
export interface RunConfigDefaults {
  cwd: string;
  gracePeriodMs: number;
}

export const MAX_GRACE_PERIOD_MS = 600_000;

export const DEFAULT_GRACE_PERIOD_MS = 5_000;

/**
 * Variables that keep interpreter output unbuffered and UTF-8 encoded
 */
export const BASE_SCRIPT_ENV: Readonly<Record<string, string>> = Object.freeze({
  PYTHONUNBUFFERED: '1',
  PYTHONIOENCODING: 'utf-8',
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSettingValue(value: unknown): value is SettingValue {
  return value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value));
}

/**
 * Validate a raw profile and produce a frozen RunConfig
 * @throws SupervisorError E101 listing every violation
 */
export function validateRunConfig(raw: unknown, defaults: RunConfigDefaults): RunConfig {
  if (!isRecord(raw)) {
    throw new SupervisorError(ErrorCode.E101_INVALID_CONFIG, 'profile must be an object', {
      violations: ['profile must be an object'],
    });
  }

  const violations: string[] = [];

  const command = raw.command;
  if (typeof command !== 'string' || command.trim() === '') {
    violations.push('command is required and must be a non-empty string');
  }

  let args: string[] = [];
  if (raw.args !== undefined) {
    if (!Array.isArray(raw.args) || !raw.args.every((a): a is string => typeof a === 'string')) {
      violations.push('args must be an array of strings');
    } else {
      args = [...raw.args];
    }
  }

  let cwd = defaults.cwd;
  if (raw.cwd !== undefined) {
    if (typeof raw.cwd !== 'string' || raw.cwd.trim() === '') {
      violations.push('cwd must be a non-empty string');
    } else {
      cwd = raw.cwd;
    }
  }

  const env: Record<string, string> = {};
  if (raw.env !== undefined) {
    if (!isRecord(raw.env)) {
      violations.push('env must be an object of strings');
    } else {
      for (const [key, value] of Object.entries(raw.env)) {
        if (typeof value !== 'string') {
          violations.push(`env.${key} must be a string`);
        } else {
          env[key] = value;
        }
      }
    }
  }

  const settings: Record<string, SettingValue> = {};
  if (raw.settings !== undefined) {
    if (!isRecord(raw.settings)) {
      violations.push('settings must be an object');
    } else {
      for (const [key, value] of Object.entries(raw.settings)) {
        if (!isSettingValue(value)) {
          violations.push(`settings.${key} must be a string, finite number, boolean or null`);
        } else {
          settings[key] = value;
        }
      }
    }
  }

  let gracePeriodMs = defaults.gracePeriodMs;
  if (raw.gracePeriodMs !== undefined) {
    const value = raw.gracePeriodMs;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > MAX_GRACE_PERIOD_MS) {
      violations.push(`gracePeriodMs must be an integer between 0 and ${MAX_GRACE_PERIOD_MS}`);
    } else {
      gracePeriodMs = value;
    }
  }

  if (violations.length > 0 || typeof command !== 'string') {
    throw new SupervisorError(ErrorCode.E101_INVALID_CONFIG, violations.join('; '), { violations });
  }

  return Object.freeze({
    command: command.trim(),
    args: Object.freeze(args),
    cwd,
    env: Object.freeze(env),
    settings: Object.freeze(settings),
    gracePeriodMs,
  });
}

/**
 * Convert settings to environment variables
 * null is skipped, booleans become "true"/"false", numbers are stringified.
 */
export function settingsToEnv(settings: Readonly<Record<string, SettingValue>>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(settings)) {
    if (value === null) {
      continue;
    }
    if (typeof value === 'boolean') {
      env[key] = value ? 'true' : 'false';
    } else {
      env[key] = String(value);
    }
  }
  return env;
}

/**
 * Build the full child environment
 * Precedence (lowest first): parent env, interpreter defaults, settings, explicit env.
 */
export function buildRunEnv(
  config: RunConfig,
  parentEnv: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(parentEnv)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return {
    ...env,
    ...BASE_SCRIPT_ENV,
    ...settingsToEnv(config.settings),
    ...config.env,
  };
}
