/**
 * Command line argument parsing
 */

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
    Object.setPrototypeOf(this, CliUsageError.prototype);
  }
}

/**
 * Options shared by every command
 */
export interface CommonArguments {
  configPath?: string;
  profilesPath?: string;
}

export interface ServeArguments extends CommonArguments {
  port?: number;
  host?: string;
}

export interface RunArguments extends CommonArguments {
  configRef: string;
  /** Print records as JSON lines instead of text */
  json?: boolean;
}

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Consume a shared option at args[i]
 * @returns index of the last consumed argument, or -1 when args[i] is not shared
 */
function parseCommon(args: string[], i: number, result: CommonArguments): number {
  const arg = args[i];
  if (arg === '--config') {
    result.configPath = requireValue(args, i, arg);
    return i + 1;
  }
  if (arg === '--profiles') {
    result.profilesPath = requireValue(args, i, arg);
    return i + 1;
  }
  return -1;
}

/**
 * Parse `serve` arguments
 */
export function parseServeArgs(args: string[]): ServeArguments {
  const result: ServeArguments = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const consumed = parseCommon(args, i, result);
    if (consumed !== -1) {
      i = consumed;
    } else if (arg === '--port') {
      const portStr = requireValue(args, i++, arg);
      const port = Number(portStr);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new CliUsageError(`Invalid port: ${portStr}. Must be a number between 0 and 65535.`);
      }
      result.port = port;
    } else if (arg === '--host') {
      result.host = requireValue(args, i++, arg);
    } else {
      throw new CliUsageError(`Unknown option for serve: ${arg}`);
    }
  }

  return result;
}

/**
 * Parse `run <configRef>` arguments
 */
export function parseRunArgs(args: string[]): RunArguments {
  let configRef: string | undefined;
  const common: CommonArguments = {};
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const consumed = parseCommon(args, i, common);
    if (consumed !== -1) {
      i = consumed;
    } else if (arg === '--json') {
      json = true;
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option for run: ${arg}`);
    } else if (configRef === undefined) {
      configRef = arg;
    } else {
      throw new CliUsageError(`Unexpected argument: ${arg}`);
    }
  }

  if (configRef === undefined) {
    throw new CliUsageError('run requires a profile name');
  }
  return { ...common, configRef, json };
}

/**
 * Parse `profiles` arguments
 */
export function parseProfilesArgs(args: string[]): CommonArguments {
  const result: CommonArguments = {};
  for (let i = 0; i < args.length; i++) {
    const consumed = parseCommon(args, i, result);
    if (consumed === -1) {
      throw new CliUsageError(`Unknown option for profiles: ${args[i]}`);
    }
    i = consumed;
  }
  return result;
}
