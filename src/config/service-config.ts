/**
 * Service Config Loader
 * Loads config/supervisor.yaml and merges it over the defaults
 *
 * Search order: explicit path, ./config/supervisor.yaml, ./config/supervisor.yml,
 * then the config directory shipped with the package.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ErrorCode } from '../errors/error-codes';
import { SupervisorError } from '../errors/supervisor-error';
import { DEFAULT_GRACE_PERIOD_MS, MAX_GRACE_PERIOD_MS } from '../models/run-config';
import { DEFAULT_OBSERVER_QUEUE_SIZE, DEFAULT_REPLAY_BUFFER_SIZE } from '../stream/broadcaster';
import { ClassificationPatterns, DEFAULT_CLASSIFICATION_PATTERNS } from '../stream/log-classifier';

export interface ServiceConfig {
  server: {
    host: string;
    port: number;
  };
  profiles: {
    /** JSON file of run profiles, relative paths resolve against the working directory */
    path: string;
  };
  supervisor: {
    gracePeriodMs: number;
    drainTimeoutMs: number;
  };
  broadcast: {
    replayBufferSize: number;
    observerQueueSize: number;
    heartbeatIntervalMs: number;
  };
  classification: ClassificationPatterns;
  logging: {
    maxEntries: number;
    console: boolean;
  };
}

export interface LoadedServiceConfig {
  config: ServiceConfig;
  /** File the config came from, null when only defaults apply */
  source: string | null;
}

/**
 * Command line values that win over the file
 */
export interface ServiceConfigOverrides {
  host?: string;
  port?: number;
  profilesPath?: string;
}

/**
 * Default configuration values
 */
export const DEFAULT_SERVICE_CONFIG: ServiceConfig = {
  server: {
    host: '127.0.0.1',
    port: 5080,
  },
  profiles: {
    path: path.join('config', 'profiles.json'),
  },
  supervisor: {
    gracePeriodMs: DEFAULT_GRACE_PERIOD_MS,
    drainTimeoutMs: 2000,
  },
  broadcast: {
    replayBufferSize: DEFAULT_REPLAY_BUFFER_SIZE,
    observerQueueSize: DEFAULT_OBSERVER_QUEUE_SIZE,
    heartbeatIntervalMs: 30000,
  },
  classification: DEFAULT_CLASSIFICATION_PATTERNS,
  logging: {
    maxEntries: 1000,
    console: true,
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads one section of the parsed document, recording type violations
 */
class SectionReader {
  private readonly section: Record<string, unknown>;

  constructor(
    private readonly name: string,
    raw: unknown,
    private readonly violations: string[]
  ) {
    if (raw !== undefined && raw !== null && !isRecord(raw)) {
      violations.push(`${name} must be a mapping`);
    }
    this.section = isRecord(raw) ? raw : {};
  }

  string(key: string, fallback: string): string {
    const value = this.section[key];
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'string' || value.trim() === '') {
      this.violations.push(`${this.name}.${key} must be a non-empty string`);
      return fallback;
    }
    return value;
  }

  integer(key: string, fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
    const value = this.section[key];
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
      this.violations.push(`${this.name}.${key} must be an integer between ${min} and ${max}`);
      return fallback;
    }
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.section[key];
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'boolean') {
      this.violations.push(`${this.name}.${key} must be true or false`);
      return fallback;
    }
    return value;
  }

  patterns(key: string, fallback: string[]): string[] {
    const value = this.section[key];
    if (value === undefined) {
      return fallback;
    }
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
      this.violations.push(`${this.name}.${key} must be a list of regular expressions`);
      return fallback;
    }
    for (const source of value) {
      try {
        new RegExp(source, 'iu');
      } catch (error) {
        this.violations.push(`${this.name}.${key}: ${error instanceof Error ? error.message : String(error)}`);
        return fallback;
      }
    }
    return [...value];
  }
}

/**
 * Merge a parsed document with defaults
 * @throws SupervisorError E101 listing every violation
 */
export function mergeWithDefaults(parsed: unknown, source: string = 'config'): ServiceConfig {
  const violations: string[] = [];
  if (parsed !== undefined && parsed !== null && !isRecord(parsed)) {
    throw new SupervisorError(ErrorCode.E101_INVALID_CONFIG, `${source}: top level must be a mapping`);
  }
  const doc = isRecord(parsed) ? parsed : {};
  const defaults = DEFAULT_SERVICE_CONFIG;

  const server = new SectionReader('server', doc.server, violations);
  const profiles = new SectionReader('profiles', doc.profiles, violations);
  const supervisor = new SectionReader('supervisor', doc.supervisor, violations);
  const broadcast = new SectionReader('broadcast', doc.broadcast, violations);
  const classification = new SectionReader('classification', doc.classification, violations);
  const logging = new SectionReader('logging', doc.logging, violations);

  const config: ServiceConfig = {
    server: {
      host: server.string('host', defaults.server.host),
      port: server.integer('port', defaults.server.port, 0, 65535),
    },
    profiles: {
      path: profiles.string('path', defaults.profiles.path),
    },
    supervisor: {
      gracePeriodMs: supervisor.integer('gracePeriodMs', defaults.supervisor.gracePeriodMs, 0, MAX_GRACE_PERIOD_MS),
      drainTimeoutMs: supervisor.integer('drainTimeoutMs', defaults.supervisor.drainTimeoutMs, 0),
    },
    broadcast: {
      replayBufferSize: broadcast.integer('replayBufferSize', defaults.broadcast.replayBufferSize, 0),
      observerQueueSize: broadcast.integer('observerQueueSize', defaults.broadcast.observerQueueSize, 1),
      heartbeatIntervalMs: broadcast.integer('heartbeatIntervalMs', defaults.broadcast.heartbeatIntervalMs, 1000),
    },
    classification: {
      error: classification.patterns('error', defaults.classification.error),
      warning: classification.patterns('warning', defaults.classification.warning),
      success: classification.patterns('success', defaults.classification.success),
    },
    logging: {
      maxEntries: logging.integer('maxEntries', defaults.logging.maxEntries, 1),
      console: logging.boolean('console', defaults.logging.console),
    },
  };

  if (violations.length > 0) {
    throw new SupervisorError(ErrorCode.E101_INVALID_CONFIG, `${source}: ${violations.join('; ')}`, {
      violations,
    });
  }
  return config;
}

/**
 * Parse YAML content into a ServiceConfig
 */
export function parseServiceConfig(content: string, source: string = 'config'): ServiceConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new SupervisorError(
      ErrorCode.E101_INVALID_CONFIG,
      `${source}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return mergeWithDefaults(parsed, source);
}

/**
 * Load service configuration from YAML file
 * @param configPath explicit path; when given it must exist
 */
export function loadServiceConfig(configPath?: string, cwd: string = process.cwd()): LoadedServiceConfig {
  if (configPath !== undefined) {
    const resolved = path.resolve(cwd, configPath);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Config file not found: ${resolved}`);
    }
    return { config: parseServiceConfig(fs.readFileSync(resolved, 'utf-8'), resolved), source: resolved };
  }

  const searchPaths = [
    path.join(cwd, 'config', 'supervisor.yaml'),
    path.join(cwd, 'config', 'supervisor.yml'),
    path.join(__dirname, '..', '..', 'config', 'supervisor.yaml'),
  ];

  for (const p of searchPaths) {
    if (fs.existsSync(p)) {
      return { config: parseServiceConfig(fs.readFileSync(p, 'utf-8'), p), source: p };
    }
  }

  return { config: DEFAULT_SERVICE_CONFIG, source: null };
}

/**
 * Apply command line overrides
 */
export function applyOverrides(config: ServiceConfig, overrides: ServiceConfigOverrides): ServiceConfig {
  return {
    ...config,
    server: {
      host: overrides.host ?? config.server.host,
      port: overrides.port ?? config.server.port,
    },
    profiles: {
      path: overrides.profilesPath ?? config.profiles.path,
    },
  };
}
