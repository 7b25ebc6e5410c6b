/**
 * Service assembly
 *
 * Wires the service config into one logger, one profile store and one
 * RunSupervisor. The CLI and embedders share this so both get the same
 * defaults.
 */

import * as path from 'path';
import {
  applyOverrides,
  loadServiceConfig,
  ServiceConfig,
  ServiceConfigOverrides,
} from './config/service-config';
import { FileProfileStore, ProfileStore } from './config/profile-store';
import { LogClassifier } from './stream/log-classifier';
import { RunSupervisor } from './supervisor/run-supervisor';
import { SupervisorLogger } from './supervisor/supervisor-logger';

export interface ServiceOptions extends ServiceConfigOverrides {
  /** Explicit config file; otherwise the search paths apply */
  configPath?: string;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
  /** Force console echo on or off regardless of the config file */
  console?: boolean;
}

export interface Service {
  config: ServiceConfig;
  /** Config file used, null when running on defaults */
  configSource: string | null;
  logger: SupervisorLogger;
  profileStore: ProfileStore;
  supervisor: RunSupervisor;
}

export function createService(options: ServiceOptions = {}): Service {
  const cwd = options.cwd ?? process.cwd();
  const loaded = loadServiceConfig(options.configPath, cwd);
  const config = applyOverrides(loaded.config, options);

  const logger = new SupervisorLogger({
    maxEntries: config.logging.maxEntries,
    console: options.console ?? config.logging.console,
  });

  if (loaded.source) {
    logger.logConfig('info', `Loaded config from ${loaded.source}`, { source: loaded.source });
  } else {
    logger.logConfig('info', 'No config file found, using defaults');
  }

  const profilesPath = path.resolve(cwd, config.profiles.path);
  const profileStore = new FileProfileStore(profilesPath);
  logger.logConfig('debug', `Run profiles read from ${profilesPath}`, { path: profilesPath });

  const supervisor = new RunSupervisor({
    profileStore,
    logger,
    classifier: new LogClassifier(config.classification),
    defaults: {
      cwd,
      gracePeriodMs: config.supervisor.gracePeriodMs,
    },
    drainTimeoutMs: config.supervisor.drainTimeoutMs,
    replayBufferSize: config.broadcast.replayBufferSize,
    observerQueueSize: config.broadcast.observerQueueSize,
  });

  return {
    config,
    configSource: loaded.source,
    logger,
    profileStore,
    supervisor,
  };
}
