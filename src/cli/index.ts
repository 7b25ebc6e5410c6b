#!/usr/bin/env node
/**
 * Script Supervisor - CLI Entry Point
 *
 * Usage:
 *   script-supervisor serve [options]        - Start the HTTP/SSE control plane
 *   script-supervisor run <profile> [opts]   - Run one profile in the foreground
 *   script-supervisor profiles [options]     - List run profiles
 */

import * as fs from 'fs';
import * as path from 'path';
import { isSupervisorError } from '../errors/supervisor-error';
import { LogRecord } from '../models/log-record';
import { RunState, StateChangedEvent, isTerminalState } from '../models/run-state';
import { createService } from '../service';
import { WebServer } from '../web/server';
import {
  CliUsageError,
  parseProfilesArgs,
  parseRunArgs,
  parseServeArgs,
  RunArguments,
  ServeArguments,
  CommonArguments,
} from './args';

/**
 * Help text
 */
const HELP_TEXT = `
Script Supervisor - CLI

Usage:
  script-supervisor <command> [options]

Commands:
  serve                  Start the HTTP/SSE control plane
  run <profile>          Run one profile in the foreground, streaming its output
  profiles               List run profiles

Options:
  --config <path>        Service config file (default: ./config/supervisor.yaml)
  --profiles <path>      Run profiles file (default: ./config/profiles.json)

Serve Options:
  --port <number>        Port to listen on (default: 5080)
  --host <host>          Interface to bind (default: 127.0.0.1)

Run Options:
  --json                 Print records as JSON lines

  --help, -h             Show this help message
  --version, -v          Show version
`;

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    console.error(`[supervisor] Could not read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

const VERSION = readVersion();

/**
 * serve: start the web server and stop the run on SIGINT / SIGTERM
 */
async function serve(args: ServeArguments): Promise<void> {
  const service = createService({
    configPath: args.configPath,
    profilesPath: args.profilesPath,
    port: args.port,
    host: args.host,
  });
  const { config, logger, profileStore, supervisor } = service;

  const server = new WebServer({
    port: config.server.port,
    host: config.server.host,
    supervisor,
    profileStore,
    logger,
    heartbeatIntervalMs: config.broadcast.heartbeatIntervalMs,
    version: VERSION,
  });

  await server.start();

  const url = server.getUrl();
  console.log(`[supervisor] Listening on ${url}`);
  console.log('');
  console.log('Try:');
  console.log(`  curl ${url}/api/profiles`);
  console.log(`  curl -X POST ${url}/api/run/start -H "Content-Type: application/json" -d '{"configRef":"<profile>"}'`);
  console.log(`  curl -N ${url}/api/run/logs/stream`);
  console.log('');

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`\n[supervisor] ${signal} received, shutting down...`);
    await supervisor.shutdown();
    await server.stop();
    console.log('[supervisor] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((error: unknown) => {
      console.error(`[supervisor] Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

function formatRecord(record: LogRecord): string {
  const stream = record.source === 'stderr' ? ' (stderr)' : '';
  return `${record.timestamp} [${record.level.toUpperCase()}]${stream} ${record.text}`;
}

/**
 * run: one profile in the foreground; exit code 0 only for COMPLETED
 */
async function runProfile(args: RunArguments): Promise<number> {
  const { logger, supervisor } = createService({
    configPath: args.configPath,
    profilesPath: args.profilesPath,
    console: false,
  });

  supervisor.on('log', (record: LogRecord) => {
    console.log(args.json ? JSON.stringify(record) : formatRecord(record));
  });

  const finished = new Promise<RunState>((resolve) => {
    supervisor.on('state-changed', (event: StateChangedEvent) => {
      if (isTerminalState(event.state)) {
        resolve(event.state);
      }
    });
  });

  const onSignal = (): void => {
    supervisor.stop('interrupted').catch((error: unknown) => {
      logger.logError('Stop on interrupt failed', error);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const started = await supervisor.start(args.configRef);
  console.error(`[supervisor] ${started.runId} started (pid ${started.pid ?? 'unknown'})`);

  const state = await finished;
  const status = supervisor.status();
  console.error(`[supervisor] ${status.runId} ${state}${status.lastError ? `: ${status.lastError}` : ''}`);

  process.off('SIGINT', onSignal);
  process.off('SIGTERM', onSignal);
  return state === RunState.COMPLETED ? 0 : 1;
}

async function listProfiles(args: CommonArguments): Promise<void> {
  const { profileStore } = createService({
    configPath: args.configPath,
    profilesPath: args.profilesPath,
    console: false,
  });
  for (const ref of await profileStore.list()) {
    console.log(ref);
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h') || args.length === 0) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(VERSION);
    process.exit(0);
  }

  const [command, ...restArgs] = args;

  try {
    switch (command) {
      case 'serve':
        await serve(parseServeArgs(restArgs));
        break;

      case 'run':
        process.exitCode = await runProfile(parseRunArgs(restArgs));
        break;

      case 'profiles':
        await listProfiles(parseProfilesArgs(restArgs));
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.log(HELP_TEXT);
        process.exit(1);
    }
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      console.log(HELP_TEXT);
    } else if (isSupervisorError(err)) {
      console.error(JSON.stringify({
        error: {
          code: err.code,
          name: err.errorName,
          message: err.message,
          details: err.details,
        },
      }, null, 2));
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

// Run main
main().catch((err: unknown) => {
  console.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
