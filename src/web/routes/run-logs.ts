/**
 * Run Logs Routes
 *
 * Script output of the current run:
 * - GET /api/run/logs         replay snapshot (?after=, ?level=, ?limit=)
 * - GET /api/run/logs/stream  live Server-Sent Events stream
 *
 * SSE events:
 *   connected  { runId, state }
 *   log        LogRecord, id "<runId>:<sequence>" so a reconnecting client resumes
 *   state      StateChangedEvent
 *   heartbeat  { timestamp }
 */

import { Router, Request, Response } from 'express';
import { isLogLevel, LogRecord } from '../../models/log-record';
import { ObserverMessage, ObserverSession } from '../../stream/observer-session';
import { SubscribeOptions } from '../../stream/broadcaster';
import { RunSupervisor } from '../../supervisor/run-supervisor';
import { SupervisorLogger } from '../../supervisor/supervisor-logger';
import { sendBadRequest } from '../http-errors';

export interface RunLogsConfig {
  supervisor: RunSupervisor;
  logger: SupervisorLogger;
  /** Interval between heartbeat events (default: 30000) */
  heartbeatIntervalMs?: number;
}

/**
 * Parse a resume cursor: "<runId>:<sequence>" or a bare sequence
 * @returns undefined when the value is absent or malformed
 */
export function parseEventCursor(value: string | undefined): SubscribeOptions | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const separator = value.lastIndexOf(':');
  const runId = separator === -1 ? undefined : value.slice(0, separator);
  const sequenceText = separator === -1 ? value : value.slice(separator + 1);
  if (!/^\d+$/.test(sequenceText)) {
    return undefined;
  }
  return runId ? { runId, afterSequence: Number(sequenceText) } : { afterSequence: Number(sequenceText) };
}

/**
 * Serialize one observer message as an SSE frame
 */
export function formatSseMessage(message: ObserverMessage): string {
  if (message.type === 'log') {
    const { record } = message;
    return `id: ${record.runId}:${record.sequence}\nevent: log\ndata: ${JSON.stringify(record)}\n\n`;
  }
  return `event: state\ndata: ${JSON.stringify(message.event)}\n\n`;
}

function writeEvent(res: Response, event: string, data: unknown): boolean {
  return res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

/**
 * Resolves once the socket accepts more data or went away
 */
function waitForDrain(res: Response): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.once('drain', done);
    res.once('close', done);
  });
}

/**
 * Copy session messages to the response until the session closes
 * Backpressure stays inside the session queue (drop-oldest), never in the supervisor.
 */
async function forward(session: ObserverSession, res: Response): Promise<void> {
  for await (const message of session) {
    if (res.writableEnded || res.destroyed) {
      break;
    }
    if (!res.write(formatSseMessage(message))) {
      await waitForDrain(res);
    }
  }
  if (!res.writableEnded) {
    res.end();
  }
}

function parseLimit(value: unknown, fallback: number): number | null {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return null;
  }
  return parseInt(value, 10);
}

/**
 * Creates router for run log endpoints
 */
export function createRunLogsRoutes(config: RunLogsConfig): Router {
  const router = Router();
  const { supervisor, logger } = config;
  const heartbeatIntervalMs = config.heartbeatIntervalMs ?? 30000;

  // ===================
  // GET /api/run/logs
  // Replay buffer snapshot
  // ===================
  router.get('/logs', (req: Request, res: Response) => {
    const { after, level } = req.query;
    const limit = parseLimit(req.query.limit, 0);
    const afterSequence = parseLimit(after, 0);

    if (limit === null || afterSequence === null) {
      sendBadRequest(res, 'after and limit must be non-negative integers');
      return;
    }
    if (level !== undefined && !isLogLevel(level)) {
      sendBadRequest(res, 'level must be one of info, warning, error, success');
      return;
    }

    let records: LogRecord[] = supervisor.getRecentLogs().filter(r => r.sequence > afterSequence);
    if (level !== undefined) {
      records = records.filter(r => r.level === level);
    }
    if (limit > 0 && records.length > limit) {
      records = records.slice(-limit);
    }

    res.json({
      runId: supervisor.status().runId,
      count: records.length,
      records,
    });
  });

  // ===================
  // GET /api/run/logs/stream
  // Real-time log streaming via Server-Sent Events (SSE)
  // ===================
  router.get('/logs/stream', (req: Request, res: Response) => {
    const lastEventId = req.header('Last-Event-ID');
    const after = typeof req.query.after === 'string' ? req.query.after : undefined;
    const cursor = parseEventCursor(lastEventId ?? after) ?? {};

    // Set up SSE headers
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    res.flushHeaders();

    const { state, runId } = supervisor.status();
    writeEvent(res, 'connected', { runId, state });

    const session = supervisor.subscribe(cursor);

    const heartbeatInterval = setInterval(() => {
      if (!res.writableEnded) {
        writeEvent(res, 'heartbeat', { timestamp: new Date().toISOString() });
      }
    }, heartbeatIntervalMs);

    // Clean up on connection close
    res.on('close', () => {
      clearInterval(heartbeatInterval);
      supervisor.unsubscribe(session);
      logger.logObserver(`Observer ${session.id} disconnected`, {
        sessionId: session.id,
        dropped: session.dropped,
      });
    });

    forward(session, res).catch((error: unknown) => {
      logger.logError(`Log stream ${session.id} failed`, error);
      clearInterval(heartbeatInterval);
      supervisor.unsubscribe(session);
      res.destroy();
    });
  });

  return router;
}
