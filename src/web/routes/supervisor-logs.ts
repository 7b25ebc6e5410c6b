/**
 * Supervisor Logs Routes
 *
 * Operational log of the supervisor (run starts, stops, transitions, exits,
 * observer overflow), not the script's own output:
 * - Retrieving entries, filtered by run, category or time
 * - Real-time streaming via SSE
 */

import { Router, Request, Response } from 'express';
import {
  SUPERVISOR_LOG_CATEGORIES,
  SupervisorLogEntry,
  SupervisorLogger,
  SupervisorLogSubscriber,
  isSupervisorLogCategory,
} from '../../supervisor/supervisor-logger';
import { sendBadRequest } from '../http-errors';

export interface SupervisorLogsConfig {
  logger: SupervisorLogger;
  heartbeatIntervalMs?: number;
}

function parseLimit(value: unknown, fallback: number): number {
  if (typeof value !== 'string') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Creates router for supervisor log endpoints
 */
export function createSupervisorLogsRoutes(config: SupervisorLogsConfig): Router {
  const router = Router();
  const { logger } = config;
  const heartbeatIntervalMs = config.heartbeatIntervalMs ?? 30000;

  // ===================
  // GET /api/supervisor/logs
  // All entries with optional filtering (runId | category | since), last 100 by default
  // ===================
  router.get('/logs', (req: Request, res: Response) => {
    const { runId, category, since } = req.query;

    let logs: SupervisorLogEntry[];
    if (typeof runId === 'string' && runId) {
      logs = logger.getByRunId(runId);
    } else if (category !== undefined) {
      if (!isSupervisorLogCategory(category)) {
        sendBadRequest(res, `category must be one of ${SUPERVISOR_LOG_CATEGORIES.join(', ')}`);
        return;
      }
      logs = logger.getByCategory(category);
    } else if (typeof since === 'string' && since) {
      logs = logger.getSince(since);
    } else {
      logs = logger.getAll();
    }

    const limit = parseLimit(req.query.limit, 100);
    if (limit > 0 && logs.length > limit) {
      logs = logs.slice(-limit);
    }

    res.json({
      count: logs.length,
      logs,
    });
  });

  // ===================
  // GET /api/supervisor/logs/recent
  // ===================
  router.get('/logs/recent', (req: Request, res: Response) => {
    const logs = logger.getRecent(parseLimit(req.query.limit, 50));
    res.json({
      count: logs.length,
      logs,
    });
  });

  // ===================
  // GET /api/supervisor/logs/categories
  // Categories with counts
  // ===================
  router.get('/logs/categories', (_req: Request, res: Response) => {
    const counts: Record<string, number> = {};
    for (const category of SUPERVISOR_LOG_CATEGORIES) {
      counts[category] = logger.getByCategory(category).length;
    }
    res.json({
      categories: SUPERVISOR_LOG_CATEGORIES,
      counts,
      total: logger.getAll().length,
    });
  });

  // ===================
  // GET /api/supervisor/logs/stream
  // Real-time log streaming via Server-Sent Events (SSE)
  // ===================
  router.get('/logs/stream', (req: Request, res: Response) => {
    const runId = typeof req.query.runId === 'string' ? req.query.runId : undefined;

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    res.write(`event: connected\ndata: ${JSON.stringify({ connected: true, timestamp: new Date().toISOString() })}\n\n`);

    const subscriber: SupervisorLogSubscriber = {
      onLog(entry: SupervisorLogEntry) {
        if (runId && entry.runId !== runId) {
          return;
        }
        res.write(`event: log\ndata: ${JSON.stringify(entry)}\n\n`);
      },
    };
    const unsubscribe = logger.subscribe(subscriber);

    const heartbeatInterval = setInterval(() => {
      res.write(`event: heartbeat\ndata: ${JSON.stringify({ timestamp: new Date().toISOString() })}\n\n`);
    }, heartbeatIntervalMs);

    res.on('close', () => {
      unsubscribe();
      clearInterval(heartbeatInterval);
    });
  });

  // ===================
  // DELETE /api/supervisor/logs
  // ===================
  router.delete('/logs', (_req: Request, res: Response) => {
    logger.clear();
    res.json({
      success: true,
      message: 'Supervisor log cleared',
    });
  });

  return router;
}
