/**
 * Run Controls Routes
 *
 * Start / Stop / Status of the supervised script:
 * - POST /api/run/start  { configRef }
 * - POST /api/run/stop   { reason?, runId? }
 * - GET  /api/run/status
 */

import { Router, Request, Response } from 'express';
import { ErrorCode } from '../../errors/error-codes';
import { SupervisorError } from '../../errors/supervisor-error';
import { RunSupervisor } from '../../supervisor/run-supervisor';
import { sendBadRequest, sendError } from '../http-errors';

export interface RunControlsConfig {
  supervisor: RunSupervisor;
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return undefined;
  }
  return Object.prototype.hasOwnProperty.call(body, key)
    ? Object.getOwnPropertyDescriptor(body, key)?.value
    : undefined;
}

function optionalString(value: unknown): string | undefined | null {
  if (value === undefined || value === null) {
    return undefined;
  }
  return typeof value === 'string' ? value : null;
}

/**
 * Creates router for run control endpoints
 */
export function createRunControlsRoutes(config: RunControlsConfig): Router {
  const router = Router();
  const { supervisor } = config;

  // ===================
  // POST /api/run/start
  // ===================
  router.post('/start', async (req: Request, res: Response) => {
    const configRef = field(req.body, 'configRef');

    if (typeof configRef !== 'string') {
      sendError(res, new SupervisorError(ErrorCode.E101_INVALID_CONFIG, 'configRef must be a non-empty string'));
      return;
    }

    try {
      const result = await supervisor.start(configRef);
      res.status(201).json(result);
    } catch (error) {
      sendError(res, error);
    }
  });

  // ===================
  // POST /api/run/stop
  // ===================
  router.post('/stop', async (req: Request, res: Response) => {
    const reason = optionalString(field(req.body, 'reason'));
    const runId = optionalString(field(req.body, 'runId'));

    if (reason === null || runId === null) {
      sendBadRequest(res, 'reason and runId must be strings when given');
      return;
    }

    try {
      const ack = await supervisor.stop(reason || 'requested', runId);
      res.json(ack);
    } catch (error) {
      sendError(res, error);
    }
  });

  // ===================
  // GET /api/run/status
  // ===================
  router.get('/status', (_req: Request, res: Response) => {
    res.json(supervisor.status());
  });

  return router;
}
