/**
 * Web Server - Express HTTP server
 *
 * Boundary adapter between remote observers and the RunSupervisor:
 * - REST API for start / stop / status
 * - Server-Sent Events for live script output and the supervisor log
 *
 * The supervisor, profile store and logger are injected; nothing here
 * holds run state of its own.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { ProfileStore } from '../config/profile-store';
import { RunSupervisor } from '../supervisor/run-supervisor';
import { SupervisorLogger } from '../supervisor/supervisor-logger';
import { createRunControlsRoutes } from './routes/run-controls';
import { createRunLogsRoutes } from './routes/run-logs';
import { createProfilesRoutes } from './routes/profiles';
import { createSupervisorLogsRoutes } from './routes/supervisor-logs';
import { ErrorResponse, sendBadRequest, sendError } from './http-errors';

/**
 * Web Server configuration
 */
export interface WebServerConfig {
  /** Port number (default: 5080, 0 picks a free port) */
  port?: number;
  /** Host (default: 127.0.0.1) */
  host?: string;
  supervisor: RunSupervisor;
  profileStore: ProfileStore;
  logger: SupervisorLogger;
  /** SSE heartbeat interval (default: 30000) */
  heartbeatIntervalMs?: number;
  /** Reported by /api/health */
  version?: string;
}

/**
 * Web Server state
 */
export interface WebServerState {
  isRunning: boolean;
  port: number;
  host: string;
}

/**
 * Create configured Express app
 */
export function createApp(config: WebServerConfig): Express {
  const app = express();
  const { supervisor, profileStore, logger, heartbeatIntervalMs, version } = config;

  // Middleware
  app.use(express.json());

  // CORS headers for local development
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Last-Event-ID');
    next();
  });

  // ===================
  // Run Routes
  // ===================
  app.use('/api/run', createRunControlsRoutes({ supervisor }));
  app.use('/api/run', createRunLogsRoutes({ supervisor, logger, heartbeatIntervalMs }));

  // ===================
  // Profile Routes
  // ===================
  app.use('/api/profiles', createProfilesRoutes({ profileStore, defaults: supervisor.getDefaults() }));

  // ===================
  // Supervisor Log Routes
  // ===================
  app.use('/api/supervisor', createSupervisorLogsRoutes({ logger, heartbeatIntervalMs }));

  // ===================
  // Health Check
  // ===================

  /**
   * GET /api/health
   */
  app.get('/api/health', (_req: Request, res: Response) => {
    const { state, runId } = supervisor.status();
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version,
      pid: process.pid,
      run: { state, runId },
      observers: supervisor.getObserverStats(),
    });
  });

  // Unknown API route
  app.use('/api', (req: Request, res: Response) => {
    const body: ErrorResponse = {
      error: 'NOT_FOUND',
      message: `No route for ${req.method} ${req.originalUrl}`,
    };
    res.status(404).json(body);
  });

  // Error handler (malformed JSON bodies and anything a route let through)
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      sendBadRequest(res, 'Request body is not valid JSON');
      return;
    }
    logger.logError('Unhandled request error', err);
    sendError(res, err);
  });

  return app;
}

/**
 * Web Server
 * Manages Express server lifecycle
 */
export class WebServer {
  private readonly app: Express;
  private readonly port: number;
  private readonly host: string;
  private server: ReturnType<Express['listen']> | null = null;

  constructor(config: WebServerConfig) {
    this.port = config.port ?? 5080;
    this.host = config.host || '127.0.0.1';
    this.app = createApp(config);
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.server = this.app.listen(this.port, this.host, () => {
          resolve();
        });
        this.server.on('error', reject);
      } catch (error) {
        reject(error);
      }
    });
  }

  /**
   * Stop the server
   * Open SSE connections are cut so close() does not wait on them.
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      const server = this.server;
      server.close((err) => {
        if (err) {
          reject(err);
        } else {
          this.server = null;
          resolve();
        }
      });
      server.closeAllConnections();
    });
  }

  /**
   * Get server state
   */
  getState(): WebServerState {
    return {
      isRunning: this.server !== null,
      port: this.getPort(),
      host: this.host,
    };
  }

  /**
   * Get Express app (for testing)
   */
  getApp(): Express {
    return this.app;
  }

  /**
   * Port actually bound (differs from the configured one when that was 0)
   */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.port;
  }

  /**
   * Get server URL
   */
  getUrl(): string {
    return 'http://' + this.host + ':' + this.getPort();
  }
}
