/**
 * Cellar Backend — Express Application Factory
 *
 * Creates and configures the Express app with all middleware and routes.
 * Separated from server.ts to enable testing with supertest.
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createLogger, Logger } from '@cellar/engine';
import { Config } from './config';
import { JobRegistry } from './jobs';
import { InstallService } from './service';
import { healthRoutes } from './routes/health';
import { mcpRoutes, RpcCode } from './routes/mcp';

export const VERSION = '0.1.0';

export interface AppContext {
  app: express.Application;
  jobs: JobRegistry;
}

function corsOrigin(origins: string[]): boolean | string | string[] {
  if (origins.length === 0) return false;
  return origins.includes('*') ? '*' : origins;
}

export function createApp(config: Config, service: InstallService, logger?: Logger): AppContext {
  const log = logger ?? createLogger({ level: config.logLevel });
  const jobs = new JobRegistry(service, log, config.maxFinishedJobs);
  const app = express();

  // ─── Middleware ────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: corsOrigin(config.corsOrigins) }));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ───────────────────────────────────────────────
  app.use('/api/health', healthRoutes(jobs, VERSION));
  app.use('/mcp', mcpRoutes(jobs, service, log, VERSION));

  // ─── 404 Handler ──────────────────────────────────────────
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // ─── Error Handler ────────────────────────────────────────
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    // Malformed JSON bodies from express.json()
    if (err instanceof SyntaxError && req.path.startsWith('/mcp')) {
      res.status(400).json({
        jsonrpc: '2.0',
        id: null,
        error: { code: RpcCode.PARSE_ERROR, message: 'Parse error' },
      });
      return;
    }
    log.error({ error: err.message, path: req.path }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return { app, jobs };
}
