/**
 * Cellar Backend — Health Route
 *
 * GET /api/health — Service health check
 */

import { Router, Request, Response } from 'express';
import { JobRegistry } from '../jobs';

export function healthRoutes(jobs: JobRegistry, version: string): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      version,
      uptime: process.uptime(),
      running_jobs: jobs.list().filter((job) => job.status === 'running').length,
    });
  });

  return router;
}
