import { Router, type Request, type Response } from 'express';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';

/**
 * Create health check routes
 * @param healthMonitor - derives status from the controller and telemetry store
 */
export function createHealthRoutes(healthMonitor: HealthMonitor): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response): void => {
    const health = healthMonitor.getHealthMetrics();
    res.status(health.status === 'unhealthy' ? 503 : 200).json({
      service: 'perf-engine',
      ...health,
    });
  });

  router.get('/ready', (_req: Request, res: Response): void => {
    if (healthMonitor.isReady()) {
      res.json({
        status: 'ready',
        message: 'Accepting jobs',
        timestamp: new Date().toISOString(),
      });
      return;
    }

    res.status(503).json({
      status: 'not_ready',
      message: 'Controller is not running',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/live', (_req: Request, res: Response): void => {
    res.json({
      status: 'alive',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  return router;
}
