import type { Application, Request, Response } from 'express';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';
import type { SubscriberRegistry } from '../../monitoring/metrics-server.js';
import type { PerfController } from '../../services/perf-controller.js';
import type { TelemetryStore } from '../../storage/telemetry-store.js';
import { createHealthRoutes } from './health.js';
import { createJobRoutes } from './jobs.js';
import { createMetricsRoutes } from './metrics.js';
import { createRunRoutes } from './runs.js';

export interface RouteDependencies {
  controller: PerfController;
  store: TelemetryStore;
  healthMonitor: HealthMonitor;
  registry: SubscriberRegistry;
}

/**
 * Mount every HTTP route of the metrics service
 */
export function setupRoutes(app: Application, deps: RouteDependencies): void {
  app.use('/health', createHealthRoutes(deps.healthMonitor));
  app.use('/metrics', createMetricsRoutes(deps.controller, deps.registry));
  app.use('/jobs', createJobRoutes(deps.controller));
  app.use('/runs', createRunRoutes(deps.store));

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: 'perf-engine',
      status: deps.controller.getState(),
      endpoints: {
        metrics: '/metrics',
        stream: '/metrics/stream',
        health: '/health',
        jobs: '/jobs',
        runSummary: '/runs/:runId/summary',
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      timestamp: new Date().toISOString(),
    });
  });
}
