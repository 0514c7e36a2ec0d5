import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { TelemetryStore } from '../../storage/telemetry-store.js';

const runIdSchema = z.string().uuid();

export function createRunRoutes(store: TelemetryStore): Router {
  const router = Router();

  router.get('/:runId/summary', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { runId } = req.params;
      const parsed = runIdSchema.safeParse(runId);
      const summary = parsed.success ? await store.getRunSummary(parsed.data) : null;
      if (!summary) {
        res.status(404).json({
          error: 'Not Found',
          message: `Run ${runId ?? ''} not found`,
          timestamp: new Date().toISOString(),
        });
        return;
      }

      res.json({ success: true, data: summary, mode: store.mode });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
