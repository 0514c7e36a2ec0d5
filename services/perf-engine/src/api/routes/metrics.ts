import { Router, type Request, type Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { PerfController } from '../../services/perf-controller.js';
import type { MetricsSubscriber, SubscriberRegistry } from '../../monitoring/metrics-server.js';

/**
 * Wrap an open response as a Server-Sent Events subscriber. `send` throws once
 * the connection is gone so the registry drops it.
 */
export function createSseSubscriber(res: Response): MetricsSubscriber {
  return {
    id: uuidv4(),
    send(event: string, payload: unknown): void {
      if (res.writableEnded || res.destroyed) {
        throw new Error('SSE connection closed');
      }
      res.write(`event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`);
    },
    close(): void {
      if (!res.writableEnded) {
        res.end();
      }
    },
  };
}

/**
 * Create monitoring routes: a pull snapshot and a push stream
 */
export function createMetricsRoutes(controller: PerfController, registry: SubscriberRegistry): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response): void => {
    res.json({
      ...controller.getSnapshot(),
      subscribers: registry.subscriberCount,
    });
  });

  router.get('/stream', (_req: Request, res: Response): void => {
    res.status(200).set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();

    const subscriber = createSseSubscriber(res);
    subscriber.send('snapshot', controller.getSnapshot());
    const unsubscribe = registry.subscribe(subscriber);

    res.on('close', () => {
      unsubscribe();
    });
  });

  return router;
}
