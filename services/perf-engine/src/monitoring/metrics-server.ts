import type { Server } from 'http';
import express, { type Application } from 'express';
import { setupRoutes } from '../api/routes/index.js';
import type { PerfController } from '../services/perf-controller.js';
import type { TelemetryStore } from '../storage/telemetry-store.js';
import type { Logger } from '../utils/logger.js';
import { ErrorHandler } from './error-handler.js';
import type { HealthMonitor } from './health-monitor.js';

export interface MetricsSubscriber {
  readonly id: string;
  /** Throws when the subscriber can no longer be written to. */
  send(event: string, payload: unknown): void;
  close(): void;
}

export interface SubscriberRegistry {
  readonly subscriberCount: number;
  subscribe(subscriber: MetricsSubscriber): () => void;
}

export interface MetricsServerOptions {
  controller: PerfController;
  store: TelemetryStore;
  healthMonitor: HealthMonitor;
  logger: Logger;
}

/**
 * HTTP view over the controller: pull snapshot, SSE push of every Sample,
 * job submission and health. Holds no state of its own beyond subscribers.
 */
export class MetricsServer implements SubscriberRegistry {
  readonly app: Application;
  readonly errorHandler: ErrorHandler;
  private readonly subscribers: Map<string, MetricsSubscriber> = new Map();
  private readonly logger: Logger;
  private readonly detachController: () => void;
  private server: Server | null = null;

  constructor(options: MetricsServerOptions) {
    this.logger = options.logger.child({ component: 'metrics' });
    this.errorHandler = new ErrorHandler(options.logger);

    this.app = express();
    this.app.use(express.json({ limit: '1mb' }));
    setupRoutes(this.app, {
      controller: options.controller,
      store: options.store,
      healthMonitor: options.healthMonitor,
      registry: this,
    });
    // must be last
    this.app.use(this.errorHandler.middleware());

    this.detachController = options.controller.onSample((sample) => {
      this.broadcast('sample', sample);
    });
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  subscribe(subscriber: MetricsSubscriber): () => void {
    this.subscribers.set(subscriber.id, subscriber);
    this.logger.debug({ subscriber: subscriber.id, total: this.subscribers.size }, 'Subscriber connected');
    return () => {
      if (this.subscribers.delete(subscriber.id)) {
        this.logger.debug({ subscriber: subscriber.id, total: this.subscribers.size }, 'Subscriber removed');
      }
    };
  }

  /**
   * Deliver to every subscriber; one that fails is dropped without affecting
   * the rest. Returns the number of successful deliveries.
   */
  broadcast(event: string, payload: unknown): number {
    let delivered = 0;
    for (const [id, subscriber] of this.subscribers) {
      try {
        subscriber.send(event, payload);
        delivered++;
      } catch (error) {
        this.subscribers.delete(id);
        this.logger.debug({ subscriber: id, err: error }, 'Dropping subscriber after failed write');
      }
    }
    return delivered;
  }

  /**
   * Listen on the given port (0 picks a free one); resolves the bound port.
   */
  start(port: number, host?: string): Promise<number> {
    if (this.server) {
      throw new Error('Metrics server already started');
    }

    return new Promise<number>((resolve, reject) => {
      const server = this.app.listen(port, host ?? '0.0.0.0');
      server.once('error', reject);
      server.once('listening', () => {
        server.off('error', reject);
        const address = server.address();
        const boundPort = typeof address === 'object' && address ? address.port : port;
        this.logger.info({ port: boundPort }, 'Metrics server listening');
        resolve(boundPort);
      });
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    this.detachController();
    for (const subscriber of this.subscribers.values()) {
      subscriber.close();
    }
    this.subscribers.clear();

    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
      server.closeIdleConnections();
    });
    this.logger.info('Metrics server closed');
  }
}
