import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { OpenAICompatibleClient, type CompletionClient } from './src/clients/completion-client.js';
import { ConfigError, loadPerfConfig, type PerfConfig } from './src/config/perf-config.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { HealthMonitor } from './src/monitoring/health-monitor.js';
import { MetricsServer } from './src/monitoring/metrics-server.js';
import { PerfController } from './src/services/perf-controller.js';
import { createTelemetryRepository } from './src/storage/create-repository.js';
import type { TelemetryRepository } from './src/storage/telemetry-repository.js';
import { TelemetryStore } from './src/storage/telemetry-store.js';
import { createLogger, type Logger } from './src/utils/logger.js';

export interface PerfServiceDependencies {
  config: PerfConfig;
  logger: Logger;
  client?: CompletionClient;
  repository?: TelemetryRepository;
}

export interface PerfService {
  config: PerfConfig;
  controller: PerfController;
  store: TelemetryStore;
  healthMonitor: HealthMonitor;
  metricsServer: MetricsServer;
}

/**
 * Wire the controller, telemetry and HTTP surface together without starting
 * anything.
 */
export async function createPerfService(deps: PerfServiceDependencies): Promise<PerfService> {
  const { config, logger } = deps;
  const repository = deps.repository ?? (await createTelemetryRepository(config, logger));
  const store = new TelemetryStore(repository, logger);
  const client =
    deps.client ??
    new OpenAICompatibleClient({
      endpoint: config.upstream.endpoint,
      apiKey: config.upstream.apiKey,
      timeoutMs: config.upstream.requestTimeoutMs,
    });

  const controller = new PerfController({ config, client, store, logger });
  const healthMonitor = new HealthMonitor(controller, store, config.tuner);
  const metricsServer = new MetricsServer({ controller, store, healthMonitor, logger });

  return { config, controller, store, healthMonitor, metricsServer };
}

async function startService(): Promise<void> {
  dotenv.config();

  let config: PerfConfig;
  try {
    config = loadPerfConfig();
  } catch (error) {
    const logger = createLogger();
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, error.message);
    } else {
      logger.fatal({ err: error }, 'Failed to load configuration');
    }
    process.exit(1);
  }

  const logger = createLogger({ level: config.logLevel });
  logger.info(
    {
      endpoint: config.upstream.endpoint,
      model: config.upstream.modelId,
      concurrency: config.concurrency,
      metricsPort: config.metricsPort,
    },
    'Starting perf engine'
  );

  const service = await createPerfService({ config, logger });
  const { controller, store, metricsServer } = service;

  const gracefulShutdown = new GracefulShutdown(controller, logger, {
    drainTimeoutMs: config.drainTimeoutMs,
    timeout: config.drainTimeoutMs + 15000,
  });
  gracefulShutdown.addCleanupTask(() => metricsServer.stop());
  gracefulShutdown.addCleanupTask(() => store.close());

  const runId = await controller.start();
  const port = await metricsServer.start(config.metricsPort);
  logger.info(
    { runId, telemetry: store.mode, metrics: `http://localhost:${port}/metrics` },
    'Perf engine started'
  );
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startService().catch((error: unknown) => {
    createLogger().fatal({ err: error }, 'Failed to start service');
    process.exit(1);
  });
}
