import type { PerfConfig } from '../config/perf-config.js';
import type { Logger } from '../utils/logger.js';
import { MemoryTelemetryRepository } from './memory-repository.js';
import { PostgresTelemetryRepository } from './postgres-repository.js';
import type { TelemetryRepository } from './telemetry-repository.js';

/**
 * Pick the telemetry backend from configuration. An unreachable database
 * degrades to the in-memory repository (logging-only telemetry) instead of
 * failing startup.
 */
export async function createTelemetryRepository(
  config: Pick<PerfConfig, 'telemetry'>,
  logger: Logger
): Promise<TelemetryRepository> {
  const databaseUrl = config.telemetry.databaseUrl;
  if (!databaseUrl) {
    logger.info('PERF_DB_URL not set; using in-memory telemetry');
    return new MemoryTelemetryRepository();
  }

  const repository = new PostgresTelemetryRepository({ connectionString: databaseUrl, logger });
  try {
    await repository.ping();
    logger.info('Using PostgreSQL telemetry');
    return repository;
  } catch (error) {
    logger.error({ err: error }, 'PostgreSQL unreachable; degrading to in-memory telemetry');
    await repository.close().catch((closeError: unknown) => {
      logger.warn({ err: closeError }, 'Failed to close PostgreSQL pool');
    });
    return new MemoryTelemetryRepository();
  }
}
