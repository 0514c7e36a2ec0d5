import { and, asc, avg, count, desc, eq, isNull, max, sql, sum } from 'drizzle-orm';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import type { JobRecord, Run, RunSummary, Sample } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import * as schema from './schema.js';
import {
  buildRunSummary,
  fromJobRow,
  fromRunRow,
  fromSampleRow,
  toJobRow,
  toRunRow,
  toSampleRow,
  type PersistedJob,
  type PersistedSample,
  type TelemetryRepository,
} from './telemetry-repository.js';

const { runs, samples, jobs } = schema;

export interface PostgresRepositoryOptions {
  connectionString: string;
  logger: Logger;
  maxConnections?: number;
  connectionTimeoutMs?: number;
  /** Use an existing pool instead of opening one from `connectionString`. */
  pool?: pg.Pool;
}

export class PostgresTelemetryRepository implements TelemetryRepository {
  readonly kind = 'postgres' as const;
  private readonly pool: pg.Pool;
  private readonly db: NodePgDatabase<typeof schema>;

  constructor(options: PostgresRepositoryOptions) {
    this.pool =
      options.pool ??
      new pg.Pool({
        connectionString: options.connectionString,
        max: options.maxConnections ?? 5,
        connectionTimeoutMillis: options.connectionTimeoutMs ?? 5000,
      });
    // Idle clients emit errors when the server drops them; the pool replaces them.
    this.pool.on('error', (error) => {
      options.logger.warn({ err: error }, 'PostgreSQL idle client error');
    });
    this.db = drizzle(this.pool, { schema });
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async insertRun(run: Run): Promise<void> {
    await this.db.insert(runs).values(toRunRow(run)).onConflictDoNothing();
  }

  async finishRun(runId: string, finishedAt: Date): Promise<boolean> {
    const updated = await this.db
      .update(runs)
      .set({ finishedAt })
      .where(and(eq(runs.runId, runId), isNull(runs.finishedAt)))
      .returning({ runId: runs.runId });
    return updated.length > 0;
  }

  async insertSample(sample: Sample): Promise<void> {
    await this.db.insert(samples).values(toSampleRow(sample)).onConflictDoNothing();
  }

  async insertJob(record: JobRecord): Promise<void> {
    await this.db.insert(jobs).values(toJobRow(record)).onConflictDoNothing();
  }

  async getRun(runId: string): Promise<Run | null> {
    const rows = await this.db.select().from(runs).where(eq(runs.runId, runId)).limit(1);
    const row = rows[0];
    return row ? fromRunRow(row) : null;
  }

  async listSamples(runId: string): Promise<PersistedSample[]> {
    const rows = await this.db.select().from(samples).where(eq(samples.runId, runId)).orderBy(asc(samples.ts));
    return rows.map(fromSampleRow);
  }

  async listJobs(runId: string): Promise<PersistedJob[]> {
    const rows = await this.db.select().from(jobs).where(eq(jobs.runId, runId)).orderBy(asc(jobs.finishedAt));
    return rows.map(fromJobRow);
  }

  async summarize(runId: string): Promise<RunSummary | null> {
    const run = await this.getRun(runId);
    if (!run) return null;

    const [stats] = await this.db
      .select({
        totalJobs: count(),
        failedJobs: sql<number>`count(${jobs.errorText})`.mapWith(Number),
        avgLatency: avg(jobs.latencyMs),
        maxLatency: max(jobs.latencyMs),
        totalTokens: sum(jobs.completionTokens),
      })
      .from(jobs)
      .where(eq(jobs.runId, runId));

    const [sampleStats] = await this.db
      .select({ sampleCount: count() })
      .from(samples)
      .where(eq(samples.runId, runId));

    const [best] = await this.db
      .select({
        throughputRps: samples.throughputRps,
        concurrency: samples.concurrency,
        p95Ms: samples.p95Ms,
      })
      .from(samples)
      .where(eq(samples.runId, runId))
      .orderBy(desc(samples.throughputRps))
      .limit(1);

    return buildRunSummary({
      run,
      totalJobs: stats?.totalJobs ?? 0,
      failedJobs: stats?.failedJobs ?? 0,
      avgLatencyMs: Number(stats?.avgLatency ?? 0),
      maxLatencyMs: stats?.maxLatency ?? 0,
      totalCompletionTokens: Number(stats?.totalTokens ?? 0),
      sampleCount: sampleStats?.sampleCount ?? 0,
      best: best ?? null,
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
