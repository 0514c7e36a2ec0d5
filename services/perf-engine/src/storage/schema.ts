import { doublePrecision, index, integer, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';

export const runs = pgTable(
  'runs',
  {
    runId: uuid('run_id').primaryKey(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull().defaultNow(),
    finishedAt: timestamp('finished_at', { withTimezone: true }),
    modelId: text('model_id').notNull(),
    host: text('host').notNull(),
    notes: text('notes'),
  },
  (table) => ({
    startedIdx: index('idx_runs_started').on(table.startedAt),
  })
);

export const samples = pgTable(
  'samples',
  {
    id: uuid('id').primaryKey(),
    runId: uuid('run_id')
      .notNull()
      .references(() => runs.runId),
    ts: timestamp('ts', { withTimezone: true }).notNull(),
    windowSec: integer('window_sec').notNull(),
    concurrency: integer('concurrency').notNull(),
    queueDepth: integer('queue_depth').notNull(),
    throughputRps: doublePrecision('throughput_rps').notNull(),
    p50Ms: integer('p50_ms').notNull(),
    p95Ms: integer('p95_ms').notNull(),
    errorRate: doublePrecision('error_rate').notNull(),
    tokensIn: integer('tokens_in').notNull(),
    tokensOut: integer('tokens_out').notNull(),
  },
  (table) => ({
    runTsIdx: index('idx_samples_run_ts').on(table.runId, table.ts),
  })
);

export const jobs = pgTable(
  'jobs',
  {
    id: uuid('id').primaryKey(),
    runId: uuid('run_id')
      .notNull()
      .references(() => runs.runId),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    finishedAt: timestamp('finished_at', { withTimezone: true }).notNull(),
    latencyMs: integer('latency_ms').notNull(),
    modelId: text('model_id').notNull(),
    promptTokens: integer('prompt_tokens').notNull(),
    completionTokens: integer('completion_tokens').notNull(),
    httpStatus: integer('http_status'),
    errorText: text('error_text'),
  },
  (table) => ({
    runIdx: index('idx_jobs_run').on(table.runId),
  })
);

export type RunRow = typeof runs.$inferSelect;
export type SampleRow = typeof samples.$inferSelect;
export type JobRow = typeof jobs.$inferSelect;
