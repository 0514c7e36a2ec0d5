import dotenv from 'dotenv';
import { readFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import pg from 'pg';
import { createLogger } from '../utils/logger.js';

export const MIGRATION_FILE = path.join(process.cwd(), 'services', 'perf-engine', 'db', 'migrations', '001_perf.sql');

/**
 * Apply the telemetry schema. Statements are idempotent (IF NOT EXISTS).
 */
export async function runMigrations(databaseUrl: string, file: string = MIGRATION_FILE): Promise<void> {
  const sqlText = await readFile(file, 'utf-8');
  const client = new pg.Client({ connectionString: databaseUrl });
  await client.connect();
  try {
    await client.query(sqlText);
  } finally {
    await client.end();
  }
}

async function main(): Promise<void> {
  dotenv.config();
  const logger = createLogger({ name: 'perf-migrate' });
  const databaseUrl = process.env['PERF_DB_URL'];
  if (!databaseUrl) {
    logger.error('PERF_DB_URL environment variable not set');
    process.exit(1);
  }

  try {
    await runMigrations(databaseUrl);
    logger.info('Database migration completed successfully');
  } catch (error) {
    logger.error({ err: error }, 'Migration failed');
    process.exit(1);
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await main();
}
