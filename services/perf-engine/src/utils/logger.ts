import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  name?: string;
  level?: string;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(level: string | undefined): LevelWithSilent {
  const candidate = (level ?? process.env['LOG_LEVEL'] ?? 'info').toLowerCase();
  return LEVELS.find((known) => known === candidate) ?? 'info';
}

/**
 * Create the root logger for a process. Components take child loggers from it
 * so every line carries the component name.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'perf-engine',
    level: resolveLevel(options.level),
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
