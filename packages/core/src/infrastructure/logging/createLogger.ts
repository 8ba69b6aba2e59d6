import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

/** Environment variable read for the default log level. */
export const LOG_LEVEL_ENV = 'TYPEDFORM_LOG_LEVEL';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface LoggerOptions {
  /** Minimum level to write. Default: `$TYPEDFORM_LOG_LEVEL`, else `'silent'`. */
  readonly level?: LevelWithSilent;
  /** Logger name. Default: `'typedform'`. */
  readonly name?: string;
}

/**
 * Create a structured JSON logger.
 *
 * The engine is a library embedded in a UI process, so it stays silent unless
 * a level is configured.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'typedform',
    level: options.level ?? levelFromEnv(process.env[LOG_LEVEL_ENV]),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  });
}

/** Parse a level name, falling back to `'silent'` for unset or unknown values. */
export function levelFromEnv(value: string | undefined): LevelWithSilent {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? 'silent';
}
