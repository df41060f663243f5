/**
 * Process logger
 *
 * Builds the pino logger handed to the controller and its collaborators.
 * Log level can be controlled via the ROLLOUT_LOG_LEVEL environment variable.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  /** Component name recorded on every line */
  name?: string;
  /** Overrides ROLLOUT_LOG_LEVEL */
  level?: LevelWithSilent;
}

/**
 * Create the root logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'rollout-controller' });
 * logger.info({ rolloutId }, 'Rollout started');
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.ROLLOUT_LOG_LEVEL?.toLowerCase();
  const level = options.level ?? (isLevel(envLevel) ? envLevel : 'info');

  return pino({
    name: options.name ?? 'progressive-rollout',
    level,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
