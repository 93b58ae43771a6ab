/**
 * Subsystem Logging
 *
 * Diagnostic logger shared by every monitor component. Each subsystem gets a
 * pino child logger tagged with its name; output is JSON on stderr so that the
 * report written to stdout stays clean.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type LogMeta = Record<string, unknown>;

export interface SubsystemLogger {
  readonly subsystem: string;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Resolves the root log level from the environment
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  const match = LEVELS.find(level => level === requested);
  if (match) {
    return match;
  }
  // Vitest sets VITEST; keep test output readable unless LOG_LEVEL asks otherwise
  return env.VITEST ? 'silent' : 'warn';
}

let rootLogger: Logger | undefined;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(
      {
        name: 'host-monitor',
        level: resolveLogLevel(),
        base: { pid: process.pid },
      },
      pino.destination({ dest: 2, sync: true }),
    );
  }
  return rootLogger;
}

/**
 * Creates a logger bound to a named subsystem, e.g. `monitor/sampler`
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const child = getRootLogger().child({ subsystem });

  const write = (level: 'debug' | 'info' | 'warn' | 'error' | 'fatal') =>
    (message: string, meta?: LogMeta): void => {
      if (meta) {
        child[level](meta, message);
      } else {
        child[level](message);
      }
    };

  return {
    subsystem,
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    fatal: write('fatal'),
  };
}
