/**
 * Logging for agent runs.
 *
 * Backed by pino: JSON records on stderr with ISO timestamps. Level comes from
 * the caller, then LOG_LEVEL, then 'info' so default progress lines show;
 * tests run silent.
 */

import pino, { type Logger as PinoLogger, type LevelWithSilent } from 'pino';
import type { ILogger, LogMeta } from '@loopwright/agent-contracts';

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

export function resolveLogLevel(
  options: LoggerOptions,
  env: Record<string, string | undefined> = process.env,
): LevelWithSilent {
  if (options.level) {return options.level;}
  if (env.NODE_ENV === 'test') {return 'silent';}
  const fromEnv = env.LOG_LEVEL;
  return isLevel(fromEnv) ? fromEnv : 'info';
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class PinoAgentLogger implements ILogger {
  constructor(private readonly pino: PinoLogger) {}

  debug(message: string, meta?: LogMeta): void {
    this.pino.debug(meta ?? {}, message);
  }

  info(message: string, meta?: LogMeta): void {
    this.pino.info(meta ?? {}, message);
  }

  warn(message: string, meta?: LogMeta): void {
    this.pino.warn(meta ?? {}, message);
  }

  error(message: string, error?: Error | LogMeta): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, message);
      return;
    }
    this.pino.error(error ?? {}, message);
  }

  child(bindings: LogMeta): ILogger {
    return new PinoAgentLogger(this.pino.child(bindings));
  }
}

// =============================================================================
// Factories
// =============================================================================

export function createLogger(options: LoggerOptions = {}): ILogger {
  const instance = pino(
    {
      level: resolveLogLevel(options),
      name: options.name ?? 'loopwright',
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    pino.destination(2),
  );
  return new PinoAgentLogger(instance);
}

/**
 * Logger that drops everything
 */
export function createNoopLogger(): ILogger {
  const noop = (): void => {};
  const logger: ILogger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
