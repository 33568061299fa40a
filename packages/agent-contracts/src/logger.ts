/**
 * @module @loopwright/agent-contracts/logger
 * Logger contract injected into every component.
 */

export type LogMeta = Record<string, unknown>;

export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error | LogMeta): void;
  /** Logger that adds `bindings` to every record */
  child?(bindings: LogMeta): ILogger;
}
