/**
 * ILogService - structured logging interface shared by every package.
 *
 *   const log = registry.get(Services.Log).child('Retrieval');
 *   log.info('Index built', { chunks: 412 });
 *   // [Retrieval] Index built { chunks: 412 }
 */

export interface ILogService {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Create a child logger scoped to a module.
   * The module name is prepended to all log messages.
   */
  child(module: string): ILogService;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
