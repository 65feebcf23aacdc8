/**
 * Scoped loggers for any module.
 * Writes to console until the entry point registers a log service; loggers
 * created before that (module-level `const log = getLog(...)`) forward to the
 * service once it exists.
 *
 *   const log = getLog('Retrieval');
 *   log.info('Index built', { chunks: 412 });
 */

import { hasServiceRegistry, getServiceRegistry } from './registry.js';
import { Services } from './tokens.js';
import type { ILogService, LogLevel } from './log-service.js';

const fallbackLoggers = new Map<string, ILogService>();

function registeredLogger(module: string): ILogService | undefined {
  if (!hasServiceRegistry()) return undefined;
  return getServiceRegistry().tryGet(Services.Log)?.child(module);
}

function createFallbackLogger(module: string): ILogService {
  const write = (level: LogLevel, msg: string, data: unknown): void => {
    const target = registeredLogger(module);
    if (target) {
      target[level](msg, data);
      return;
    }
    const fn = level === 'debug' ? console.debug : level === 'info' ? console.log : level === 'warn' ? console.warn : console.error;
    if (data !== undefined) fn(`[${module}]`, msg, data);
    else fn(`[${module}]`, msg);
  };

  return {
    debug: (msg, data) => write('debug', msg, data),
    info: (msg, data) => write('info', msg, data),
    warn: (msg, data) => write('warn', msg, data),
    error: (msg, data) => write('error', msg, data),
    child: (sub: string) => getLog(`${module}:${sub}`),
  };
}

export function getLog(module: string): ILogService {
  const registered = registeredLogger(module);
  if (registered) return registered;

  let logger = fallbackLoggers.get(module);
  if (!logger) {
    logger = createFallbackLogger(module);
    fallbackLoggers.set(module, logger);
  }
  return logger;
}
