/**
 * LogService implementation
 *
 * Two output modes:
 * - Development: readable lines with a module prefix
 * - Production (or LOG_FORMAT=json): one JSON object per line
 *
 *   const log = createLogService({ level: 'info' });
 *   const chatLog = log.child('Chat');
 *   chatLog.info('Answered question');
 *   // Dev:  [Chat] Answered question
 *   // Prod: {"level":"info","ts":"...","module":"Chat","msg":"Answered question"}
 */

import type { ILogService, LogLevel } from '@wetlands/core';

export interface LogServiceOptions {
  level?: LogLevel;
  json?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

export class LogService implements ILogService {
  private readonly levelName: LogLevel;
  private readonly module: string | null;
  private readonly json: boolean;

  constructor(options?: LogServiceOptions & { module?: string }) {
    this.levelName = options?.level ?? 'info';
    this.module = options?.module ?? null;
    this.json = options?.json ?? process.env.NODE_ENV === 'production';
  }

  debug(message: string, data?: unknown): void {
    if (this.enabled('debug')) this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    if (this.enabled('info')) this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    if (this.enabled('warn')) this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(module: string): ILogService {
    return new LogService({
      level: this.levelName,
      json: this.json,
      module: this.module ? `${this.module}:${module}` : module,
    });
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[this.levelName] <= LOG_LEVELS[level];
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    const fn =
      level === 'error' ? console.error : level === 'warn' ? console.warn : level === 'debug' ? console.debug : console.log;

    if (this.json) {
      const record = isRecord(data)
        ? data
        : data instanceof Error
          ? { error: data.message }
          : data !== undefined
            ? { data }
            : {};
      fn(
        JSON.stringify({
          level,
          ts: new Date().toISOString(),
          ...(this.module ? { module: this.module } : {}),
          msg: message,
          ...record,
        })
      );
    } else {
      const prefix = this.module ? `[${this.module}] ` : '';
      if (data !== undefined) {
        fn(`${prefix}${message}`, data);
      } else {
        fn(`${prefix}${message}`);
      }
    }
  }
}

export function createLogService(options?: LogServiceOptions): ILogService {
  return new LogService(options);
}
