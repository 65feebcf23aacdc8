import { ServiceToken } from './registry.js';
import type { ILogService } from './log-service.js';

/**
 * Service tokens for the global registry.
 */
export const Services = {
  /** Structured logging */
  Log: new ServiceToken<ILogService>('log'),
} as const;
