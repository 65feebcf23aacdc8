/**
 * getLog() Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockChild = vi.fn();
const mockLogService = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: mockChild,
};

const mockRegistry = {
  tryGet: vi.fn((): typeof mockLogService | null => mockLogService),
};

vi.mock('./registry.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./registry.js')>();
  return {
    ...actual,
    hasServiceRegistry: vi.fn(() => false),
    getServiceRegistry: vi.fn(() => mockRegistry),
  };
});

import { getLog } from './get-log.js';
import { hasServiceRegistry } from './registry.js';

describe('getLog()', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(hasServiceRegistry).mockReturnValue(false);
    mockRegistry.tryGet.mockReturnValue(mockLogService);
  });

  describe('fallback logger', () => {
    it('prefixes console output with the module name', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      getLog('Retrieval').warn('embeddings disabled');
      expect(spy).toHaveBeenCalledWith('[Retrieval]', 'embeddings disabled');
      spy.mockRestore();
    });

    it('passes data through when provided', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const data = { chunks: 3 };
      getLog('Loader').info('loaded', data);
      expect(spy).toHaveBeenCalledWith('[Loader]', 'loaded', data);
      spy.mockRestore();
    });

    it('child() nests the module name', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      getLog('Agent').child('Tools').error('failed');
      expect(spy).toHaveBeenCalledWith('[Agent:Tools]', 'failed');
      spy.mockRestore();
    });

    it('caches loggers per module', () => {
      expect(getLog('Cached')).toBe(getLog('Cached'));
      expect(getLog('A')).not.toBe(getLog('B'));
    });
  });

  describe('with a registered log service', () => {
    it('returns a child of the registered service', () => {
      const childLogger = { ...mockLogService };
      mockChild.mockReturnValue(childLogger);
      vi.mocked(hasServiceRegistry).mockReturnValue(true);

      expect(getLog('Chat')).toBe(childLogger);
      expect(mockChild).toHaveBeenCalledWith('Chat');
    });

    it('falls back to console when the registry has no log service', () => {
      vi.mocked(hasServiceRegistry).mockReturnValue(true);
      mockRegistry.tryGet.mockReturnValue(null);

      const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
      getLog('Early').debug('before startup');
      expect(spy).toHaveBeenCalledWith('[Early]', 'before startup');
      spy.mockRestore();
    });

    it('forwards loggers created before the service was registered', () => {
      const early = getLog('Loader');
      const childLogger = { ...mockLogService, info: vi.fn() };
      mockChild.mockReturnValue(childLogger);
      vi.mocked(hasServiceRegistry).mockReturnValue(true);

      early.info('loaded', { files: 2 });

      expect(mockChild).toHaveBeenCalledWith('Loader');
      expect(childLogger.info).toHaveBeenCalledWith('loaded', { files: 2 });
    });
  });
});
