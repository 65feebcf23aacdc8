/**
 * Global test setup, runs before every gateway test file.
 *
 * Silences getLog(). A test that asserts on log calls declares its own
 * vi.mock for the log module, which overrides this one for that file.
 */

import { vi } from 'vitest';

vi.mock('./services/log.js', () => ({
  getLog: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  }),
}));
