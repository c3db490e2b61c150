import { vi } from 'vitest';
import type { Logger } from '@/observability/logger.js';

/** Logger whose methods are spies. */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
}
