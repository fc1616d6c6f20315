import { vi } from 'vitest';
import type { Logger } from 'pino';

/**
 * pino stand-in whose child() returns itself, so every component logs here
 */
export function createMockLogger(): Logger {
  return {
    child: vi.fn().mockReturnThis(),
    trace: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}
