import { vi } from 'vitest';
import type { Logger } from '@/utils/logger';

// 捕获同步调用抛出的错误，未抛出时让用例失败
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

export const createStubLogger = (): Logger => ({
  debug: vi.fn(),
  log: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});
