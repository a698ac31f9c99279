import { afterEach, beforeEach, vi } from 'vitest';

beforeEach(() => {
  vi.clearAllMocks();
});

// Tests that switch to fake timers must not leak them into the next file.
afterEach(() => {
  vi.useRealTimers();
});

// Suppress console output; winston is already silenced via LOG_ENABLED.
global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};
