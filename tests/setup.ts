/**
 * Global test setup file
 * Runs before all tests to configure the testing environment
 */

import { vi, beforeEach, afterEach } from 'vitest';

// Set up test environment variables
process.env.NODE_ENV = 'test';
process.env.WHISPER_MODEL = 'tiny';
process.env.WHISPER_DEVICE = 'cpu';
process.env.WHISPER_OUTPUT_DIR = 'test-outputs';
process.env.WHISPER_COMMAND = 'whisper-json';

// Load configuration for tests that need it
import { loadConfig, resetConfig } from '../src/config/index.js';
loadConfig();

// Suppress console output by default
// Tests can override these mocks when they need to test console output
global.console = {
  ...console,
  log: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  info: vi.fn(),
};

beforeEach(() => {
  vi.clearAllMocks();

  // Reload config for each test
  resetConfig();
  loadConfig();
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});
