/**
 * Test Setup
 * Global test configuration and utilities
 */

import { vi } from 'vitest';
import pino from 'pino';
import { setLogger } from '../src/core/logger.js';

// Keep component loggers off disk and off the console
setLogger(pino({ level: 'silent' }));

// Mock nanoid for deterministic IDs in tests
vi.mock('nanoid', () => {
  let counter = 0;
  return {
    nanoid: () => `test-id-${++counter}`,
  };
});
