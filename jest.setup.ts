/**
 * Jest Setup File
 *
 * Runs before each test file (setupFilesAfterEnv).
 */

import { afterAll, afterEach, beforeAll } from '@jest/globals';
import { resetRiskLimits } from './shared/config/src';
import {
  resetLoggerCache,
  resetPositionSizer,
  resetRiskManager,
  resetStopLossManager,
} from './shared/core/src';

const originalLogLevel = process.env.LOG_LEVEL;

beforeAll(() => {
  // Components built without an injected logger fall back to pino
  process.env.LOG_LEVEL = process.env.DEBUG_TESTS === 'true' ? 'debug' : 'fatal';
});

// Reset singletons so cached limits and loggers never leak between tests
afterEach(() => {
  resetRiskManager();
  resetPositionSizer();
  resetStopLossManager();
  resetRiskLimits();
  resetLoggerCache();
});

afterAll(() => {
  if (originalLogLevel === undefined) {
    delete process.env.LOG_LEVEL;
  } else {
    process.env.LOG_LEVEL = originalLogLevel;
  }
});
