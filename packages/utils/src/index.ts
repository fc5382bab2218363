/**
 * @values-schema/utils
 *
 * Common utilities for values-schema packages.
 * This is the foundational package with NO dependencies on other values-schema packages.
 *
 * @package @values-schema/utils
 */

// Leveled stderr logging
export {
  createLogger,
  isLogLevel,
  levelFromEnv,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogCategory,
} from './logger.js';

// Temp directories for file-based tests
export {
  createTempTestDir,
  removeTempTestDir,
  writeFileTree,
} from './test-helpers.js';
