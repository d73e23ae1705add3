/**
 * @docbinder/utils
 *
 * Shared utilities package containing:
 * - File operations
 * - Path utilities
 * - Bounded concurrency
 * - Logging
 */

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  copyFile,
  removePath,
  listFiles,
  isErrnoException,
} from './file.js';

// Path utilities
export {
  getExtension,
  getBasename,
  toPosixRelative,
} from './path.js';

// Time utilities
export {
  formatDuration,
  formatUtcTimestamp,
} from './time.js';

// Concurrency
export { mapConcurrent } from './concurrency.js';

// Logger
export { logger, createLogger, createRunLogger, type Logger, type RunContext } from './logger.js';
