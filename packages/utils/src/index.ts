/**
 * @ghscope/utils
 *
 * Common utilities for ghscope packages.
 * This is the foundational package with NO dependencies on other ghscope packages.
 *
 * @package @ghscope/utils
 */

// Response shaping (applied to every tool result)
export {
  clamp,
  truncateText,
  capList,
  TRUNCATION_MARKER,
  type TruncatedText,
  type CappedList
} from './shaping.js';

// Structured stderr logging
export {
  logDebug,
  logWarning,
  logError,
  type LogCategory
} from './logger.js';

// Path cleaning and temp directory helpers
export {
  stripEnclosingQuotes,
  cleanPathInput,
  normalizedTmpdir
} from './path-helpers.js';

// Test helpers (temp directories)
export {
  createTempTestDir,
  removeTempTestDir
} from './test-helpers.js';
