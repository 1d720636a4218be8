/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { formatTable, visibleLength, type Column, type Alignment } from './table.js';

export { safeJsonParse } from './json.js';

export {
  consoleLogger,
  silentLogger,
  createConsoleLogger,
  isLevelEnabled,
  type Logger,
  type LogLevel,
} from './logger.js';
