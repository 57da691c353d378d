/**
 * Logging module facade.
 *
 * One shared pino logger for the whole process, rendered either as
 * colorized text lines or as pino's JSON lines:
 *
 * @example
 * ```typescript
 * import { getLogger, setLevel, beginSubCommandLogging, endSubCommandLogging } from 'logfacade';
 *
 * setLevel('debug');
 * const logger = getLogger();
 *
 * beginSubCommandLogging('build');
 * logger.info('compiling');
 * // INFO : BUILD : compiling
 * endSubCommandLogging();
 * ```
 */

// Shared logger and its configuration
export {
  getLogger,
  createLogger,
  setLevel,
  getLevel,
  getLevels,
  setOutput,
  setFormat,
  beginSubCommandLogging,
  endSubCommandLogging,
  captureOutput,
  captureOutputAsync,
  resetLogger,
  type Logger,
  type LogLevel,
} from './logger.js';

// Formatters
export {
  TextFormatter,
  JsonFormatter,
  createTextFormatter,
  formatLevelTag,
  DEFAULT_TIMESTAMP_FORMAT,
  type FormatterConfig,
  type LogFormatter,
  type LogRecord,
  type TimestampOptions,
} from './formatters.js';

// Destination plumbing (for advanced use cases)
export {
  FormattingDestination,
  MemoryOutput,
  parseSerializedLine,
  type FormattingDestinationOptions,
  type LogOutput,
} from './destination.js';

export { LEVEL_NAMES, parseLevel, isLevelName, type LevelName } from './levels.js';
export { InvalidLevelError } from './errors.js';
export { errorSerializer } from './serializers.js';
