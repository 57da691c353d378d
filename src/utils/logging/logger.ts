/**
 * Pino-based shared logger.
 *
 * One root logger per process, created lazily on first access. Its output
 * format, destination and level can be changed at any time afterwards and the
 * change applies to every handle already given out, child loggers included.
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { getEnv, getLogFormat, type Env, type LogFormat } from '../env.js';
import { FormattingDestination, MemoryOutput, type LogOutput } from './destination.js';
import {
  JsonFormatter,
  createTextFormatter,
  type LogFormatter,
  type TimestampOptions,
} from './formatters.js';
import { LEVEL_NAMES, parseLevel, type LevelName } from './levels.js';
import { errorSerializer } from './serializers.js';

export type Logger = PinoLogger;
export type LogLevel = LevelName;

// Module-level state
let rootLogger: PinoLogger | null = null;
let destination = new FormattingDestination({ formatter: createTextFormatter() });
let timestamps: Partial<TimestampOptions> = {};

function formatterFor(format: LogFormat): LogFormatter {
  return format === 'json' ? new JsonFormatter() : createTextFormatter('', timestamps);
}

/**
 * The shared destination, after the logger has applied its startup format.
 * Format changes go through here so that first use cannot overwrite them.
 */
function initializedDestination(): FormattingDestination {
  getLogger();
  return destination;
}

/**
 * Create the Pino logger instance writing through the shared destination.
 */
function createPinoInstance(level: LevelName): PinoLogger {
  const options: LoggerOptions = {
    level,
    // No default fields (pid, hostname)
    base: undefined,
    // ISO timestamps
    timestamp: pino.stdTimeFunctions.isoTime,
    // Level as its label so formatters can map it to a tag
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: errorSerializer,
      error: errorSerializer,
    },
  };

  return pino(options, destination);
}

/**
 * Get the shared logger, creating it on first access.
 *
 * A broken environment never prevents logging: the logger keeps the format
 * LOG_FORMAT asks for, falls back to `info` and reports the problem as a
 * warning.
 */
export function getLogger(): PinoLogger {
  if (rootLogger) {
    return rootLogger;
  }

  let env: Env | null = null;
  let initError: unknown = null;
  try {
    env = getEnv();
  } catch (error) {
    initError = error;
  }

  timestamps = { showTimestamp: env?.LOG_TIMESTAMP ?? false, timeZone: env?.LOG_TIMEZONE };
  destination.setFormatter(formatterFor(env?.LOG_FORMAT ?? getLogFormat()));
  rootLogger = createPinoInstance(env?.LOG_LEVEL ?? 'info');

  if (initError) {
    const message = initError instanceof Error ? initError.message : String(initError);
    rootLogger.warn(`error initializing logger: ${message}`);
  }

  return rootLogger;
}

/**
 * Create a child logger with bound context.
 *
 * Bound fields appear in JSON output only; the text formatter prints the
 * message alone.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ component: 'installer' });
 * logger.info({ version: '1.2.0' }, 'Installing');
 * ```
 */
export function createLogger(bindings: Record<string, unknown>): PinoLogger {
  return getLogger().child(bindings);
}

/**
 * Change the minimum level. Names are case-insensitive and `warning` is an
 * alias of `warn`.
 *
 * @throws InvalidLevelError if the name is unknown; the level is left as it was
 */
export function setLevel(name: string): void {
  const level = parseLevel(name);
  getLogger().level = level;
}

/**
 * Get the current log level.
 */
export function getLevel(): string {
  return getLogger().level;
}

/**
 * All valid level names, most severe first.
 */
export function getLevels(): string[] {
  return [...LEVEL_NAMES];
}

/**
 * Send all future log output to the given sink.
 */
export function setOutput(output: LogOutput): void {
  destination.setOutput(output);
}

/**
 * Switch between structured JSON lines and the untagged text format.
 */
export function setFormat(format: LogFormat): void {
  initializedDestination().setFormatter(formatterFor(format));
}

/**
 * Prefix every following text line with the given sub-command label.
 */
export function beginSubCommandLogging(subCommand: string): void {
  initializedDestination().setFormatter(createTextFormatter(subCommand, timestamps));
}

/**
 * Stop prefixing text lines with a sub-command label.
 */
export function endSubCommandLogging(): void {
  initializedDestination().setFormatter(createTextFormatter('', timestamps));
}

/**
 * Run `action` and return everything it logged.
 *
 * Output goes back to stderr afterwards, also when `action` throws; the error
 * is rethrown.
 */
export function captureOutput(action: () => void): string {
  const buffer = new MemoryOutput();
  destination.setOutput(buffer);
  try {
    action();
  } finally {
    destination.setOutput(process.stderr);
  }
  return buffer.toString();
}

/**
 * Async variant of {@link captureOutput}. Output is restored once the
 * action's promise settles.
 */
export async function captureOutputAsync(action: () => Promise<void>): Promise<string> {
  const buffer = new MemoryOutput();
  destination.setOutput(buffer);
  try {
    await action();
  } finally {
    destination.setOutput(process.stderr);
  }
  return buffer.toString();
}

/**
 * Reset the logger (for testing).
 * Forces recreation of the logger on next access.
 */
export function resetLogger(): void {
  rootLogger = null;
  timestamps = {};
  destination = new FormattingDestination({ formatter: createTextFormatter() });
}
