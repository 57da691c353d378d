/**
 * Formatters turn a parsed pino record into the text written to the output.
 */

import { DateTime } from 'luxon';

/**
 * A single log call as seen by a formatter.
 */
export interface LogRecord {
  level: string;
  time: Date;
  message: string;
  /** Every bound or call-site field other than level, time and msg */
  fields: Record<string, unknown>;
  /** The newline-terminated JSON line pino serialized */
  line: string;
}

export interface LogFormatter {
  format(record: LogRecord): string;
}

export interface FormatterConfig {
  showLevel: boolean;
  showTimestamp: boolean;
  /** Sub-command label printed after the level; empty for none */
  subCommand: string;
  /** luxon format tokens */
  timestampFormat: string;
  /** IANA zone for timestamps; system zone when unset */
  timeZone?: string;
}

export const DEFAULT_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

// ANSI color codes, emitted regardless of whether the output is a TTY
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
};

function colorize(color: string, text: string): string {
  return `${color}${text}${colors.reset}`;
}

const levelTags: Record<string, { tag: string; color: string }> = {
  INFO: { tag: 'INFO ', color: colors.green },
  WARN: { tag: 'WARN ', color: colors.yellow },
  WARNING: { tag: 'WARN ', color: colors.yellow },
  DEBUG: { tag: 'DEBUG', color: colors.cyan },
  ERROR: { tag: 'ERROR', color: colors.red },
  FATAL: { tag: 'FATAL', color: colors.red },
};

/**
 * Render the colorized, fixed-width severity tag for a level.
 * Levels without a dedicated tag print their own name in red.
 */
export function formatLevelTag(level: string): string {
  const upper = level.toUpperCase();
  const known = levelTags[upper];
  if (known) {
    return colorize(known.color, known.tag);
  }
  return colorize(colors.red, upper);
}

/**
 * Human-readable formatter: one colorized line per line of the message.
 *
 * @example
 * ```
 * INFO : BUILD : compiling sources
 * ```
 */
export class TextFormatter implements LogFormatter {
  readonly config: Readonly<FormatterConfig>;

  constructor(config: Partial<FormatterConfig> = {}) {
    this.config = Object.freeze({
      showLevel: config.showLevel ?? true,
      showTimestamp: config.showTimestamp ?? false,
      subCommand: config.subCommand ?? '',
      timestampFormat: config.timestampFormat ?? DEFAULT_TIMESTAMP_FORMAT,
      timeZone: config.timeZone,
    });
  }

  format(record: LogRecord): string {
    const { showLevel, showTimestamp, subCommand } = this.config;
    const parts: string[] = [];

    for (const fragment of record.message.split('\n')) {
      if (showLevel) {
        parts.push(formatLevelTag(record.level), ': ');
      }
      if (subCommand !== '') {
        parts.push(colorize(colors.blue, subCommand.toUpperCase()), ' : ');
      }
      if (showTimestamp) {
        parts.push(this.formatTimestamp(record.time), ' - ');
      }

      parts.push(fragment);

      if (!fragment.endsWith('\n')) {
        parts.push('\n');
      }
    }

    return parts.join('');
  }

  private formatTimestamp(time: Date): string {
    const { timestampFormat, timeZone } = this.config;
    const dateTime = DateTime.fromJSDate(time);
    return (timeZone ? dateTime.setZone(timeZone) : dateTime).toFormat(timestampFormat);
  }
}

/**
 * Structured formatter: passes pino's own JSON line through untouched.
 */
export class JsonFormatter implements LogFormatter {
  format(record: LogRecord): string {
    return record.line;
  }
}

export type TimestampOptions = Pick<FormatterConfig, 'showTimestamp' | 'timeZone'>;

/**
 * Create a text formatter for the shared logger, tagged with `subCommand`
 * when one is given. Timestamps are off unless requested.
 */
export function createTextFormatter(
  subCommand = '',
  timestamps: Partial<TimestampOptions> = {}
): TextFormatter {
  return new TextFormatter({
    subCommand,
    showTimestamp: timestamps.showTimestamp ?? false,
    timeZone: timestamps.timeZone,
  });
}
