/**
 * Pino destination that re-renders each serialized line through a
 * swappable formatter before handing it to a swappable output.
 *
 * pino serializes every call to one JSON line and writes it here
 * synchronously. Because the formatter and output live on this object rather
 * than on the logger, replacing either one affects every logger handle and
 * child logger already in circulation.
 */

import type { DestinationStream, Logger } from 'pino';
import { z } from 'zod';
import type { LogFormatter, LogRecord } from './formatters.js';

/**
 * Anything text can be written to: process.stderr, a file stream, a buffer.
 */
export interface LogOutput {
  write(chunk: string): unknown;
}

const SerializedLineSchema = z
  .object({
    level: z.union([z.string(), z.number()]),
    time: z.union([z.string(), z.number()]).optional(),
    msg: z.string().optional(),
  })
  .passthrough();

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

/**
 * Rebuild a record from a line pino wrote. Returns null for anything that
 * is not a pino record.
 */
export function parseSerializedLine(line: string): LogRecord | null {
  const result = SerializedLineSchema.safeParse(parseJson(line));
  if (!result.success) {
    return null;
  }

  const { level, time, msg, ...fields } = result.data;
  return {
    level: String(level),
    time: time === undefined ? new Date() : new Date(time),
    message: msg ?? '',
    fields,
    line: line.endsWith('\n') ? line : `${line}\n`,
  };
}

export interface FormattingDestinationOptions {
  formatter: LogFormatter;
  output?: LogOutput;
}

// pino's metadata flag (pino.symbols.needsMetadataGsym)
export const NEEDS_METADATA = Symbol.for('pino.metadata');

export class FormattingDestination implements DestinationStream {
  /** Ask pino to set lastLevel and lastLogger before every write */
  readonly [NEEDS_METADATA] = true;
  lastLevel?: number;
  lastLogger?: Logger;

  private formatter: LogFormatter;
  private output: LogOutput;

  constructor(options: FormattingDestinationOptions) {
    this.formatter = options.formatter;
    this.output = options.output ?? process.stderr;
  }

  write(line: string): void {
    const record = parseSerializedLine(line);
    const level = this.takeLevelLabel();
    if (record && level) {
      // A caller field named "level" is serialized after pino's own
      record.level = level;
    }
    // Lines that are not pino records go out as they came in
    this.output.write(record ? this.formatter.format(record) : line);
  }

  private takeLevelLabel(): string | undefined {
    const { lastLevel, lastLogger } = this;
    this.lastLevel = undefined;
    this.lastLogger = undefined;
    if (lastLevel === undefined || !lastLogger) {
      return undefined;
    }
    return lastLogger.levels.labels[lastLevel];
  }

  setFormatter(formatter: LogFormatter): void {
    this.formatter = formatter;
  }

  setOutput(output: LogOutput): void {
    this.output = output;
  }

  getOutput(): LogOutput {
    return this.output;
  }
}

/**
 * In-memory output used to capture everything written during a scope.
 */
export class MemoryOutput implements LogOutput {
  private chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  toString(): string {
    return this.chunks.join('');
  }
}
