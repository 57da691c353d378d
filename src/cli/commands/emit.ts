import {
  InvalidLevelError,
  beginSubCommandLogging,
  endSubCommandLogging,
  getLevels,
  getLogger,
  parseLevel,
  setLevel,
  type LevelName,
} from '../../utils/logging/index.js';
import { output } from '../output.js';

export interface EmitOptions {
  logLevel?: string;
  subCommand?: string;
}

function resolveLevel(name: string, options: EmitOptions): LevelName | null {
  try {
    if (options.logLevel) {
      setLevel(options.logLevel);
    }
    return parseLevel(name);
  } catch (error) {
    if (error instanceof InvalidLevelError) {
      output.error(error.message, `Valid levels: ${getLevels().join(', ')}`);
      process.exitCode = 1;
      return null;
    }
    throw error;
  }
}

export function emitCommand(level: string, words: string[], options: EmitOptions): void {
  const resolved = resolveLevel(level, options);
  if (!resolved) {
    return;
  }

  const message = words.join(' ');
  const logger = getLogger();

  if (!options.subCommand) {
    logger[resolved](message);
    return;
  }

  beginSubCommandLogging(options.subCommand);
  try {
    logger[resolved](message);
  } finally {
    endSubCommandLogging();
  }
}
