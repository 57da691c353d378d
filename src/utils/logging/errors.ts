/**
 * Errors raised by the logging facade.
 */

/**
 * Thrown when a level name does not match any known severity level.
 */
export class InvalidLevelError extends Error {
  public readonly code = 'INVALID_LOG_LEVEL';

  /**
   * The level name exactly as the caller passed it
   */
  public readonly level: string;

  constructor(level: string) {
    super(`Invalid log level '${level}'`);
    this.name = 'InvalidLevelError';
    this.level = level;
  }
}
