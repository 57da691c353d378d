/**
 * Custom Pino serializers for structured logging.
 */

/**
 * Error serializer that captures full error details including stack traces
 * and any custom properties attached to the error object (`code`, `level`, ...).
 * pino hands it whatever sits under `err`/`error`; anything that is not an
 * Error is logged as is.
 */
export function errorSerializer(err: unknown): unknown {
  if (!(err instanceof Error)) {
    return err;
  }

  return {
    type: err.constructor.name,
    message: err.message,
    stack: err.stack,
    ...Object.fromEntries(Object.entries(err)),
  };
}
