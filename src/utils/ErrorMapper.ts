/**
 * @fileoverview Error mapping and handling utilities.
 *
 * Turns thrown values into log lines and tags failures with the
 * generation they happened in.
 *
 * @module utils/ErrorMapper
 */

function describeError(e: unknown): string {
  if (e instanceof Error) {
    return e.stack ? `${e.message}\n${e.stack}` : e.message;
  }
  return String(e);
}

/**
 * Error handling utilities for the generation loop.
 *
 * @example
 * const run = ErrorMapper.wrapGeneration((generation: number) => {
 *   colony.runGeneration(20, traversal, scoring);
 * });
 */
export const ErrorMapper = {
  /**
   * Formats any thrown value as a single log message.
   *
   * Errors include their stack when one is available.
   */
  describe: describeError,

  /**
   * Wraps a per-generation function so a failure is logged with the
   * generation number before it propagates to the caller.
   *
   * @param fn - Function receiving the generation number
   * @returns Wrapped function with the same signature
   */
  wrapGeneration<T>(fn: (generation: number) => T): (generation: number) => T {
    return (generation: number): T => {
      try {
        return fn(generation);
      } catch (e) {
        console.error(`Error in generation ${generation}: ${describeError(e)}`);
        throw e;
      }
    };
  },
};
