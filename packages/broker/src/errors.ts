/**
 * Error taxonomy for the broker.
 *
 * Steady-state operations report these codes through result values; only
 * `CONFIGURATION_ERROR` is ever thrown, and only while wiring the broker.
 *
 * @module broker/errors
 */

/** Machine-readable broker error codes. */
export type BrokerErrorCode =
  | 'TRANSPORT_ERROR'
  | 'PARSE_ERROR'
  | 'INTEGRITY_ERROR'
  | 'CONFIGURATION_ERROR';

/**
 * Error class for broker failures.
 *
 * Includes a machine-readable `code` for programmatic error handling.
 */
export class BrokerError extends Error {
  constructor(
    message: string,
    public readonly code: BrokerErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BrokerError';
  }
}

/** Human-readable message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
