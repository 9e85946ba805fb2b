/**
 * @fileoverview Error codes and the package error class
 *
 * Only caller mistakes are thrown. A closed endpoint is never an error:
 * it surfaces as a `'closed'` status from the channel operations.
 */

export enum ErrorCode {
  INVALID_DELAY = 'INVALID_DELAY',
  INVALID_CAPACITY = 'INVALID_CAPACITY',
  CONCURRENT_RECEIVE = 'CONCURRENT_RECEIVE',
  SENDER_CLOSED = 'SENDER_CLOSED'
}

export class RateLimitedChannelError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Readonly<Record<string, unknown>>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'RateLimitedChannelError';
  }

  /**
   * Plain-object form for structured logs.
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
      ...(this.cause !== undefined ? { cause: String(this.cause) } : {})
    };
  }
}
