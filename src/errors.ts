/**
 * Structured error classes for the socket client.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  NOT_CONNECTED: 'NOT_CONNECTED',
  MALFORMED_ENVELOPE: 'MALFORMED_ENVELOPE',
  TIMEOUT: 'TIMEOUT',
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  REPLY_ERROR: 'REPLY_ERROR',
  CHANNEL_STATE: 'CHANNEL_STATE',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class with code property.
 */
abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when sending without an open transport.
 */
export class NotConnectedError extends BaseError {
  readonly code = 'NOT_CONNECTED' as const;

  constructor(message = 'Socket is not connected') {
    super(message);
  }
}

/**
 * Thrown when an incoming frame is not a valid envelope.
 */
export class MalformedEnvelopeError extends BaseError {
  readonly code = 'MALFORMED_ENVELOPE' as const;

  constructor(message: string) {
    super(`Malformed envelope! ${message}`);
  }
}

/**
 * Thrown when a push gets no reply in time.
 */
export class TimeoutError extends BaseError {
  readonly code = 'TIMEOUT' as const;

  constructor(message = 'Request timed out') {
    super(message);
  }
}

/**
 * Thrown when the connection drops under a pending push.
 */
export class ConnectionError extends BaseError {
  readonly code = 'CONNECTION_FAILED' as const;

  constructor(message = 'Connection failed') {
    super(message);
  }
}

/**
 * Thrown when the server answers a push with a non-`ok` status.
 */
export class ReplyError extends BaseError {
  readonly code = 'REPLY_ERROR' as const;
  readonly status: string;
  readonly response: unknown;

  constructor(status: string, response: unknown) {
    super(`Reply status "${status}"`);
    this.status = status;
    this.response = response;
  }

  override toJSON() {
    return { ...super.toJSON(), status: this.status, response: this.response };
  }
}

/**
 * Thrown when a channel operation is not valid in the channel's state.
 */
export class ChannelStateError extends BaseError {
  readonly code = 'CHANNEL_STATE' as const;

  constructor(message: string) {
    super(message);
  }
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
