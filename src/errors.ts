/**
 * Error taxonomy
 * Every failure carries a stable `code` so callers can branch on it
 */

export type DriverErrorCode = 'CONNECTION' | 'PROTOCOL' | 'TIMEOUT' | 'ASSERTION' | 'NOT_FOUND';

export class DriverError extends Error {
  readonly code: DriverErrorCode;

  constructor(args: { code: DriverErrorCode; message: string; cause?: unknown }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = 'DriverError';
    this.code = args.code;
  }
}

export type ConnectionFailureReason =
  | 'missing'
  | 'not-socket'
  | 'owner'
  | 'permissions'
  | 'dir-unreadable'
  | 'dir-owner'
  | 'dir-permissions'
  | 'unreachable'
  | 'closed';

export class ConnectionError extends DriverError {
  readonly reason: ConnectionFailureReason;

  constructor(message: string, reason: ConnectionFailureReason, cause?: unknown) {
    super({ code: 'CONNECTION', message, cause });
    this.name = 'ConnectionError';
    this.reason = reason;
  }
}

export class ProtocolError extends DriverError {
  /** Message reported by the host when it answered `ok: false`. */
  readonly serverError?: string;

  constructor(message: string, options?: { serverError?: string; cause?: unknown }) {
    super({ code: 'PROTOCOL', message, cause: options?.cause });
    this.name = 'ProtocolError';
    this.serverError = options?.serverError;
  }
}

export class TimeoutError extends DriverError {
  readonly timeoutMs: number;
  readonly diagnostic?: string;

  constructor(message: string, timeoutMs: number, diagnostic?: string) {
    super({
      code: 'TIMEOUT',
      message: diagnostic === undefined ? message : `${message}\n\nActual content:\n${diagnostic}`,
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.diagnostic = diagnostic;
  }
}

export class AssertionFailure extends DriverError {
  readonly diagnostic?: string;

  constructor(message: string, diagnostic?: string, cause?: unknown) {
    super({
      code: 'ASSERTION',
      message: diagnostic === undefined ? message : `${message}\n\nActual content:\n${diagnostic}`,
      cause,
    });
    this.name = 'AssertionFailure';
    this.diagnostic = diagnostic;
  }
}

export class NotFoundError extends DriverError {
  constructor(message: string) {
    super({ code: 'NOT_FOUND', message });
    this.name = 'NotFoundError';
  }
}

export function isDriverError(error: unknown): error is DriverError {
  return error instanceof DriverError;
}
