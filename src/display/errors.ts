/**
 * Error types raised by the tube and display model.
 *
 * Every error carries a stable `code` so remote surfaces (JSON-RPC host,
 * MCP/REST server) can map failures without matching on message text.
 */

export type NixieDisplayErrorCode =
  | 'invalid_argument'
  | 'out_of_range'
  | 'transport_unavailable'
  | 'transport_error';

export class NixieDisplayError extends Error {
  readonly code: NixieDisplayErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: NixieDisplayErrorCode, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'NixieDisplayError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A value has the wrong type or shape: a non-boolean decimal point flag,
 * a non-integer level, a tube count below one, a negative display number.
 */
export class InvalidArgumentError extends NixieDisplayError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'invalid_argument', context);
    this.name = 'InvalidArgumentError';
  }
}

export class OutOfRangeError extends NixieDisplayError {
  /** Field whose bound was exceeded, e.g. `brightness` or `displayNumber`. */
  readonly field: string;

  constructor(field: string, message: string, context?: Record<string, unknown>) {
    super(message, 'out_of_range', { field, ...context });
    this.name = 'OutOfRangeError';
    this.field = field;
  }
}

/**
 * The transport is missing, could not be opened, or the display was closed.
 */
export class TransportUnavailableError extends NixieDisplayError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'transport_unavailable', context, cause);
    this.name = 'TransportUnavailableError';
  }
}

export class TransportError extends NixieDisplayError {
  constructor(message: string, cause: unknown, context?: Record<string, unknown>) {
    super(message, 'transport_error', context, cause);
    this.name = 'TransportError';
  }

  static wrap(operation: string, cause: unknown, target?: string): TransportError {
    return new TransportError(`Transport ${operation} failed: ${getErrorMessage(cause)}`, cause, {
      operation,
      target
    });
  }
}

export function isNixieDisplayError(error: unknown): error is NixieDisplayError {
  return error instanceof NixieDisplayError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
