/**
 * Error classes shared by the marshaller, the registry and the capabilities
 *
 * Two tiers: programmer errors (ConversionError, ArgumentError) surface as
 * script-level exceptions; OperationalError and its subclasses go to the
 * error channel.
 */

import { ERROR_CODES, type ErrorCode } from "./constants.js";

export class BridgeError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A dynamic value could not be converted to the requested native type
 */
export class ConversionError extends BridgeError {
  constructor(message: string) {
    super(ERROR_CODES.CONVERSION, message);
  }
}

/**
 * Wrong argument count or type at a capability boundary
 */
export class ArgumentError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.ARGUMENT, message, options);
  }
}

export class OperationalError extends BridgeError {}

export class UnknownSessionError extends OperationalError {
  constructor(readonly sessionId: string) {
    super(ERROR_CODES.UNKNOWN_SESSION, `unknown session: ${sessionId}`);
  }
}

export class UnknownRequestError extends OperationalError {
  constructor(readonly requestId: string) {
    super(ERROR_CODES.UNKNOWN_REQUEST, `unknown request: ${requestId}`);
  }
}

export class InvalidOptionsError extends OperationalError {
  constructor(detail: string) {
    super(ERROR_CODES.INVALID_OPTIONS, `invalid request options: ${detail}`);
  }
}

export class TransportError extends OperationalError {
  constructor(context: string, cause?: unknown) {
    super(
      ERROR_CODES.TRANSPORT,
      cause === undefined ? context : `${context}: ${errorMessage(cause)}`,
      { cause }
    );
  }
}

export class InvalidEncodingError extends OperationalError {
  constructor(message: string) {
    super(ERROR_CODES.INVALID_ENCODING, message);
  }
}

/**
 * Render any thrown value as a single line of text
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/**
 * Wrap a failure with context, keeping the cause chain readable
 */
export function withContext(code: ErrorCode, context: string, cause: unknown): OperationalError {
  return new OperationalError(code, `${context}: ${errorMessage(cause)}`, { cause });
}
