/**
 * Error hierarchy for pubgen
 * Provides structured error handling with stable codes and context
 */

import { ErrorCode, getExitCode } from '../errors/codes';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  setting?: string; // Option or flag that carried the bad value
  value?: unknown; // Problematic value
  path?: string; // Filesystem path involved in the failure
  suggestion?: string; // Short hint surfaced by the presenter
  [key: string]: unknown;
}

export interface PubgenErrorParams {
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Base error class for all pubgen errors
 */
export abstract class PubgenError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly context?: ErrorContext;

  constructor(params: PubgenErrorParams) {
    const { message, errorCode, context, cause } = params;
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return getExitCode(this.errorCode);
  }
}

/**
 * Configuration errors (unknown size tier, invalid flags, malformed term bank)
 */
export class ConfigError extends PubgenError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: unknown;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_OPTION,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Generation errors: precondition violations in the synthesis helpers
 */
export class GenerationError extends PubgenError {
  constructor(params: {
    message: string;
    context?: ErrorContext;
    cause?: unknown;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.GENERATION_PRECONDITION_FAILED,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Output errors: serialization or filesystem failures while writing a document
 */
export class OutputError extends PubgenError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: unknown;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.OUTPUT_WRITE_FAILED,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Internal error used to wrap anything that is not a PubgenError
 */
export class InternalError extends PubgenError {
  constructor(message: string, cause?: unknown) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isPubgenError(value: unknown): value is PubgenError {
  return value instanceof PubgenError;
}
