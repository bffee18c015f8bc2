/**
 * Error hierarchy for hard failures.
 *
 * Constraint violations are never thrown: evaluators return FailureRecords.
 * Only malformed input, bad configuration and the step-limit guard end a
 * call with an exception (or an Err result).
 */

import { ErrorCode, type Severity, getExitCode } from './codes.js';

export interface ErrorContext {
  /** JSON Pointer into the instance, e.g. '/users/0/name' */
  path?: string;
  /** JSON Pointer into the schema document, e.g. '#/properties/name' */
  schemaPath?: string;
  /** Source the input came from (file path, URI) */
  source?: string;
  /** 1-based line/column of a decode error, when the decoder reports one */
  line?: number;
  column?: number;
  limit?: number;
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string };
}

export interface ShapecheckErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

export abstract class ShapecheckError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor({
    message,
    errorCode,
    severity = 'error',
    context,
    cause,
  }: ShapecheckErrorParams) {
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * - dev: includes the stack
   * - prod: omits it
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
    };
    if (this.cause) {
      base.cause = { name: this.cause.name, message: this.cause.message };
    }
    if (env !== 'prod' && this.stack) {
      base.stack = this.stack;
    }
    return base;
  }

  getExitCode(): number {
    return getExitCode(this.errorCode);
  }
}

/**
 * Malformed schema or instance input. A precondition failure: it is reported
 * before validation starts and never mixed into FailureRecords.
 */
export class ParseError extends ShapecheckError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.PARSE_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }
}

/** The global step budget of a single validate call ran out. */
export class LimitExceededError extends ShapecheckError {
  public readonly limit: number;

  constructor(limit: number, context?: ErrorContext) {
    super({
      message: `Validation aborted after ${limit} evaluation steps`,
      errorCode: ErrorCode.LIMIT_EXCEEDED,
      context: {
        ...context,
        limit,
        suggestion:
          'Raise maxSteps or simplify nested anyOf/oneOf combinators',
      },
    });
    this.limit = limit;
  }
}

export class ConfigurationError extends ShapecheckError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.CONFIGURATION_ERROR, context });
  }
}

/** A file or registered document could not be found. */
export class InputNotFoundError extends ShapecheckError {
  constructor(source: string) {
    super({
      message: `File not found: ${source}`,
      errorCode: ErrorCode.INPUT_NOT_FOUND,
      context: { source },
    });
  }
}

/** Wraps anything unexpected so the CLI has one error shape to present. */
export class InternalError extends ShapecheckError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isShapecheckError(value: unknown): value is ShapecheckError {
  return value instanceof ShapecheckError;
}
