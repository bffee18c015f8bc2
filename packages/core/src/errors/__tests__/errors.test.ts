import { describe, test, expect } from 'vitest';
import { ErrorCode } from '../codes.js';
import {
  ConfigurationError,
  InternalError,
  LimitExceededError,
  ParseError,
  isShapecheckError,
} from '../errors.js';

describe('error hierarchy', () => {
  test('ParseError defaults to the generic parse code', () => {
    const error = new ParseError({ message: 'Unexpected token' });
    expect(error.errorCode).toBe(ErrorCode.PARSE_ERROR);
    expect(error.name).toBe('ParseError');
    expect(error.getExitCode()).toBe(2);
    expect(isShapecheckError(error)).toBe(true);
  });

  test('LimitExceededError records the limit and a suggestion', () => {
    const error = new LimitExceededError(500);
    expect(error.limit).toBe(500);
    expect(error.message).toBe('Validation aborted after 500 evaluation steps');
    expect(error.context?.limit).toBe(500);
    expect(error.context?.suggestion).toMatch(/maxSteps/);
    expect(error.getExitCode()).toBe(3);
  });

  test('toJSON omits the stack in prod and keeps the cause summary', () => {
    const cause = new TypeError('boom');
    const error = new InternalError('wrapped', cause);
    const prod = error.toJSON('prod');
    expect(prod.stack).toBeUndefined();
    expect(prod.cause).toEqual({ name: 'TypeError', message: 'boom' });
    expect(error.toJSON('dev').stack).toBeTypeOf('string');
  });

  test('plain errors are not ShapecheckErrors', () => {
    expect(isShapecheckError(new Error('x'))).toBe(false);
    expect(isShapecheckError(new ConfigurationError('bad'))).toBe(true);
  });
});
