import { describe, test, expect } from 'vitest';
import {
  ErrorCode,
  EXIT_CODES,
  ExitStatus,
  getExitCode,
  type Severity,
} from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    expect(new Set(codes).size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    expect(Object.keys(EXIT_CODES).length).toBe(enumCodes.length);
    for (const code of enumCodes) {
      expect(EXIT_CODES[code]).toBeTypeOf('number');
    }
  });

  test('input errors exit with 2, never with a verdict status', () => {
    expect(getExitCode(ErrorCode.SCHEMA_PARSE_FAILED)).toBe(2);
    expect(getExitCode(ErrorCode.INSTANCE_PARSE_FAILED)).toBe(2);
    expect(getExitCode(ErrorCode.INPUT_NOT_FOUND)).toBe(2);
    for (const exit of Object.values(EXIT_CODES)) {
      expect(exit).not.toBe(ExitStatus.VALID);
      expect(exit).not.toBe(ExitStatus.INVALID);
    }
  });

  test('the step-limit guard has its own exit status', () => {
    expect(getExitCode(ErrorCode.LIMIT_EXCEEDED)).toBe(ExitStatus.ABORTED);
  });

  test('Severity type is exported and constrained', () => {
    const sev: Severity = 'warn';
    expect(sev).toBe('warn');
  });
});
