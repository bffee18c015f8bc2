/**
 * Error Code Infrastructure
 * Stable error codes and the CLI exit codes they map to.
 */

export type Severity = 'info' | 'warn' | 'error';

export enum ErrorCode {
  // Input errors (E400–E499): raised before any validation starts
  PARSE_ERROR = 'E400',
  SCHEMA_PARSE_FAILED = 'E401',
  INSTANCE_PARSE_FAILED = 'E402',
  INPUT_NOT_FOUND = 'E403',

  // Resource guards (E100–E199)
  LIMIT_EXCEEDED = 'E100',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

/**
 * Exit status of the `shapecheck` command.
 * 0 and 1 are verdicts; everything else means no verdict was reached.
 */
export const ExitStatus = {
  VALID: 0,
  INVALID: 1,
  BAD_INPUT: 2,
  ABORTED: 3,
  INTERNAL: 70,
} as const;

export type ExitStatus = (typeof ExitStatus)[keyof typeof ExitStatus];

export const EXIT_CODES = {
  [ErrorCode.PARSE_ERROR]: ExitStatus.BAD_INPUT,
  [ErrorCode.SCHEMA_PARSE_FAILED]: ExitStatus.BAD_INPUT,
  [ErrorCode.INSTANCE_PARSE_FAILED]: ExitStatus.BAD_INPUT,
  [ErrorCode.INPUT_NOT_FOUND]: ExitStatus.BAD_INPUT,
  [ErrorCode.LIMIT_EXCEEDED]: ExitStatus.ABORTED,
  [ErrorCode.CONFIGURATION_ERROR]: ExitStatus.BAD_INPUT,
  [ErrorCode.INTERNAL_ERROR]: ExitStatus.INTERNAL,
} satisfies Record<ErrorCode, ExitStatus>;

export function getExitCode(code: ErrorCode): ExitStatus {
  return EXIT_CODES[code];
}
