import { ErrorCode } from '../errors/codes.js';
import type { ParseError } from '../errors/errors.js';
import type { Result } from '../types/result.js';
import { decodeInput, ensureJsonValue, type SourceSyntax } from './decode.js';
import type { Instance } from './json.js';

export interface ParseInstanceOptions {
  syntax?: SourceSyntax;
  source?: string;
}

/**
 * Convert raw data (text, bytes or a decoded value) into an Instance.
 * A failure here is a precondition failure, not a schema violation.
 */
export function parseInstance(
  raw: unknown,
  options: ParseInstanceOptions = {}
): Result<Instance, ParseError> {
  const decodeOptions = {
    ...options,
    errorCode: ErrorCode.INSTANCE_PARSE_FAILED,
  };
  const decoded = decodeInput(raw, decodeOptions);
  if (decoded.isErr()) return decoded;
  return ensureJsonValue(decoded.value, decodeOptions);
}
