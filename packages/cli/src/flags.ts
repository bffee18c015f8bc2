import {
  ConfigurationError,
  isDialect,
  type EngineOptions,
  type SourceSyntax,
} from '@shapecheck/core';
import { isReportFormat, type ReportFormat } from '@shapecheck/reporter';

import { isLogLevel, type LogLevel } from './logger.js';

/**
 * CLI options as Commander hands them over. Flags spelled with an
 * underscore keep it in their attribute name.
 */
export interface CliOptions {
  schema_type?: string;
  data_type?: string;
  log_level?: string;
  dialect?: string;
  pointer?: string;
  format?: string;
  maxDepth?: string | number;
  maxSteps?: string | number;
  color?: boolean;
  [key: string]: unknown;
}

/**
 * Resolve a --schema_type / --data_type value. Undefined means "infer from
 * the file extension".
 */
export function resolveSyntaxFlag(
  flag: string,
  value: unknown
): SourceSyntax | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const raw = String(value).toLowerCase();
  if (raw === 'json' || raw === 'yaml') {
    return raw;
  }
  if (raw === 'yml') {
    return 'yaml';
  }
  throw new ConfigurationError(
    `Invalid ${flag} value "${String(value)}". Expected "json" or "yaml".`,
    { option: flag, value: String(value) }
  );
}

export function resolveLogLevel(value: unknown): LogLevel {
  if (value === undefined || value === null || value === '') {
    return 'INFO';
  }
  const raw = String(value).toUpperCase();
  if (isLogLevel(raw)) {
    return raw;
  }
  throw new ConfigurationError(
    `Invalid --log_level value "${String(value)}". Expected one of DEBUG, INFO, WARNING, ERROR, CRITICAL.`,
    { option: '--log_level', value: String(value) }
  );
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): ReportFormat {
  if (value === undefined || value === null || value === '') {
    return 'text';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'md') {
    return 'markdown';
  }
  if (isReportFormat(raw)) {
    return raw;
  }
  throw new ConfigurationError(
    `Invalid --format value "${String(value)}". Supported formats are "text", "json" and "markdown".`,
    { option: '--format', value: String(value) }
  );
}

function toLimit(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  return typeof value === 'number' ? value : Number(value.trim() || Number.NaN);
}

/**
 * Map CLI flags onto engine options. Limits are handed over as numbers and
 * checked by the engine, so a bad --max-depth fails with the same
 * ConfigurationError as a bad `maxDepth` option.
 */
export function parseEngineOptions(options: CliOptions): EngineOptions {
  const engineOptions: EngineOptions = {};

  if (options.dialect !== undefined && options.dialect !== 'auto') {
    const dialect = options.dialect.toLowerCase();
    if (!isDialect(dialect)) {
      throw new ConfigurationError(
        `Invalid --dialect value "${options.dialect}". Expected "auto", draft-04, draft-06, draft-07, 2019-09, 2020-12, openapi-3.0 or openapi-3.1.`,
        { option: '--dialect', value: options.dialect }
      );
    }
    engineOptions.dialect = dialect;
  }

  const maxDepth = toLimit(options.maxDepth);
  if (maxDepth !== undefined) {
    engineOptions.maxDepth = maxDepth;
  }
  const maxSteps = toLimit(options.maxSteps);
  if (maxSteps !== undefined) {
    engineOptions.maxSteps = maxSteps;
  }

  return engineOptions;
}
