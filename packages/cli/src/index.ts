#!/usr/bin/env -S node --import tsx

// CLI entry point
// - `shapecheck <data_file> <schema_file>` loads both files (JSON or YAML), validates the
//   data against the schema (or a fragment of it via --pointer) and prints a report.
// - Exit status: 0 valid, 1 invalid, 2 bad input or flags, 3 aborted by the step limit.
// - Reports go to stdout; log lines and error views go to stderr.

import fs from 'node:fs';
import { createRequire } from 'node:module';
import { fileURLToPath } from 'node:url';

import { Command, CommanderError } from 'commander';
import {
  ErrorPresenter,
  ExitStatus,
  InternalError,
  ValidationEngine,
  isShapecheckError,
  type BatchVerdict,
  type ShapecheckError,
} from '@shapecheck/core';
import {
  buildReport,
  renderReport,
  type ReportFormat,
} from '@shapecheck/reporter';

import {
  parseEngineOptions,
  resolveLogLevel,
  resolveOutputFormat,
  resolveSyntaxFlag,
  type CliOptions,
} from './flags.js';
import { loadInstance, loadSchema } from './loader.js';
import { createLogger, type Logger } from './logger.js';
import { renderCLIView } from './render.js';

const require = createRequire(import.meta.url);
const cliPkg = require('../package.json') as { version?: string };
const VERSION = typeof cliPkg.version === 'string' ? cliPkg.version : '0.0.0';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function toShapecheckError(error: unknown): ShapecheckError {
  if (isShapecheckError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(
    message || 'Unexpected error',
    error instanceof Error ? error : undefined
  );
}

function reportError(error: unknown, io: CliIO, format: ReportFormat): number {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, {
    colors: process.stderr.isTTY === true,
  });
  const shaped = toShapecheckError(error);

  if (format === 'json') {
    io.stderr(`${JSON.stringify(presenter.formatForJSON(shaped), null, 2)}\n`);
  } else {
    io.stderr(`${renderCLIView(presenter.formatForCLI(shaped))}\n`);
  }
  return shaped.getExitCode();
}

function exitStatusOf(verdict: BatchVerdict | undefined, logger: Logger): number {
  if (!verdict) {
    throw new InternalError('Validation produced no verdict');
  }
  switch (verdict.status) {
    case 'valid':
      logger.info('Data validation successful.');
      return ExitStatus.VALID;
    case 'invalid': {
      const count = verdict.result.failures.length;
      logger.error(
        `Data validation failed with ${count} failure${count === 1 ? '' : 's'}`
      );
      return ExitStatus.INVALID;
    }
    case 'aborted':
      logger.error(verdict.error.message);
      return verdict.error.getExitCode();
  }
}

async function validateFiles(
  dataFile: string,
  schemaFile: string,
  options: CliOptions,
  io: CliIO
): Promise<number> {
  let format: ReportFormat = 'text';
  try {
    format = resolveOutputFormat(options.format);
    const logger = createLogger(resolveLogLevel(options.log_level), io.stderr);
    const engineOptions = parseEngineOptions(options);
    const dataSyntax = resolveSyntaxFlag('--data_type', options.data_type);
    const schemaSyntax = resolveSyntaxFlag('--schema_type', options.schema_type);

    logger.debug(`Loading data from ${dataFile}`);
    const instance = await loadInstance(dataFile, dataSyntax);
    if (instance.isErr()) throw instance.error;

    logger.debug(`Loading schema from ${schemaFile}`);
    const document = await loadSchema(schemaFile, schemaSyntax);
    if (document.isErr()) throw document.error;

    const engine = new ValidationEngine(engineOptions);
    const dialect = engine.dialectOf(document.value);
    logger.debug(
      `Validating with the ${dialect} profile${
        engine.options.dialect === 'auto' ? ' (detected)' : ''
      }, maxDepth=${engine.options.maxDepth}, maxSteps=${engine.options.maxSteps}`
    );

    const verdicts = engine.validateBatch(document.value, [instance.value], {
      pointer: options.pointer,
    });
    const report = buildReport({
      schemaId: schemaFile,
      document: document.value,
      dialect,
      verdicts,
      pointer: options.pointer,
      sources: [dataFile],
    });
    io.stdout(
      `${renderReport(report, format, { colors: options.color === true })}\n`
    );
    return exitStatusOf(verdicts[0], logger);
  } catch (error) {
    return reportError(error, io, format);
  }
}

function createProgram(
  io: CliIO,
  onStatus: (status: number) => void
): Command {
  const program = new Command();

  program
    .name('shapecheck')
    .description(
      'Validates API request/response structures against schema definitions.'
    )
    .version(VERSION, '-V, --version')
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .argument(
      '<data_file>',
      'Path to the API request/response data file (JSON or YAML)'
    )
    .argument(
      '<schema_file>',
      'Path to the OpenAPI or JSON Schema document (JSON or YAML)'
    )
    .option(
      '--data_type <type>',
      'Data file syntax: json|yaml (inferred from the extension if omitted)'
    )
    .option(
      '--schema_type <type>',
      'Schema file syntax: json|yaml (inferred from the extension if omitted)'
    )
    .option(
      '--dialect <name>',
      'Keyword profile: auto|draft-04|draft-06|draft-07|2019-09|2020-12|openapi-3.0|openapi-3.1',
      'auto'
    )
    .option(
      '--pointer <pointer>',
      'Validate against the schema at this JSON Pointer, e.g. #/components/schemas/Pet'
    )
    .option('--format <format>', 'Report format: text|json|markdown', 'text')
    .option('--max-depth <number>', 'Maximum nested $ref evaluations (default: 100)')
    .option(
      '--max-steps <number>',
      'Maximum evaluation steps before aborting (default: 1000000)'
    )
    .option(
      '--log_level <level>',
      'Logging level: DEBUG|INFO|WARNING|ERROR|CRITICAL',
      'INFO'
    )
    .option('--color', 'Color the text report')
    .action(
      async (dataFile: string, schemaFile: string, options: CliOptions) => {
        onStatus(await validateFiles(dataFile, schemaFile, options, io));
      }
    );

  return program;
}

/**
 * Run the command line without touching process state.
 * @returns the exit status
 */
export async function run(
  argv: readonly string[],
  io: CliIO = processIO
): Promise<number> {
  let status: number = ExitStatus.VALID;
  const program = createProgram(io, (next) => {
    status = next;
  });
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return status;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit with 0, usage errors are bad input
      return error.exitCode === 0 ? ExitStatus.VALID : ExitStatus.BAD_INPUT;
    }
    return reportError(error, io, 'text');
  }
}

export async function main(argv: string[] = process.argv): Promise<void> {
  process.exitCode = await run(argv.slice(2));
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
