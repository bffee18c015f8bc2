/**
 * ErrorPresenter - pure presentation layer for ShapecheckError instances
 * - No business logic; formats into view objects the CLI renders
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  SerializedError,
  ShapecheckError,
} from './errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  source?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: ShapecheckError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      source: error.context?.source,
      workaround: error.context?.suggestion,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout.columns || 80,
    };
  }

  /** Machine-readable form used by `--format json`. */
  formatForJSON(error: ShapecheckError): SerializedError {
    return error.toJSON(this.env);
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    const at = ctx.path ?? ctx.schemaPath;
    if (ctx.line !== undefined) {
      const column = ctx.column !== undefined ? `:${ctx.column}` : '';
      return `Location: line ${ctx.line}${column}${at ? ` (${at})` : ''}`;
    }
    return at ? `Location: ${at}` : undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }
}
