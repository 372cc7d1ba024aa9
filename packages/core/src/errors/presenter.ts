/**
 * ErrorPresenter - pure presentation layer for JtdValidateError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  JtdValidateError,
  SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: JtdValidateError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      excerpt: error.context?.excerpt,
      workaround: error.context?.suggestion,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || 80,
    };
  }

  /** Structured form for --debug output; stack only in dev */
  formatForDebug(error: JtdValidateError): SerializedError {
    return error.toJSON(this._env);
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    if (ctx.setting) return `Option: --${ctx.setting}`;
    if (!ctx.source) return undefined;
    const parts = [ctx.source];
    if (ctx.index !== undefined) parts.push(`document #${ctx.index}`);
    if (ctx.offset !== undefined) parts.push(`byte ${ctx.offset}`);
    if (ctx.tokenOffset !== undefined) {
      parts.push(`token at byte ${ctx.tokenOffset}`);
    }
    return `Location: ${parts.join(', ')}`;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}
