/**
 * ErrorPresenter - pure presentation layer for PubgenError instances
 * - No business logic; picks the fields a terminal renderer needs
 */

import type { ErrorCode } from './codes';
import type { PubgenError } from '../types/errors';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  code: ErrorCode;
  message: string;
  /** Option that carried the bad value, with the value as JSON text. */
  setting?: { name: string; value: string };
  /** File the failure concerns: the output document or the term bank. */
  file?: string;
  hint?: string;
  cause?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: PubgenError): CLIErrorView {
    return {
      code: error.errorCode,
      message: error.message,
      setting: this.#formatSetting(error),
      file: error.context?.path,
      hint: error.context?.suggestion,
      cause: this.#formatCause(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  #formatSetting(error: PubgenError): CLIErrorView['setting'] {
    const ctx = error.context;
    if (!ctx?.setting || !('value' in ctx)) return undefined;
    return {
      name: ctx.setting,
      value: JSON.stringify(ctx.value) ?? String(ctx.value),
    };
  }

  #formatCause(error: PubgenError): string | undefined {
    // Causes carry raw filesystem messages; keep them out of prod output
    if (this.env === 'prod') return undefined;
    return error.cause instanceof Error ? error.cause.message : undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }
}
