/**
 * Error hierarchy for annokit
 *
 * Error kinds:
 * - ParseError: malformed source, aborts the file (and a directory walk)
 * - ResolutionError: invalid resolver input (unresolvable names are not errors)
 * - PatchError: reading, formatting or writing a patched file failed
 * - ConfigError: configuration parsing/validation errors
 * - PluginError: a plugin's run failed with an error of its own
 */

export type ErrorCode = 'PARSE_FAILED' | 'RESOLUTION_FAILED' | 'PATCH_FAILED' | 'CONFIG_INVALID' | 'PLUGIN_FAILED';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  line?: number;
  plugin?: string;
  [key: string]: unknown;
}

export abstract class AnnokitError extends Error {
  abstract readonly code: ErrorCode;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.context = context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): { code: ErrorCode; message: string; context: ErrorContext } {
    return { code: this.code, message: this.message, context: this.context };
  }
}

export class ParseError extends AnnokitError {
  readonly code = 'PARSE_FAILED' as const;
}

export class ResolutionError extends AnnokitError {
  readonly code = 'RESOLUTION_FAILED' as const;
}

export class PatchError extends AnnokitError {
  readonly code = 'PATCH_FAILED' as const;

  /** Rewritten text before formatting, when the failure happened after splicing */
  readonly buffer?: string;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown; buffer?: string }) {
    super(message, context, options);
    this.buffer = options?.buffer;
  }
}

export class ConfigError extends AnnokitError {
  readonly code = 'CONFIG_INVALID' as const;
}

export class PluginError extends AnnokitError {
  readonly code = 'PLUGIN_FAILED' as const;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
