/**
 * Structured error type for termdash.
 *
 * Only `fatal` errors end the session; everything else is logged and the
 * dashboard keeps sampling.
 */

// ─── Error Codes ───

export enum ErrorCode {
  // Terminal
  TERMINAL_INIT_ERROR = 'TERMINAL_INIT_ERROR',
  RENDER_ERROR = 'RENDER_ERROR',
  INPUT_ERROR = 'INPUT_ERROR',

  // Metrics
  SAMPLE_ERROR = 'SAMPLE_ERROR',

  // Config
  CONFIG_LOAD_ERROR = 'CONFIG_LOAD_ERROR',
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',

  // Generic
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_STATE = 'INVALID_STATE',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface MonitorErrorOptions {
  /** Ends the session: the terminal is restored and the process exits 1 */
  fatal?: boolean;
  context?: Record<string, unknown>;
  cause?: unknown;
}

// ─── MonitorError ───

export class MonitorError extends Error {
  readonly code: ErrorCode;
  readonly fatal: boolean;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options: MonitorErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'MonitorError';
    this.code = code;
    this.fatal = options.fatal ?? false;
    this.context = options.context;
  }

  /** `CODE: message`, followed by the cause chain */
  describe(): string {
    const lines = [`${this.code}: ${this.message}`];
    let cause = this.cause;
    while (cause !== undefined) {
      lines.push(`  caused by: ${cause instanceof Error ? cause.message : String(cause)}`);
      cause = cause instanceof Error ? cause.cause : undefined;
    }
    return lines.join('\n');
  }

  /** Wrap any thrown value; MonitorErrors pass through unchanged. */
  static from(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN_ERROR): MonitorError {
    if (error instanceof MonitorError) return error;
    return new MonitorError(error instanceof Error ? error.message : String(error), code, { cause: error });
  }
}
