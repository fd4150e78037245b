/**
 * Output sink of a {@link Logger}. Defaults to the global console.
 */
export interface LogSink {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /**
   * Print debug and info messages (default: false).
   * Warnings and errors are always printed.
   */
  debug?: boolean;

  /** Where messages go (default: console) */
  sink?: LogSink;
}

/**
 * @description
 * Scoped logger. Every line is prefixed with `[Scope]`, the same way each
 * networking component tags its own output.
 *
 * @example
 * ```ts
 * const logger = new Logger("SyncSession", { debug: true });
 * logger.child("TransferAssembler").warn("Initial packet was lost");
 * // [SyncSession:TransferAssembler] Initial packet was lost
 * ```
 */
export class Logger {
  readonly scope: string;
  private readonly debugEnabled: boolean;
  private readonly sink: LogSink;

  constructor(scope: string, options: LoggerOptions = {}) {
    this.scope = scope;
    this.debugEnabled = options.debug ?? false;
    this.sink = options.sink ?? console;
  }

  /**
   * Creates a logger sharing this one's settings, scoped under it.
   */
  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, {
      debug: this.debugEnabled,
      sink: this.sink,
    });
  }

  debug(message: string): void {
    if (this.debugEnabled) this.sink.log(this.format(message));
  }

  info(message: string): void {
    if (this.debugEnabled) this.sink.log(this.format(message));
  }

  warn(message: string): void {
    this.sink.warn(this.format(message));
  }

  error(message: string): void {
    this.sink.error(this.format(message));
  }

  private format(message: string): string {
    return `[${this.scope}] ${message}`;
  }
}

