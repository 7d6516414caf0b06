/**
 * Logger for vm-ping-enabler
 *
 * Supports human-readable and JSON output modes. Instances are passed
 * explicitly to every component; there is no module-level logger.
 */

import type { PingEnablerError } from '../core/errors.js';

/**
 * Output mode for the logger
 */
export type OutputMode = 'human' | 'json';

/**
 * Destination for log lines. `console` satisfies it.
 */
export interface LogSink {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * JSON output structure for commands
 */
export interface JsonOutput {
  success: boolean;
  command?: string;
  data?: Record<string, unknown>;
  warnings?: string[];
  error?: {
    code: string;
    message: string;
    suggestion?: string;
  };
}

/**
 * Options for constructing a Logger
 */
export interface LoggerOptions {
  /** Emit debug lines (default: false) */
  debug?: boolean;
  /** Where lines go (default: console) */
  sink?: LogSink;
  /** Prefix human lines with an ISO timestamp (default: false) */
  timestamps?: boolean;
}

/**
 * Logger class supporting human-readable and JSON output modes.
 *
 * Human mode outputs text with symbols.
 * JSON mode collects warnings and errors and emits a single JSON object at the end.
 */
export class Logger {
  private mode: OutputMode;
  private readonly debugEnabled: boolean;
  private readonly sink: LogSink;
  private readonly timestamps: boolean;
  private jsonBuffer: JsonOutput;
  private indentLevel: number = 0;

  constructor(mode: OutputMode = 'human', options: LoggerOptions = {}) {
    this.mode = mode;
    this.debugEnabled = options.debug ?? false;
    this.sink = options.sink ?? console;
    this.timestamps = options.timestamps ?? false;
    this.jsonBuffer = { success: true };
  }

  /**
   * Get the current output mode.
   */
  getMode(): OutputMode {
    return this.mode;
  }

  /**
   * Increase indent level for nested output.
   */
  indent(): void {
    this.indentLevel++;
  }

  /**
   * Decrease indent level.
   */
  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private prefix(): string {
    const stamp = this.timestamps ? `${new Date().toISOString()} ` : '';
    return `${stamp}${'  '.repeat(this.indentLevel)}`;
  }

  /**
   * Log a debug message. Dropped unless debug is enabled.
   */
  debug(message: string): void {
    if (this.mode === 'human' && this.debugEnabled) {
      this.sink.log(`${this.prefix()}· ${message}`);
    }
  }

  /**
   * Log a success message.
   */
  success(message: string): void {
    if (this.mode === 'human') {
      this.sink.log(`${this.prefix()}✓ ${message}`);
    }
  }

  /**
   * Log an error message.
   */
  error(message: string, error?: PingEnablerError): void {
    if (this.mode === 'human') {
      this.sink.error(`${this.prefix()}✗ ${message}`);
      if (error?.suggestion) {
        this.sink.error(`${this.prefix()}  Fix: ${error.suggestion}`);
      }
    } else {
      this.jsonBuffer.success = false;
      this.jsonBuffer.error = {
        code: error?.code ?? 'UNKNOWN',
        message,
        suggestion: error?.suggestion,
      };
    }
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    if (this.mode === 'human') {
      this.sink.log(`${this.prefix()}${message}`);
    }
  }

  /**
   * Log a warning message.
   */
  warning(message: string): void {
    if (this.mode === 'human') {
      this.sink.warn(`${this.prefix()}⚠ ${message}`);
    } else {
      (this.jsonBuffer.warnings ??= []).push(message);
    }
  }

  /**
   * Log a table of data.
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      // Calculate column widths
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      this.sink.log(`${this.prefix()}${headerLine.trimEnd()}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        this.sink.log(`${this.prefix()}${rowLine.trimEnd()}`);
      }
    }
  }

  /**
   * Print a blank line.
   */
  newline(): void {
    if (this.mode === 'human') {
      this.sink.log('');
    }
  }

  /**
   * Set the command name for JSON output.
   */
  setCommand(command: string): void {
    this.jsonBuffer.command = command;
  }

  /**
   * Add data to the JSON output (merges with existing data).
   */
  addData(key: string, value: unknown): void {
    this.jsonBuffer.data ??= {};
    this.jsonBuffer.data[key] = value;
  }

  /**
   * Set success status for JSON output.
   */
  setSuccess(success: boolean): void {
    this.jsonBuffer.success = success;
  }

  /**
   * Flush JSON output to the sink.
   *
   * Only does something in JSON mode.
   */
  flush(): void {
    if (this.mode === 'json') {
      this.sink.log(JSON.stringify(this.jsonBuffer, null, 2));
    }
  }

  /**
   * Create a logger from CLI options.
   */
  static fromOptions(options: { json?: boolean; debug?: boolean }): Logger {
    return new Logger(options.json ? 'json' : 'human', {
      debug: options.debug,
      timestamps: !options.json,
    });
  }
}

/**
 * A sink that keeps lines in memory. Used by tests and by callers
 * that want to inspect what a run logged.
 */
export class MemorySink implements LogSink {
  readonly lines: Array<{ stream: 'log' | 'warn' | 'error'; message: string }> = [];

  log(message: string): void {
    this.lines.push({ stream: 'log', message });
  }

  warn(message: string): void {
    this.lines.push({ stream: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ stream: 'error', message });
  }

  messages(stream?: 'log' | 'warn' | 'error'): string[] {
    return this.lines
      .filter((line) => stream === undefined || line.stream === stream)
      .map((line) => line.message);
  }
}
