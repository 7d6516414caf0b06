/**
 * Error Types for vm-ping-enabler
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all vm-ping-enabler errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_SYNTAX'
  | 'CONFIG_VALIDATION_FAILED'
  | 'CREDENTIAL_UNAVAILABLE'
  | 'TRANSPORT_FAILED'
  | 'AUTH_EXPIRED'
  | 'REMOTE_REJECTED'
  | 'SCHEDULE_INVALID'
  | 'SCHEDULER_RUNNING';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_SYNTAX: 1,
  CONFIG_VALIDATION_FAILED: 1,
  CREDENTIAL_UNAVAILABLE: 2,
  TRANSPORT_FAILED: 2,
  AUTH_EXPIRED: 2,
  REMOTE_REJECTED: 2,
  SCHEDULE_INVALID: 1,
  SCHEDULER_RUNNING: 1,
};

/**
 * Base error class for all vm-ping-enabler errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class PingEnablerError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'PingEnablerError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, PingEnablerError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for configuration-related issues.
 */
export class ConfigError extends PingEnablerError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_SYNTAX' | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * The token slot could not be populated. Fatal for the whole program.
 */
export class CredentialUnavailableError extends PingEnablerError {
  constructor(message: string, public readonly tokenPath?: string) {
    super(
      message,
      'CREDENTIAL_UNAVAILABLE',
      'Check operationsHost and loginData in the login configuration, then run `vm-ping token`.'
    );
    this.name = 'CredentialUnavailableError';
    Object.setPrototypeOf(this, CredentialUnavailableError.prototype);
  }
}

/**
 * Network-level failure talking to the Operations API (DNS, refused
 * connection, timeout), or an authorization failure that survived a refresh.
 */
export class TransportError extends PingEnablerError {
  constructor(
    message: string,
    public readonly url: string,
    code: 'TRANSPORT_FAILED' | 'AUTH_EXPIRED' = 'TRANSPORT_FAILED',
    options?: { cause?: unknown }
  ) {
    super(message, code);
    this.name = 'TransportError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * HTTP 401 from the Operations API: the bearer token has expired.
 */
export class AuthExpiredError extends TransportError {
  public readonly status = 401;

  constructor(url: string) {
    super(`Authorization rejected by ${url} (HTTP 401)`, url, 'AUTH_EXPIRED');
    this.name = 'AuthExpiredError';
    Object.setPrototypeOf(this, AuthExpiredError.prototype);
  }
}

/**
 * Any other non-2xx response from the Operations API.
 */
export class RemoteRejectedError extends PingEnablerError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
    public readonly body: string
  ) {
    super(message, 'REMOTE_REJECTED');
    this.name = 'RemoteRejectedError';
    Object.setPrototypeOf(this, RemoteRejectedError.prototype);
  }
}

/**
 * Error for schedule configuration and scheduler process issues.
 */
export class ScheduleError extends PingEnablerError {
  constructor(
    message: string,
    code: 'SCHEDULE_INVALID' | 'SCHEDULER_RUNNING' = 'SCHEDULE_INVALID',
    suggestion?: string
  ) {
    super(message, code, suggestion);
    this.name = 'ScheduleError';
    Object.setPrototypeOf(this, ScheduleError.prototype);
  }
}

/**
 * Check if an error is a PingEnablerError.
 */
export function isPingEnablerError(error: unknown): error is PingEnablerError {
  return error instanceof PingEnablerError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isPingEnablerError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
