/**
 * Steel Errors
 *
 * Standardized error classification for session, extraction and configuration
 * failures. Codes are stable for programmatic handling; context carries the
 * identifiers (url, session id) needed to diagnose a failure.
 */

/**
 * Error codes for loader operations
 */
export type SteelErrorCode =
  // Configuration
  | 'CONFIGURATION_INVALID'
  // Session lifecycle
  | 'SESSION_CREATE_FAILED'
  | 'SESSION_AUTH_FAILED'
  | 'SESSION_QUOTA_EXCEEDED'
  | 'SESSION_CREATE_TIMEOUT'
  | 'SESSION_TEARDOWN_FAILED'
  | 'NO_ACTIVE_SESSION'
  // Remote API
  | 'API_REQUEST_FAILED'
  // Browser attachment
  | 'BROWSER_CONNECT_FAILED'
  // Extraction
  | 'EXTRACTION_FAILED'
  | 'EXTRACTION_TIMEOUT';

/**
 * Extract a meaningful error message from any thrown value.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name || 'Unknown Error';
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object') {
    if ('message' in error && typeof error.message === 'string') return error.message;
    if ('error' in error && typeof error.error === 'string') return error.error;
    try {
      const str = JSON.stringify(error);
      return str !== '{}' ? str : `Unknown error object: ${Object.keys(error).join(', ') || 'empty'}`;
    } catch {
      return `Non-serializable error: ${Object.prototype.toString.call(error)}`;
    }
  }
  return String(error);
}

/**
 * Normalize any thrown value into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(extractErrorMessage(error));
}

/**
 * Base error for the loader.
 *
 * @example
 * ```typescript
 * try {
 *   await manager.acquire();
 * } catch (error) {
 *   if (SteelError.isSteelError(error) && error.code === 'SESSION_AUTH_FAILED') {
 *     console.error('Check STEEL_API_KEY');
 *   }
 * }
 * ```
 */
export class SteelError extends Error {
  /**
   * Error code for programmatic handling
   */
  readonly code: SteelErrorCode;

  /**
   * Original error that caused this error (if any)
   */
  readonly cause?: Error;

  /**
   * Additional context for debugging
   */
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: SteelErrorCode,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'SteelError';
    this.code = code;
    this.cause = cause;
    this.context = context;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a JSON-serializable representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }

  /**
   * Type guard to check if an error is a SteelError
   */
  static isSteelError(error: unknown): error is SteelError {
    return error instanceof SteelError;
  }
}

/**
 * Non-2xx response from the remote session API.
 */
export class SteelApiError extends SteelError {
  constructor(
    readonly status: number,
    readonly body: string,
    operation: string,
  ) {
    super(`${operation} failed with HTTP ${status}${body ? `: ${body}` : ''}`, 'API_REQUEST_FAILED', {
      status,
      operation,
    });
    this.name = 'SteelApiError';
  }

  static isSteelApiError(error: unknown): error is SteelApiError {
    return error instanceof SteelApiError;
  }
}

/**
 * Raised when a remote call exceeds its configured timeout.
 */
export class OperationTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

/**
 * Remote "create session" call failed. The manager holds no session afterwards.
 */
export class SessionCreationError extends SteelError {
  constructor(
    message: string,
    code: SteelErrorCode = 'SESSION_CREATE_FAILED',
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, context, cause);
    this.name = 'SessionCreationError';
  }

  /**
   * Classify an underlying failure (auth, quota, timeout, network).
   */
  static fromCause(error: unknown, context?: Record<string, unknown>): SessionCreationError {
    const cause = toError(error);

    if (error instanceof OperationTimeoutError) {
      return new SessionCreationError(
        `Session creation timed out after ${error.timeoutMs}ms`,
        'SESSION_CREATE_TIMEOUT',
        { timeoutMs: error.timeoutMs, ...context },
        cause,
      );
    }

    if (SteelApiError.isSteelApiError(error)) {
      if (error.status === 401 || error.status === 403) {
        return new SessionCreationError(
          'Session creation rejected: invalid or unauthorized API key',
          'SESSION_AUTH_FAILED',
          { status: error.status, ...context },
          cause,
        );
      }
      if (error.status === 402 || error.status === 429) {
        return new SessionCreationError(
          'Session creation rejected: quota or rate limit exceeded',
          'SESSION_QUOTA_EXCEEDED',
          { status: error.status, ...context },
          cause,
        );
      }
    }

    return new SessionCreationError(
      `Failed to create session: ${cause.message}`,
      'SESSION_CREATE_FAILED',
      context,
      cause,
    );
  }
}

/**
 * Remote "end session" call failed. Non-fatal: reported, never thrown to callers.
 */
export class SessionTeardownError extends SteelError {
  constructor(sessionId: string, cause: Error) {
    super(
      `Failed to release session ${sessionId}: ${cause.message}`,
      'SESSION_TEARDOWN_FAILED',
      { sessionId },
      cause,
    );
    this.name = 'SessionTeardownError';
  }
}

/**
 * Session-scoped call made while no session is held.
 */
export class SessionError extends SteelError {
  constructor(message: string, code: SteelErrorCode, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'SessionError';
  }

  static noActiveSession(): SessionError {
    return new SessionError('No active session', 'NO_ACTIVE_SESSION');
  }
}

/**
 * Could not attach a browser client to the remote session.
 */
export class BrowserConnectionError extends SteelError {
  constructor(sessionId: string, attempts: number, cause: Error) {
    super(
      `Could not connect to session ${sessionId} after ${attempts} attempts: ${cause.message}`,
      'BROWSER_CONNECT_FAILED',
      { sessionId, attempts },
      cause,
    );
    this.name = 'BrowserConnectionError';
  }
}

/**
 * Page load or content extraction failed.
 */
export class ExtractionError extends SteelError {
  constructor(
    message: string,
    readonly url: string,
    readonly sessionId: string | undefined,
    code: SteelErrorCode = 'EXTRACTION_FAILED',
    cause?: Error,
  ) {
    super(message, code, { url, sessionId }, cause);
    this.name = 'ExtractionError';
  }

  static failed(url: string, sessionId: string | undefined, error: unknown): ExtractionError {
    const cause = toError(error);
    return new ExtractionError(
      `Error loading ${url}: ${cause.message}`,
      url,
      sessionId,
      'EXTRACTION_FAILED',
      cause,
    );
  }
}

/**
 * Page load or extraction exceeded the configured timeout.
 */
export class ExtractionTimeoutError extends ExtractionError {
  constructor(url: string, sessionId: string | undefined, readonly timeoutMs: number) {
    super(`Loading ${url} timed out after ${timeoutMs}ms`, url, sessionId, 'EXTRACTION_TIMEOUT');
    this.name = 'ExtractionTimeoutError';
  }
}

/**
 * Invalid or incomplete configuration. Raised at construction time.
 */
export class ConfigurationError extends SteelError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_INVALID', context);
    this.name = 'ConfigurationError';
  }

  static missingApiKey(envVar: string, parameter: string): ConfigurationError {
    return new ConfigurationError(
      `API key must be provided either through the ${parameter} option or the ${envVar} environment variable`,
      { envVar },
    );
  }
}
