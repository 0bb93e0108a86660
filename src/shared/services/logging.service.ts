/**
 * Logging Service
 *
 * Structured logging with MCP protocol support.
 * Writes to stderr (stdout carries MCP frames) or forwards entries as
 * notifications/message once an MCP server is attached.
 */

/**
 * Log level type matching MCP specification (RFC 5424)
 */
export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

const LOG_LEVEL_NAMES: readonly LogLevel[] = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
];

/**
 * Narrow an arbitrary string (env var, protocol request) to a LogLevel.
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  logger: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * MCP Notification sender interface
 */
export interface McpNotificationSender {
  sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void>;
}

/**
 * Logging Service
 *
 * Centralized logging service with configurable log levels and MCP protocol support
 */
export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private readonly maxEntries: number;
  private mcpServer: McpNotificationSender | null = null;
  private readonly loggerName: string;

  // Log level hierarchy matching RFC 5424 severity levels
  private static readonly LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    notice: 2,
    warning: 3,
    error: 4,
    critical: 5,
    alert: 6,
    emergency: 7,
  };

  constructor(minLevel: LogLevel = 'info', maxEntries = 1000, loggerName = 'steel-web-loader') {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
    this.loggerName = loggerName;
  }

  /**
   * Set the MCP server for sending log notifications
   */
  setMcpServer(server: McpNotificationSender | null): void {
    this.mcpServer = server;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /**
   * Log a notice message (normal but significant)
   */
  notice(message: string, context?: Record<string, unknown>): void {
    this.log('notice', message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('critical', message, context, error);
  }

  /**
   * Log on behalf of a named component. Used by createLogger().
   */
  logAs(
    logger: string,
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    this.log(level, message, context, error, logger);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    logger: string = this.loggerName,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      logger,
      context,
      error,
    };

    this.logEntries.push(entry);

    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    if (this.mcpServer) {
      void this.sendMcpNotification(this.mcpServer, entry);
    } else {
      this.outputToConsole(entry);
    }
  }

  private async sendMcpNotification(server: McpNotificationSender, entry: LogEntry): Promise<void> {
    try {
      const data: Record<string, unknown> = {
        message: entry.message,
        timestamp: new Date(entry.timestamp).toISOString(),
      };

      if (entry.context && Object.keys(entry.context).length > 0) {
        data.context = entry.context;
      }

      if (entry.error) {
        data.error = {
          message: entry.error.message,
          name: entry.error.name,
          stack: entry.error.stack,
        };
      }

      await server.sendLoggingMessage({
        level: entry.level,
        logger: entry.logger,
        data,
      });
    } catch (error) {
      // Don't use this.log to avoid infinite recursion
      console.error('[LoggingService] Failed to send MCP notification:', error);
      this.outputToConsole(entry);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LoggingService.LOG_LEVELS[level] >= LoggingService.LOG_LEVELS[this.minLevel];
  }

  /**
   * Output log entry to console (stderr)
   */
  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(8);

    let output = `[${timestamp}] ${levelStr} [${entry.logger}] ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  Context: ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  Stack: ${entry.error.stack}`;
      }
    }

    console.error(output);
  }

  /**
   * Get recent log entries
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    let logs = this.logEntries;

    if (minLevel) {
      const minLevelValue = LoggingService.LOG_LEVELS[minLevel];
      logs = logs.filter((entry) => LoggingService.LOG_LEVELS[entry.level] >= minLevelValue);
    }

    return logs.slice(-count);
  }

  clearLogs(): void {
    this.logEntries = [];
  }

  getLoggerName(): string {
    return this.loggerName;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }
}

/**
 * Global logger instance (singleton pattern)
 */
let globalLogger: LoggingService | null = null;

/**
 * Get or create global logger instance
 */
export function getLogger(): LoggingService {
  if (!globalLogger) {
    const envLevel = process.env.LOG_LEVEL;
    globalLogger = new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return globalLogger;
}

/**
 * Set global logger instance
 */
export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}

/**
 * Create a component logger.
 *
 * Resolves the global logger on every call, so level changes and setLogger()
 * apply to loggers created at module load.
 */
export function createLogger(name: string): Logger {
  return {
    debug: (message, context) => getLogger().logAs(name, 'debug', message, context),
    info: (message, context) => getLogger().logAs(name, 'info', message, context),
    notice: (message, context) => getLogger().logAs(name, 'notice', message, context),
    warning: (message, context) => getLogger().logAs(name, 'warning', message, context),
    error: (message, error, context) => getLogger().logAs(name, 'error', message, context, error),
    critical: (message, error, context) =>
      getLogger().logAs(name, 'critical', message, context, error),
  };
}
