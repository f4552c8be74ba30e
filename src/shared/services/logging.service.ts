/**
 * Logging Service
 *
 * Levelled logging to stderr, or to the connected tool client as
 * notifications/message when the tool server is running. Stdout stays free
 * for converter output and the stdio transport.
 */

/**
 * RFC 5424 severities, least severe first.
 */
export const LOG_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Anything that can forward a log record to a connected client.
 * The SDK's McpServer.server satisfies this.
 */
export interface NotificationSender {
  sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void>;
}

/**
 * Render a log entry as the stderr line block.
 *
 * ```
 * [2026-01-01T00:00:00.000Z] WARNING  Image not found
 *   Context: {"url":"plate1.png"}
 * ```
 */
export function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  const lines = [`[${timestamp}] ${entry.level.toUpperCase().padEnd(8)} ${entry.message}`];

  if (entry.context && Object.keys(entry.context).length > 0) {
    lines.push(`  Context: ${JSON.stringify(entry.context)}`);
  }
  if (entry.error) {
    lines.push(`  Error: ${entry.error.message}`);
    if (entry.error.stack) {
      lines.push(`  Stack: ${entry.error.stack}`);
    }
  }
  return lines.join('\n');
}

export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private entries: LogEntry[] = [];
  private sender: NotificationSender | null = null;

  constructor(
    minLevel: LogLevel = 'info',
    private readonly maxEntries = 500,
    private readonly loggerName = 'tei-render',
  ) {
    this.minLevel = minLevel;
  }

  /**
   * Route subsequent records to a connected client instead of stderr.
   */
  attachNotificationSender(sender: NotificationSender | null): void {
    this.sender = sender;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  getLoggerName(): string {
    return this.loggerName;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

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
   * Most recent entries, oldest first, optionally filtered by level.
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    const floor = minLevel ? rank(minLevel) : 0;
    return this.entries.filter((entry) => rank(entry.level) >= floor).slice(-count);
  }

  clearLogs(): void {
    this.entries = [];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (rank(level) < rank(this.minLevel)) {
      return;
    }

    const entry: LogEntry = { level, message, timestamp: Date.now(), context, error };
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    if (this.sender) {
      void this.notify(this.sender, entry);
    } else {
      console.error(formatLogEntry(entry));
    }
  }

  private async notify(sender: NotificationSender, entry: LogEntry): Promise<void> {
    const data: Record<string, unknown> = {
      message: entry.message,
      timestamp: new Date(entry.timestamp).toISOString(),
    };
    if (entry.context && Object.keys(entry.context).length > 0) {
      data.context = entry.context;
    }
    if (entry.error) {
      data.error = { name: entry.error.name, message: entry.error.message };
    }

    try {
      await sender.sendLoggingMessage({ level: entry.level, logger: this.loggerName, data });
    } catch (error) {
      // Never re-enter log() from here
      console.error('[LoggingService] Failed to send log notification:', error);
      console.error(formatLogEntry(entry));
    }
  }
}

let globalLogger: LoggingService | null = null;

/**
 * Get or create the process-wide logger. Honors LOG_LEVEL on first use.
 */
export function getLogger(): LoggingService {
  if (!globalLogger) {
    const envLevel = process.env.LOG_LEVEL ?? '';
    globalLogger = new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return globalLogger;
}

export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}
