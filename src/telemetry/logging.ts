/**
 * Auth Logging
 *
 * Structured logging for authentication attempts.
 */

import { SecretString } from "../types/token";

/**
 * Log level.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Log context fields.
 */
export interface AuthLogContext {
  /** Provider identifier */
  provider?: string;
  /** Active user-info variant */
  variant?: string;
  /** Client ID (not secret) */
  clientId?: string;
  /** Requested scope */
  scope?: string;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Error code */
  errorCode?: string;
  /** Error type */
  errorType?: string;
  /** Additional fields */
  [key: string]: unknown;
}

/**
 * Logger interface. The message is the event name (e.g. "token.exchanged").
 */
export interface Logger {
  debug(message: string, context?: AuthLogContext): void;
  info(message: string, context?: AuthLogContext): void;
  warn(message: string, context?: AuthLogContext): void;
  error(message: string, context?: AuthLogContext): void;

  /**
   * Create child logger with additional context.
   */
  child(context: AuthLogContext): Logger;
}

/**
 * No-op logger implementation.
 */
export const noOpLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
  child(): Logger {
    return noOpLogger;
  },
};

/**
 * Log entry for in-memory logger.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: AuthLogContext;
  timestamp: Date;
}

/**
 * In-memory logger for testing.
 *
 * Children share the parent's entry list.
 */
export class InMemoryLogger implements Logger {
  private logs: LogEntry[];
  private baseContext: AuthLogContext;

  constructor(baseContext: AuthLogContext = {}, sink: LogEntry[] = []) {
    this.baseContext = baseContext;
    this.logs = sink;
  }

  private log(level: LogLevel, message: string, context?: AuthLogContext): void {
    this.logs.push({
      level,
      message,
      context: { ...this.baseContext, ...context },
      timestamp: new Date(),
    });
  }

  debug(message: string, context?: AuthLogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: AuthLogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: AuthLogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: AuthLogContext): void {
    this.log("error", message, context);
  }

  child(context: AuthLogContext): Logger {
    return new InMemoryLogger({ ...this.baseContext, ...context }, this.logs);
  }

  /**
   * Get all log entries.
   */
  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  /**
   * Get logs by level.
   */
  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.logs.filter((l) => l.level === level);
  }

  /**
   * Find the first entry for an event.
   */
  find(message: string): LogEntry | undefined {
    return this.logs.find((l) => l.message === message);
  }

  /**
   * Clear all logs.
   */
  clear(): void {
    this.logs.length = 0;
  }
}

/**
 * Context keys whose values are never written out.
 */
export const REDACTED_KEYS: ReadonlySet<string> = new Set([
  "clientSecret",
  "client_secret",
  "app_secret",
  "accessToken",
  "access_token",
  "refreshToken",
  "refresh_token",
  "sessionKey",
  "session_key",
  "code",
  "signature",
  "encryptedData",
  "encrypted_data",
]);

const REDACTED = "[REDACTED]";

/**
 * Drop undefined values and mask secrets. SecretString values are masked
 * whatever their key.
 */
export function redactContext(context: AuthLogContext): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    result[key] = REDACTED_KEYS.has(key) || value instanceof SecretString ? REDACTED : value;
  }
  return result;
}

/**
 * Console logger. Writes one line per event: `[LEVEL] event {fields}`.
 */
export class ConsoleLogger implements Logger {
  private baseContext: AuthLogContext;
  private minLevel: LogLevel;
  private write: (level: LogLevel, line: string) => void;
  private levelOrder: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(options?: {
    minLevel?: LogLevel;
    context?: AuthLogContext;
    write?: (level: LogLevel, line: string) => void;
  }) {
    this.minLevel = options?.minLevel ?? "info";
    this.baseContext = options?.context ?? {};
    this.write = options?.write ?? writeToConsole;
  }

  debug(message: string, context?: AuthLogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: AuthLogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: AuthLogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: AuthLogContext): void {
    this.log("error", message, context);
  }

  child(context: AuthLogContext): Logger {
    return new ConsoleLogger({
      minLevel: this.minLevel,
      context: { ...this.baseContext, ...context },
      write: this.write,
    });
  }

  private log(level: LogLevel, event: string, context?: AuthLogContext): void {
    if (this.levelOrder[level] < this.levelOrder[this.minLevel]) {
      return;
    }
    const fields = redactContext({ ...this.baseContext, ...context });
    const suffix = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
    this.write(level, `[${level.toUpperCase()}] ${event}${suffix}`);
  }
}

function writeToConsole(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else if (level === "info") {
    console.info(line);
  } else {
    console.debug(line);
  }
}
