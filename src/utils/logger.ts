/**
 * Structured logging for the editor and loader.
 * Entries are always recorded; console output is skipped in production and test runs.
 */

export type LogLevel = "info" | "warn" | "error" | "debug";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  scope: string;
  action: string;
  metadata?: Record<string, unknown>;
}

const NODE_ENV = typeof process !== "undefined" ? process.env.NODE_ENV : undefined;

class FontConfigLogger {
  private entries: LogEntry[] = [];
  private consoleEnabled = NODE_ENV !== "production" && NODE_ENV !== "test";

  info(scope: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("info", scope, action, metadata);
  }

  warn(scope: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("warn", scope, action, metadata);
  }

  error(scope: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("error", scope, action, metadata);
  }

  debug(scope: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("debug", scope, action, metadata);
  }

  /**
   * Toggle mirroring to the console. Entries are recorded either way.
   */
  setConsoleEnabled(enabled: boolean): void {
    this.consoleEnabled = enabled;
  }

  private log(
    level: LogLevel,
    scope: string,
    action: string,
    metadata?: Record<string, unknown>
  ): void {
    this.entries.push({
      timestamp: Date.now(),
      level,
      scope,
      action,
      ...(metadata ? { metadata } : {}),
    });

    if (!this.consoleEnabled) return;

    const message = `[${scope}] ${action}`;
    const logData = metadata ? { ...metadata } : {};

    switch (level) {
      case "info":
        console.log(message, logData);
        break;
      case "warn":
        console.warn(message, logData);
        break;
      case "error":
        console.error(message, logData);
        break;
      case "debug":
        console.debug(message, logData);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

export const logger = new FontConfigLogger();
