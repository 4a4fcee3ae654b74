/**
 * Structured Logging for winmatch
 * Provides contextual logging with level filtering and an in-memory entry log
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export interface LogContext {
  component?: string;
  phase?: string;
  mode?: string;
  predicate?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

export class Logger {
  private entries: LogEntry[] = [];
  private level: LogLevel = "info";
  private context: LogContext = {};
  private timerStack: Map<string, number> = new Map();
  private shouldLog: boolean = true;

  constructor(level: LogLevel = "info", shouldLog: boolean = true) {
    this.level = level;
    this.shouldLog = shouldLog;
  }

  /**
   * Change the minimum level that is recorded
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Current minimum level
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Merge fields into the context attached to subsequent entries
   */
  setContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * Drop every context field
   */
  clearContext(): void {
    this.context = {};
  }

  /**
   * Drop the given context fields
   */
  popContext(keys: (keyof LogContext)[]): void {
    keys.forEach(key => {
      delete this.context[key];
    });
  }

  /**
   * Start a named timer
   */
  startTimer(name: string): void {
    this.timerStack.set(name, Date.now());
  }

  /**
   * End a timer and log its duration
   */
  endTimer(name: string, message: string, level: LogLevel = "debug"): number {
    const start = this.timerStack.get(name);
    if (start === undefined) {
      this.log("warn", `Timer "${name}" not found`);
      return 0;
    }

    const duration = Date.now() - start;
    this.timerStack.delete(name);
    this.log(level, message, { duration });
    return duration;
  }

  /**
   * Log at debug level
   */
  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  /**
   * Log at info level
   */
  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  /**
   * Log at warn level
   */
  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  /**
   * Log at error level
   */
  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  /**
   * Record an entry and print it when console output is on
   */
  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(this.context).length > 0 ? { ...this.context } : undefined,
      data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
    };

    this.entries.push(entry);

    if (this.shouldLog) {
      this.consoleLog(level, this.formatLog(entry, this.buildPrefix(entry)));
    }
  }

  /**
   * Prefix built from the entry context
   */
  private buildPrefix(entry: LogEntry): string {
    if (!entry.context) return "";

    const parts: string[] = [];
    if (entry.context.phase) parts.push(`[${entry.context.phase}]`);
    if (entry.context.component) parts.push(`<${entry.context.component}>`);
    if (entry.context.mode) parts.push(`(${entry.context.mode})`);
    if (entry.context.predicate) parts.push(entry.context.predicate);

    return parts.length > 0 ? parts.join(" ") + ": " : "";
  }

  /**
   * Message line plus formatted data
   */
  private formatLog(entry: LogEntry, prefix: string): string {
    let result = prefix + entry.message;

    if (entry.data) {
      const dataStr = this.formatData(entry.data);
      if (dataStr) {
        result += "\n  " + dataStr;
      }
    }

    return result;
  }

  /**
   * Render data fields on one line
   */
  private formatData(data: Record<string, unknown>): string {
    const parts: string[] = [];

    for (const [key, value] of Object.entries(data)) {
      if (key === "duration" && typeof value === "number") {
        parts.push(`${key}: ${value}ms`);
      } else if (Array.isArray(value)) {
        parts.push(`${key}: [${value.length} items]`);
      } else if (typeof value === "object" && value !== null) {
        parts.push(`${key}: ${JSON.stringify(value)}`);
      } else {
        parts.push(`${key}: ${String(value)}`);
      }
    }

    return parts.join(", ");
  }

  /**
   * Route to the console method for the level
   */
  private consoleLog(level: LogLevel, message: string): void {
    switch (level) {
      case "debug":
        console.debug(message);
        break;
      case "info":
        console.log(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "error":
        console.error(message);
        break;
    }
  }

  /**
   * All recorded entries
   */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Entries logged under a component
   */
  getEntriesForComponent(component: string): LogEntry[] {
    return this.entries.filter(entry => entry.context?.component === component);
  }

  /**
   * Entries at or above a level
   */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    const index = LOG_LEVELS.indexOf(level);
    return this.entries.filter(entry => LOG_LEVELS.indexOf(entry.level) >= index);
  }

  /**
   * Export entries for serialization
   */
  toJSON(): LogEntry[] {
    return this.getEntries();
  }

  /**
   * Drop all recorded entries
   */
  clear(): void {
    this.entries = [];
  }

  /**
   * Count of entries per level
   */
  getSummary(): {
    totalEntries: number;
    debugCount: number;
    infoCount: number;
    warnCount: number;
    errorCount: number;
  } {
    return {
      totalEntries: this.entries.length,
      debugCount: this.entries.filter(e => e.level === "debug").length,
      infoCount: this.entries.filter(e => e.level === "info").length,
      warnCount: this.entries.filter(e => e.level === "warn").length,
      errorCount: this.entries.filter(e => e.level === "error").length,
    };
  }
}

/**
 * Global logger instance
 */
export const globalLogger = new Logger("info", true);
