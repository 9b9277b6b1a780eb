export const LOG_LEVEL = {
  emergency: 0,
  alert: 1,
  critical: 2,
  error: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7,
} as const;

export type LogLevel = keyof typeof LOG_LEVEL;

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: LogContext;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  /** Fields merged into the context of every entry. */
  bindings?: LogContext;
}

const DEFAULT_LOG_LEVEL: LogLevel = "info";
const UNSERIALIZABLE_PLACEHOLDER = "[Unserializable]";

const LEVEL_METHOD_MAP: Record<
  LogLevel,
  "debug" | "info" | "warn" | "error" | "log"
> = {
  emergency: "error",
  alert: "error",
  critical: "error",
  error: "error",
  warning: "warn",
  notice: "info",
  info: "info",
  debug: "debug",
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && Object.hasOwn(LOG_LEVEL, value);

const safeStringify = (value: unknown): string => {
  try {
    return JSON.stringify(value);
  } catch {
    return UNSERIALIZABLE_PLACEHOLDER;
  }
};

const createDefaultSink = (): LogSink => {
  return (entry: LogEntry): void => {
    const method = LEVEL_METHOD_MAP[entry.level];
    const timestamp = entry.timestamp.toISOString();
    const contextText = entry.context ? ` ${safeStringify(entry.context)}` : "";
    console[method](
      `[${timestamp}] ${entry.level}: ${entry.message}${contextText}`,
    );
  };
};

/**
 * Levelled logger with a replaceable sink.
 * Entries above the configured level are dropped before reaching the sink.
 */
export class Logger {
  private level: LogLevel = DEFAULT_LOG_LEVEL;
  private levelValue: number = LOG_LEVEL[DEFAULT_LOG_LEVEL];
  private sink: LogSink = createDefaultSink();
  private readonly bindings?: LogContext;

  /**
   * @param options level, sink and bindings
   */
  constructor(options: LoggerOptions = {}) {
    if (options.level) {
      this.setLevel(options.level);
    }
    if (options.sink) {
      this.setSink(options.sink);
    }
    this.bindings = options.bindings;
  }

  /**
   * Changes the most verbose level that is still written.
   * @param level new threshold
   */
  setLevel(level: LogLevel): void {
    this.level = level;
    this.levelValue = LOG_LEVEL[level];
  }

  /** Current threshold. */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Replaces where entries are written.
   * @param sink receiver for every entry that passes the level check
   */
  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  /**
   * Returns a logger sharing this one's level and sink whose entries also carry `bindings`.
   */
  child(bindings: LogContext): Logger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  /**
   * Writes an entry when `level` is within the threshold.
   * @param level entry level
   * @param message entry text
   * @param context extra fields, merged over the bindings
   */
  log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL[level] > this.levelValue) {
      return;
    }
    const merged =
      this.bindings || context ? { ...this.bindings, ...context } : undefined;
    this.sink({ level, message, timestamp: new Date(), context: merged });
  }

  /**
   * Logs at `emergency` level.
   * @param message entry text
   * @param context extra fields
   */
  emergency(message: string, context?: LogContext): void {
    this.log("emergency", message, context);
  }

  /**
   * Logs at `alert` level.
   * @param message entry text
   * @param context extra fields
   */
  alert(message: string, context?: LogContext): void {
    this.log("alert", message, context);
  }

  /**
   * Logs at `critical` level.
   * @param message entry text
   * @param context extra fields
   */
  critical(message: string, context?: LogContext): void {
    this.log("critical", message, context);
  }

  /**
   * Logs at `error` level.
   * @param message entry text
   * @param context extra fields
   */
  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  /**
   * Logs at `warning` level.
   * @param message entry text
   * @param context extra fields
   */
  warning(message: string, context?: LogContext): void {
    this.log("warning", message, context);
  }

  /**
   * Logs at `notice` level.
   * @param message entry text
   * @param context extra fields
   */
  notice(message: string, context?: LogContext): void {
    this.log("notice", message, context);
  }

  /**
   * Logs at `info` level.
   * @param message entry text
   * @param context extra fields
   */
  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  /**
   * Logs at `debug` level.
   * @param message entry text
   * @param context extra fields
   */
  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }
}

/**
 * Factory for a `Logger`.
 */
export const createLogger = (options: LoggerOptions = {}): Logger =>
  new Logger(options);
