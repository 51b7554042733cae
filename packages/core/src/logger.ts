/**
 * Structured Logging
 * Leveled logger with context objects, pluggable handlers and child loggers.
 *
 * Output format follows LOG_FORMAT: "pretty" (colored, one line per entry,
 * component first) or "json" (one JSON object per line). Production defaults
 * to json.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";

export interface LogContext {
  component?: string;
  sessionId?: string;
  stage?: string;
  namespace?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  /** Set on metric entries only */
  metric?: { name: string; value: number };
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

function defaultFormat(): LogFormat {
  const format = process.env.LOG_FORMAT;
  if (format === "json" || format === "pretty") return format;
  return process.env.NODE_ENV === "production" ? "json" : "pretty";
}

// ============ Handlers ============

const COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};
const RESET = "\x1b[0m";

/**
 * `[time] [LEVEL] component: message {rest of context}`
 */
export const prettyHandler: LogHandler = (entry) => {
  const { component, ...rest } = entry.context ?? {};
  const prefix = `${COLORS[entry.level]}[${entry.timestamp}] [${entry.level.toUpperCase()}]${RESET}`;
  const scope = typeof component === "string" ? `${component}: ` : "";
  const contextStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
  const line = `${prefix} ${scope}${entry.message}${contextStr}`;

  if (!entry.error) {
    (entry.level === "warn" ? console.warn : console.log)(line);
    return;
  }

  const code = entry.error.code ? ` (${entry.error.code})` : "";
  console.error(line);
  console.error(`  ${entry.error.name}${code}: ${entry.error.message}`);
  if (entry.error.stack) {
    console.error(`  ${entry.error.stack.split("\n").slice(1, 4).join("\n  ")}`);
  }
};

export const jsonHandler: LogHandler = (entry) => {
  const line = JSON.stringify(entry);
  (entry.level === "error" ? console.error : console.log)(line);
};

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info";
function consoleHandlerFor(format: LogFormat): LogHandler {
  return format === "json" ? jsonHandler : prettyHandler;
}

let consoleHandler: LogHandler | null = consoleHandlerFor(defaultFormat());
const handlers: LogHandler[] = [];

// ============ Entries ============

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

function createEntry(level: LogLevel, message: string, context?: LogContext, error?: unknown): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  if (error instanceof Error) {
    entry.error = {
      name: error.name,
      message: error.message,
      code: errorCode(error),
      stack: error.stack,
    };
  } else if (error !== undefined) {
    entry.error = { name: "NonError", message: String(error) };
  }

  return entry;
}

function emit(entry: LogEntry): void {
  if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[currentLevel]) {
    return;
  }

  for (const handler of consoleHandler ? [consoleHandler, ...handlers] : handlers) {
    try {
      handler(entry);
    } catch (e) {
      console.error("Logger handler error:", e);
    }
  }
}

// ============ Public API ============

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /** Switch the console handler; a removed console handler stays removed */
  setFormat(format: LogFormat): void {
    if (consoleHandler) consoleHandler = consoleHandlerFor(format);
  },

  addHandler(handler: LogHandler): void {
    handlers.push(handler);
  },

  /**
   * Keep only the console handler, or nothing at all with `keepConsole: false`
   */
  resetHandlers(keepConsole = true): void {
    handlers.length = 0;
    consoleHandler = keepConsole ? consoleHandlerFor(defaultFormat()) : null;
  },

  debug(message: string, context?: LogContext): void {
    emit(createEntry("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    emit(createEntry("info", message, context));
  },

  warn(message: string, context?: LogContext): void {
    emit(createEntry("warn", message, context));
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    emit(createEntry("error", message, context, error));
  },

  child(baseContext: LogContext): ChildLogger {
    return new ChildLogger(baseContext);
  },

  /**
   * Report a counter (credits spent, cache hits). Emitted at info.
   */
  metric(name: string, value: number, context?: LogContext): void {
    const entry = createEntry("info", `METRIC ${name}=${value}`, context);
    entry.metric = { name, value };
    emit(entry);
  },
};

class ChildLogger {
  constructor(private readonly baseContext: LogContext) {}

  debug(message: string, context?: LogContext): void {
    logger.debug(message, { ...this.baseContext, ...context });
  }

  info(message: string, context?: LogContext): void {
    logger.info(message, { ...this.baseContext, ...context });
  }

  warn(message: string, context?: LogContext): void {
    logger.warn(message, { ...this.baseContext, ...context });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    logger.error(message, error, { ...this.baseContext, ...context });
  }

  metric(name: string, value: number, context?: LogContext): void {
    logger.metric(name, value, { ...this.baseContext, ...context });
  }

  child(additionalContext: LogContext): ChildLogger {
    return new ChildLogger({ ...this.baseContext, ...additionalContext });
  }
}

export type { ChildLogger };
