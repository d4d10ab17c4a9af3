import type { CorrelationContext, LogCategory, LogEntry, LogLevel } from "./types";

export type LoggerConfig = {
  minLevel: LogLevel;
  console: boolean;
  handler?: (entry: LogEntry) => void;
  defaultContext?: Partial<CorrelationContext>;
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function formatLogValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value instanceof Error) {
    return value.stack ?? value.message;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function formatLogLine(values: unknown[]): string {
  return values.map(formatLogValue).join(" ");
}

/** Short ids of the session and document an entry belongs to */
function formatContext(context: Partial<CorrelationContext>): string {
  const parts: string[] = [];
  if (context.sessionId) {
    parts.push(`session:${context.sessionId.slice(0, 8)}`);
  }
  if (context.documentId) {
    parts.push(`doc:${context.documentId.slice(0, 8)}`);
  }
  return parts.length > 0 ? ` (${parts.join(" ")})` : "";
}

function writeLine(output: string, stream: "stdout" | "stderr"): void {
  if (typeof process === "undefined") {
    return;
  }
  const target = stream === "stderr" ? process.stderr : process.stdout;
  if (!target) {
    return;
  }
  target.write(`${output}\n`);
}

export class CollabLogger {
  private config: LoggerConfig;
  private context: Partial<CorrelationContext>;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      minLevel: config.minLevel ?? "info",
      console: config.console ?? true,
      handler: config.handler,
      defaultContext: config.defaultContext ?? {},
    };
    this.context = { ...this.config.defaultContext };
  }

  child(ctx: Partial<CorrelationContext>): CollabLogger {
    const c = new CollabLogger(this.config);
    c.context = { ...this.context, ...ctx };
    return c;
  }

  getContext(): Partial<CorrelationContext> {
    return { ...this.context };
  }

  debug(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("debug", cat, msg, data);
  }

  info(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("info", cat, msg, data);
  }

  warn(cat: LogCategory, msg: string, data?: Record<string, unknown>): void {
    this.log("warn", cat, msg, data);
  }

  error(cat: LogCategory, msg: string, err?: Error, data?: Record<string, unknown>): void {
    this.log("error", cat, msg, data, err);
  }

  logDenied(action: string, reason: string, details: Record<string, unknown>): void {
    this.warn("access", `Denied ${action}: ${reason}`, { action, reason, ...details });
  }

  private log(
    lvl: LogLevel,
    cat: LogCategory,
    msg: string,
    data?: Record<string, unknown>,
    err?: Error
  ): void {
    if (LOG_LEVEL_PRIORITY[lvl] < LOG_LEVEL_PRIORITY[this.config.minLevel]) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: lvl,
      category: cat,
      message: msg,
      context: this.context,
      data,
      error: err ? { name: err.name, message: err.message, stack: err.stack } : undefined,
    };
    if (this.config.handler) {
      this.config.handler(entry);
    }
    if (this.config.console) {
      this.consoleLog(entry);
    }
  }

  private consoleLog(e: LogEntry): void {
    const p = `[${e.timestamp}] [${e.level.toUpperCase()}] [${e.category}]`;
    const c = formatContext(e.context);
    const a: unknown[] = [`${p + c} ${e.message}`];
    if (e.data) {
      a.push(e.data);
    }
    if (e.error) {
      a.push(e.error);
    }
    const line = formatLogLine(a);
    const stream = e.level === "warn" || e.level === "error" ? "stderr" : "stdout";
    writeLine(line, stream);
  }
}

let defaultLogger: CollabLogger | null = null;

export function getLogger(): CollabLogger {
  if (!defaultLogger) {
    defaultLogger = new CollabLogger();
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: CollabLogger): void {
  defaultLogger = logger;
}
