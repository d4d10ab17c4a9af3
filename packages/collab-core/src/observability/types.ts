/**
 * Collaboration Core - Observability Types
 */

/** Correlation context carried by child loggers */
export type CorrelationContext = {
  sessionId: string;
  documentId: string;
  userId: string;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogCategory = "session" | "document" | "access" | "events" | "audit" | "protocol";

/** Structured log entry */
export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  context: Partial<CorrelationContext>;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
};

export const VALID_LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"] as const;

export function isValidLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && VALID_LOG_LEVELS.includes(value as LogLevel);
}
