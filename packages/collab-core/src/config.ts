/**
 * Collaboration Core - Configuration
 *
 * Environment variables:
 * - COLLAB_LOG_LEVEL: debug | info | warn | error (default: info)
 * - COLLAB_LOCK_CLOSED_SESSIONS: "true" | "1" rejects mutations on documents
 *   whose session has closed (default: false)
 * - COLLAB_AUDIT_FLUSH_INTERVAL_MS: audit flush interval (default: 5000)
 * - COLLAB_AUDIT_BATCH_SIZE: audit auto-flush threshold (default: 100)
 *
 * Invalid values fall back to their defaults.
 */

import { z } from "zod";
import type { LogLevel } from "./observability/types";

export type CollabEnvConfig = {
  logLevel: LogLevel;
  lockDocumentsOnSessionClose: boolean;
  auditFlushIntervalMs: number;
  auditBatchSize: number;
};

export const DEFAULT_ENV_CONFIG: Readonly<CollabEnvConfig> = {
  logLevel: "info",
  lockDocumentsOnSessionClose: false,
  auditFlushIntervalMs: 5000,
  auditBatchSize: 100,
};

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const BooleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => value === "true" || value === "1");

const PositiveIntSchema = z.coerce.number().int().positive();

function readOr<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, fallback: T): T {
  if (value === undefined || value === "") {
    return fallback;
  }
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
}

export function loadCollabConfigFromEnv(
  env: Record<string, string | undefined> = typeof process === "undefined" ? {} : process.env
): CollabEnvConfig {
  return {
    logLevel: readOr(LogLevelSchema, env.COLLAB_LOG_LEVEL, DEFAULT_ENV_CONFIG.logLevel),
    lockDocumentsOnSessionClose: readOr(
      BooleanFlagSchema,
      env.COLLAB_LOCK_CLOSED_SESSIONS,
      DEFAULT_ENV_CONFIG.lockDocumentsOnSessionClose
    ),
    auditFlushIntervalMs: readOr(
      PositiveIntSchema,
      env.COLLAB_AUDIT_FLUSH_INTERVAL_MS,
      DEFAULT_ENV_CONFIG.auditFlushIntervalMs
    ),
    auditBatchSize: readOr(
      PositiveIntSchema,
      env.COLLAB_AUDIT_BATCH_SIZE,
      DEFAULT_ENV_CONFIG.auditBatchSize
    ),
  };
}
