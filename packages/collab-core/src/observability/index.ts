/**
 * Observability Module
 *
 * Structured logging for the collaboration core.
 */

export * from "./logger";
export * from "./types";
