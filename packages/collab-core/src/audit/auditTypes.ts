/**
 * Collaboration Audit - Type Definitions
 *
 * Audit events record metadata only, never document or conversation content.
 * Document events carry the document version they produced and the session
 * the document belongs to, so a trail can be read per session, per document
 * or per version range.
 */

import type { CollabErrorCode } from "../errors";
import { VALID_ERROR_CODES } from "../errors";
import { type Role, isValidRole } from "../permissions/types";

/** Types of audit events */
export type AuditEventType =
  | "SESSION_CREATED"
  | "JOIN"
  | "LEAVE"
  | "SESSION_CLOSED"
  | "CONVERSATION_SHARED"
  | "DOCUMENT_CREATED"
  | "SHARE"
  | "EDIT"
  | "ANNOTATE"
  | "REPLY"
  | "DENIED";

/** All valid audit event types */
export const VALID_AUDIT_EVENT_TYPES: readonly AuditEventType[] = [
  "SESSION_CREATED",
  "JOIN",
  "LEAVE",
  "SESSION_CLOSED",
  "CONVERSATION_SHARED",
  "DOCUMENT_CREATED",
  "SHARE",
  "EDIT",
  "ANNOTATE",
  "REPLY",
  "DENIED",
] as const;

/**
 * Audit event record.
 */
export type AuditEvent = {
  /** Unique event identifier (UUID) */
  eventId: string;
  /** Position in the trail of the logger that recorded it, from 0 */
  seq: number;
  /** Unix timestamp in milliseconds */
  ts: number;
  /** User who triggered the event, or "system" for automatic closes */
  actorId: string;
  eventType: AuditEventType;
  sessionId?: string;
  documentId?: string;
  /** Role granted (SHARE) or held by the actor */
  role?: Role;
  /** Document version after DOCUMENT_CREATED or EDIT */
  version?: number;
  /** Error code for DENIED events */
  errorCode?: CollabErrorCode;
  /** Character count of the edit content (never the content itself) */
  contentLength?: number;
  metadata?: Record<string, unknown>;
};

/** Input for creating an audit event (without logger-assigned fields) */
export type AuditEventInput = Omit<AuditEvent, "eventId" | "seq" | "ts">;

/** Parameters for querying audit events */
export type AuditQueryParams = {
  sessionId?: string;
  documentId?: string;
  actorId?: string;
  /** Any of these types; all types when omitted */
  eventTypes?: readonly AuditEventType[];
  /** Lowest document version, inclusive; excludes events without a version */
  fromVersion?: number;
  /** Highest document version, inclusive; excludes events without a version */
  toVersion?: number;
  /** Filter events at or after this timestamp */
  since?: number;
  /** Filter events at or before this timestamp */
  until?: number;
  limit?: number;
  offset?: number;
};

/**
 * Audit store interface.
 *
 * Implementations persist audit events to durable storage.
 */
export interface AuditStore {
  /**
   * Append a batch of events to the audit log.
   */
  append(events: AuditEvent[]): Promise<void>;

  /**
   * Query audit events.
   * @returns Matching events ordered by timestamp, then sequence
   */
  query(params: AuditQueryParams): Promise<AuditEvent[]>;

  close?(): Promise<void>;
}

export function isValidAuditEventType(value: unknown): value is AuditEventType {
  return typeof value === "string" && VALID_AUDIT_EVENT_TYPES.includes(value as AuditEventType);
}

/**
 * Type guard to check if a value is a valid AuditEvent
 */
export function isValidAuditEvent(value: unknown): value is AuditEvent {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  const event = value as Record<string, unknown>;

  const requiredStrings = [event.eventId, event.actorId];
  if (!requiredStrings.every((field) => typeof field === "string" && field.length > 0)) {
    return false;
  }

  if (typeof event.seq !== "number" || !Number.isInteger(event.seq) || event.seq < 0) {
    return false;
  }

  if (typeof event.ts !== "number" || event.ts <= 0) {
    return false;
  }

  if (!isValidAuditEventType(event.eventType)) {
    return false;
  }

  if (event.role !== undefined && !isValidRole(event.role)) {
    return false;
  }

  const optionalStrings = [event.sessionId, event.documentId];
  if (!optionalStrings.every((field) => field === undefined || typeof field === "string")) {
    return false;
  }

  const version = event.version;
  if (version !== undefined && (typeof version !== "number" || version < 1)) {
    return false;
  }

  const contentLength = event.contentLength;
  if (contentLength !== undefined && (typeof contentLength !== "number" || contentLength < 0)) {
    return false;
  }

  const errorCode = event.errorCode;
  if (errorCode !== undefined && !VALID_ERROR_CODES.includes(errorCode as CollabErrorCode)) {
    return false;
  }

  return true;
}
