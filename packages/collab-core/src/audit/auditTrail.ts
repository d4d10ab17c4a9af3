/**
 * Collaboration Audit - Event Bus Bridge
 *
 * Maps every session and document update to a metadata-only audit event.
 * Document updates are stamped with the session their document belongs to,
 * so a session's trail includes the work done on its documents.
 */

import { characterCount } from "../document/editOperation";
import type { EventBus } from "../events/eventBus";
import type { DocumentUpdate, SessionUpdate } from "../events/types";
import type { AuditLogger } from "./auditLogger";
import type { AuditEventInput } from "./auditTypes";

export function sessionUpdateToAudit(update: SessionUpdate): AuditEventInput {
  switch (update.type) {
    case "sessionCreated":
      return {
        eventType: "SESSION_CREATED",
        sessionId: update.sessionId,
        actorId: update.payload.creatorId,
      };
    case "userJoined":
      return { eventType: "JOIN", sessionId: update.sessionId, actorId: update.payload.userId };
    case "userLeft":
      return { eventType: "LEAVE", sessionId: update.sessionId, actorId: update.payload.userId };
    case "sessionClosed":
      return { eventType: "SESSION_CLOSED", sessionId: update.sessionId, actorId: "system" };
    case "conversationShared":
      return {
        eventType: "CONVERSATION_SHARED",
        sessionId: update.sessionId,
        actorId: update.payload.userId,
        metadata: {
          conversationId: update.payload.conversationId,
          messageCount: update.payload.messageCount,
        },
      };
  }
}

export function documentUpdateToAudit(update: DocumentUpdate): AuditEventInput {
  switch (update.type) {
    case "documentCreated":
      return {
        eventType: "DOCUMENT_CREATED",
        sessionId: update.payload.sessionId,
        documentId: update.documentId,
        actorId: update.userId,
        role: "owner",
        version: update.payload.version,
      };
    case "documentShared":
      return {
        eventType: "SHARE",
        documentId: update.documentId,
        actorId: update.userId,
        role: update.payload.role,
      };
    case "documentEdited":
      return {
        eventType: "EDIT",
        documentId: update.documentId,
        actorId: update.userId,
        version: update.payload.version,
        contentLength: characterCount(update.payload.operation.content),
        metadata: {
          operationType: update.payload.operation.type,
          position: update.payload.operation.position,
        },
      };
    case "annotationAdded":
      return {
        eventType: "ANNOTATE",
        documentId: update.documentId,
        actorId: update.userId,
        metadata: {
          annotationId: update.payload.annotationId,
          annotationType: update.payload.annotationType,
        },
      };
    case "annotationReplied":
      return {
        eventType: "REPLY",
        documentId: update.documentId,
        actorId: update.userId,
        metadata: { annotationId: update.payload.annotationId, replyId: update.payload.replyId },
      };
  }
}

export type AuditTrailOptions = {
  /** Session a document belongs to, for updates that do not carry it */
  resolveSessionId?: (documentId: string) => string | undefined;
};

/**
 * Record every update published on `bus`.
 * @returns Function that detaches the trail
 */
export function attachAuditTrail(
  bus: EventBus,
  auditLogger: AuditLogger,
  options: AuditTrailOptions = {}
): () => void {
  const { resolveSessionId } = options;

  return bus.subscribe((event) => {
    if (event.family === "session") {
      auditLogger.log(sessionUpdateToAudit(event.update));
      return;
    }

    const input = documentUpdateToAudit(event.update);
    const sessionId = input.sessionId ?? resolveSessionId?.(event.update.documentId);
    auditLogger.log(sessionId ? { ...input, sessionId } : input);
  });
}
