/**
 * Collaboration Protocol - Request Handler
 *
 * Validates plain request messages and dispatches them to the core. Caller
 * mistakes (bad payloads, missing sessions, refused mutations) come back as
 * error responses; the handler does not throw for them.
 */

import { type CollabErrorCode, isCollabError } from "../errors";
import { type CollabLogger, getLogger } from "../observability/logger";
import type { Role } from "../permissions/types";
import type { SessionRegistry } from "../session/sessionRegistry";
import type { DocumentStore } from "../store/documentStore";
import type { CollaborationSession, SharedDocument } from "../types";
import { type CollabRequest, CollabRequestSchema } from "./schemas";

export type CollabRequestResult =
  | { kind: "session.create"; session: CollaborationSession }
  | { kind: "session.join"; sessionId: string }
  | { kind: "session.leave"; sessionId: string }
  | { kind: "conversation.share"; conversationId: string }
  | { kind: "document.create"; document: SharedDocument }
  | { kind: "document.share"; documentId: string; userId: string; role: Role }
  | { kind: "document.edit"; documentId: string; version: number }
  | { kind: "annotation.add"; documentId: string; annotationId: string }
  | { kind: "annotation.reply"; documentId: string; replyId: string };

export type CollabResponseError = {
  code: CollabErrorCode;
  message: string;
  issues?: string[];
};

export type CollabResponse =
  | { ok: true; requestId?: string; result: CollabRequestResult }
  | { ok: false; requestId?: string; error: CollabResponseError };

export type CollabRequestHandlerConfig = {
  sessions: SessionRegistry;
  documents: DocumentStore;
  logger?: CollabLogger;
};

function failure(
  code: CollabErrorCode,
  message: string,
  requestId?: string,
  issues?: string[]
): CollabResponse {
  return { ok: false, requestId, error: { code, message, ...(issues ? { issues } : {}) } };
}

export class CollabRequestHandler {
  private readonly sessions: SessionRegistry;
  private readonly documents: DocumentStore;
  private readonly logger: CollabLogger;

  constructor(config: CollabRequestHandlerConfig) {
    this.sessions = config.sessions;
    this.documents = config.documents;
    this.logger = config.logger ?? getLogger();
  }

  /**
   * Validate and execute one request message.
   */
  handle(raw: unknown): CollabResponse {
    const parsed = CollabRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      );
      this.logger.warn("protocol", "Rejected malformed request", { issues });
      return failure("INVALID_REQUEST", "Malformed request", undefined, issues);
    }

    const request = parsed.data;
    try {
      return this.dispatch(request);
    } catch (error) {
      if (isCollabError(error)) {
        return failure(error.code, error.message, request.requestId);
      }
      throw error;
    }
  }

  private dispatch(request: CollabRequest): CollabResponse {
    const { requestId } = request;
    const ok = (result: CollabRequestResult): CollabResponse => ({ ok: true, requestId, result });

    switch (request.kind) {
      case "session.create": {
        const session = this.sessions.createSession(request.name, request.user);
        return ok({ kind: request.kind, session });
      }

      case "session.join": {
        if (!this.sessions.joinSession(request.sessionId, request.user)) {
          return failure("ACCESS_DENIED", `Session ${request.sessionId} is not active`, requestId);
        }
        return ok({ kind: request.kind, sessionId: request.sessionId });
      }

      case "session.leave": {
        if (!this.sessions.isSessionActive(request.sessionId)) {
          return failure("NOT_FOUND", `Session ${request.sessionId} is not active`, requestId);
        }
        this.sessions.leaveSession(request.user);
        return ok({ kind: request.kind, sessionId: request.sessionId });
      }

      case "conversation.share": {
        if (
          !this.sessions.isSessionActive(request.sessionId) ||
          !this.sessions.shareConversation(request.conversation, request.userId)
        ) {
          return failure(
            "NO_ACTIVE_SESSION",
            `Session ${request.sessionId} is not active`,
            requestId
          );
        }
        return ok({ kind: request.kind, conversationId: request.conversation.id });
      }

      case "document.create": {
        if (!this.sessions.isSessionActive(request.sessionId)) {
          return failure(
            "NO_ACTIVE_SESSION",
            `Session ${request.sessionId} is not active`,
            requestId
          );
        }
        const document = this.documents.createSharedDocument(
          request.title,
          request.content,
          request.user
        );
        return ok({ kind: request.kind, document });
      }

      case "document.share": {
        const result = this.documents.tryShareDocument(
          request.documentId,
          request.actorId,
          request.userId,
          request.role
        );
        if (!result.ok) {
          return failure(result.error, `Share refused: ${result.error}`, requestId);
        }
        return ok({
          kind: request.kind,
          documentId: request.documentId,
          userId: request.userId,
          role: result.value,
        });
      }

      case "document.edit": {
        const result = this.documents.tryApplyEdit(
          request.documentId,
          request.userId,
          request.operation
        );
        if (!result.ok) {
          return failure(result.error, `Edit refused: ${result.error}`, requestId);
        }
        return ok({ kind: request.kind, documentId: request.documentId, version: result.value });
      }

      case "annotation.add": {
        const result = this.documents.tryAddAnnotation(
          request.documentId,
          request.userId,
          request.annotation
        );
        if (!result.ok) {
          return failure(result.error, `Annotation refused: ${result.error}`, requestId);
        }
        return ok({
          kind: request.kind,
          documentId: request.documentId,
          annotationId: result.value,
        });
      }

      case "annotation.reply": {
        const result = this.documents.tryAddAnnotationReply(
          request.documentId,
          request.annotationId,
          request.userId,
          request.reply
        );
        if (!result.ok) {
          return failure(result.error, `Reply refused: ${result.error}`, requestId);
        }
        return ok({ kind: request.kind, documentId: request.documentId, replyId: result.value });
      }
    }
  }
}
