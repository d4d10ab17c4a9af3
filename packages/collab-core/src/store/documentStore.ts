/**
 * Collaboration Store - Document Store
 *
 * Registry of shared documents. Each document owns one ReplicatedDocument
 * (content, operation log, annotations) and one AccessControlTable.
 *
 * Every mutation goes through a gate:
 * 1. the document must exist (NOT_FOUND)
 * 2. the caller must hold the required role (ACCESS_DENIED)
 * 3. with `lockDocumentsOnSessionClose`, the document's session must still
 *    be active (SESSION_CLOSED)
 *
 * A rejected attempt changes nothing and publishes nothing. A successful edit
 * bumps the version by exactly one and publishes `documentEdited`.
 */

import { randomUUID } from "node:crypto";
import type { AuditLogger } from "../audit/auditLogger";
import { ReplicatedDocument } from "../document/replicatedDocument";
import { describeOperation } from "../document/editOperation";
import { CollabError, type CollabErrorCode, type MutationResult, fail, succeed } from "../errors";
import type { EventBus } from "../events/eventBus";
import { type CollabLogger, getLogger } from "../observability/logger";
import { AccessControlTable } from "../permissions/accessControlTable";
import type { AccessControlEntry, Role } from "../permissions/types";
import type { SessionRegistry } from "../session/sessionRegistry";
import {
  type AnnotationReply,
  type CollaborationUser,
  type DocumentAnnotation,
  type EditHistoryItem,
  type EditOperation,
  type SharedDocument,
  UNKNOWN_USER_NAME,
} from "../types";

/** Configuration for DocumentStore */
export type DocumentStoreConfig = {
  /** Registry that must have an active session for document creation */
  sessions: SessionRegistry;
  /** Bus that receives DocumentUpdate events */
  bus: EventBus;
  logger?: CollabLogger;
  /** Records denied attempts when set */
  auditLogger?: AuditLogger;
  /** Reject mutations once the document's session has closed (default: false) */
  lockDocumentsOnSessionClose?: boolean;
  now?: () => number;
  generateId?: () => string;
};

type DocumentEntry = {
  document: SharedDocument;
  replica: ReplicatedDocument;
  acl: AccessControlTable;
  /** Carries the session and document ids on every entry it writes */
  logger: CollabLogger;
};

type GateCheck = { entry: DocumentEntry } | { error: CollabErrorCode };

type Denial = {
  action: string;
  documentId: string;
  userId: string;
  error: CollabErrorCode;
  /** Present once the document is known */
  entry?: DocumentEntry;
  role?: Role;
};

export class DocumentStore {
  private readonly sessions: SessionRegistry;
  private readonly bus: EventBus;
  private readonly logger: CollabLogger;
  private readonly auditLogger?: AuditLogger;
  private readonly lockDocumentsOnSessionClose: boolean;
  private readonly now: () => number;
  private readonly generateId: () => string;

  /** Map of documentId -> entry */
  private documents = new Map<string, DocumentEntry>();

  constructor(config: DocumentStoreConfig) {
    this.sessions = config.sessions;
    this.bus = config.bus;
    this.logger = config.logger ?? getLogger();
    this.auditLogger = config.auditLogger;
    this.lockDocumentsOnSessionClose = config.lockDocumentsOnSessionClose ?? false;
    this.now = config.now ?? Date.now;
    this.generateId = config.generateId ?? randomUUID;
  }

  // ============================================================================
  // Creation & Sharing
  // ============================================================================

  /**
   * Create a document in the active session with `creator` as its only owner.
   *
   * @throws CollabError with code NO_ACTIVE_SESSION when no session is active
   */
  createSharedDocument(
    title: string,
    content: string,
    creator: CollaborationUser
  ): SharedDocument {
    const session = this.sessions.getActiveSession();
    if (!session) {
      throw new CollabError(
        "NO_ACTIVE_SESSION",
        "Cannot create a shared document without an active session",
        { context: { title, userId: creator.id } }
      );
    }

    const id = this.generateId();
    const createdAt = this.now();
    const document: SharedDocument = {
      id,
      title,
      sessionId: session.id,
      createdAt,
      createdBy: creator.id,
      lastModifiedAt: createdAt,
      lastModifiedBy: creator.id,
      version: 1,
    };

    this.documents.set(id, {
      document,
      replica: new ReplicatedDocument({
        documentId: id,
        initialContent: content,
        resolveUserName: (userId) => this.sessions.resolveUserName(userId),
      }),
      acl: new AccessControlTable(id, [[creator.id, "owner"]]),
      logger: this.logger.child({ sessionId: session.id, documentId: id }),
    });

    this.logger.info("document", `Document "${title}" created`, {
      documentId: id,
      sessionId: session.id,
      userId: creator.id,
    });

    this.bus.publishDocument({
      type: "documentCreated",
      documentId: id,
      userId: creator.id,
      payload: { title, creatorName: creator.name, sessionId: session.id, version: 1 },
    });

    return { ...document };
  }

  /**
   * Grant `role` to a user, replacing any previous role.
   * @returns false if the document is unknown
   */
  shareDocument(documentId: string, userId: string, role: Role): boolean {
    const entry = this.documents.get(documentId);
    if (!entry) {
      return false;
    }

    const previousRole = entry.acl.grant(userId, role);

    entry.logger.info("access", `Granted ${role}`, { userId, previousRole });

    this.bus.publishDocument({
      type: "documentShared",
      documentId,
      userId,
      payload: {
        title: entry.document.title,
        userName: this.userName(userId),
        role,
        ...(previousRole ? { previousRole } : {}),
      },
    });

    return true;
  }

  /**
   * Grant `role` on behalf of `actorId`, who must own the document.
   * @returns The role now held by `userId`, or the reason for refusal
   */
  tryShareDocument(
    documentId: string,
    actorId: string,
    userId: string,
    role: Role
  ): MutationResult<Role> {
    const check = this.gate("share", documentId, actorId, "owner");
    if ("error" in check) {
      return fail(check.error);
    }

    this.shareDocument(documentId, userId, role);
    return succeed(role);
  }

  hasAccess(userId: string, documentId: string, requiredRole: Role): boolean {
    const entry = this.documents.get(documentId);
    if (!entry) {
      return false;
    }
    return entry.acl.hasAccess(userId, requiredRole);
  }

  hasDocumentAccess(userId: string, documentId: string, requiredRole: Role): boolean {
    return this.hasAccess(userId, documentId, requiredRole);
  }

  // ============================================================================
  // Gated Mutations
  // ============================================================================

  /**
   * Apply an edit on behalf of `userId`, who needs at least editor access.
   * @returns false on any failure, with no state change
   */
  applyEdit(documentId: string, userId: string, operation: EditOperation): boolean {
    return this.tryApplyEdit(documentId, userId, operation).ok;
  }

  /**
   * Same as `applyEdit`, reporting the new version or the reason for refusal.
   */
  tryApplyEdit(
    documentId: string,
    userId: string,
    operation: EditOperation
  ): MutationResult<number> {
    const check = this.gate("edit", documentId, userId, "editor");
    if ("error" in check) {
      return fail(check.error);
    }

    const { document, replica, logger } = check.entry;
    replica.applyOperation(operation);

    document.version += 1;
    document.lastModifiedAt = this.now();
    document.lastModifiedBy = userId;

    logger.debug("document", `Applied ${operation.type}`, {
      userId,
      version: document.version,
    });

    this.bus.publishDocument({
      type: "documentEdited",
      documentId,
      userId,
      payload: {
        title: document.title,
        userName: this.userName(userId),
        operation: { ...operation },
        description: describeOperation(operation),
        version: document.version,
      },
    });

    return succeed(document.version);
  }

  /**
   * Add an annotation on behalf of `userId`, who needs at least viewer access.
   * Annotations do not change the document version.
   */
  addAnnotation(documentId: string, userId: string, annotation: DocumentAnnotation): boolean {
    return this.tryAddAnnotation(documentId, userId, annotation).ok;
  }

  tryAddAnnotation(
    documentId: string,
    userId: string,
    annotation: DocumentAnnotation
  ): MutationResult<string> {
    const check = this.gate("annotate", documentId, userId, "viewer");
    if ("error" in check) {
      return fail(check.error);
    }

    const { document, replica } = check.entry;
    replica.addAnnotation(annotation);

    this.bus.publishDocument({
      type: "annotationAdded",
      documentId,
      userId,
      payload: {
        title: document.title,
        userName: this.userName(userId),
        annotationId: annotation.id,
        annotationType: annotation.type,
        position: annotation.position,
      },
    });

    return succeed(annotation.id);
  }

  /**
   * Append a reply to an annotation. Requires at least viewer access.
   */
  addAnnotationReply(
    documentId: string,
    annotationId: string,
    userId: string,
    reply: AnnotationReply
  ): boolean {
    return this.tryAddAnnotationReply(documentId, annotationId, userId, reply).ok;
  }

  tryAddAnnotationReply(
    documentId: string,
    annotationId: string,
    userId: string,
    reply: AnnotationReply
  ): MutationResult<string> {
    const check = this.gate("reply", documentId, userId, "viewer");
    if ("error" in check) {
      return fail(check.error);
    }

    const { document, replica } = check.entry;
    if (!replica.addReply(annotationId, reply)) {
      return fail("NOT_FOUND");
    }

    this.bus.publishDocument({
      type: "annotationReplied",
      documentId,
      userId,
      payload: {
        title: document.title,
        userName: this.userName(userId),
        annotationId,
        replyId: reply.id,
      },
    });

    return succeed(reply.id);
  }

  // ============================================================================
  // Lookups
  // ============================================================================

  getSharedDocuments(): SharedDocument[] {
    return Array.from(this.documents.values()).map(({ document }) => ({ ...document }));
  }

  getSharedDocument(documentId: string): SharedDocument | undefined {
    const entry = this.documents.get(documentId);
    return entry ? { ...entry.document } : undefined;
  }

  getDocumentContent(documentId: string): string | undefined {
    return this.documents.get(documentId)?.replica.getContent();
  }

  getEditHistory(documentId: string): EditHistoryItem[] {
    return this.documents.get(documentId)?.replica.getHistory() ?? [];
  }

  getAnnotations(documentId: string): DocumentAnnotation[] {
    return this.documents.get(documentId)?.replica.getAnnotations() ?? [];
  }

  getAccessEntries(documentId: string): AccessControlEntry[] {
    return this.documents.get(documentId)?.acl.entries() ?? [];
  }

  getRole(userId: string, documentId: string): Role | undefined {
    return this.documents.get(documentId)?.acl.getRole(userId);
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private gate(action: string, documentId: string, userId: string, requiredRole: Role): GateCheck {
    const entry = this.documents.get(documentId);
    if (!entry) {
      return this.deny({ action, documentId, userId, error: "NOT_FOUND" });
    }

    const denial = { action, documentId, userId, entry, role: entry.acl.getRole(userId) };
    if (!entry.acl.hasAccess(userId, requiredRole)) {
      return this.deny({ ...denial, error: "ACCESS_DENIED" });
    }

    const sessionActive = this.sessions.isSessionActive(entry.document.sessionId);
    if (this.lockDocumentsOnSessionClose && !sessionActive) {
      return this.deny({ ...denial, error: "SESSION_CLOSED" });
    }

    return { entry };
  }

  private deny(denial: Denial): GateCheck {
    const { action, documentId, userId, error, entry, role } = denial;
    const sessionId = entry?.document.sessionId;

    (entry?.logger ?? this.logger).logDenied(action, error, { documentId, userId, role });

    this.auditLogger?.log({
      eventType: "DENIED",
      ...(sessionId ? { sessionId } : {}),
      documentId,
      actorId: userId,
      errorCode: error,
      ...(role ? { role } : {}),
      metadata: { action },
    });

    return { error };
  }

  private userName(userId: string): string {
    return this.sessions.resolveUserName(userId) ?? UNKNOWN_USER_NAME;
  }
}
