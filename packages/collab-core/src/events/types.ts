/**
 * Collaboration Events - Type Definitions
 *
 * Two closed event families, each a tagged union keyed by `type`. Payloads
 * are plain data so a transport or persistence bridge can forward them as-is.
 */

import type { Role } from "../permissions/types";
import type { AnnotationType, EditOperation } from "../types";

// ============================================================================
// Session Updates
// ============================================================================

export type SessionCreatedUpdate = {
  type: "sessionCreated";
  sessionId: string;
  payload: { name: string; creatorId: string; creatorName: string };
};

export type UserJoinedUpdate = {
  type: "userJoined";
  sessionId: string;
  payload: { userId: string; userName: string };
};

export type UserLeftUpdate = {
  type: "userLeft";
  sessionId: string;
  payload: { userId: string; userName: string; remaining: number };
};

export type SessionClosedUpdate = {
  type: "sessionClosed";
  sessionId: string;
  payload: { closedAt: number };
};

export type ConversationSharedUpdate = {
  type: "conversationShared";
  sessionId: string;
  payload: {
    conversationId: string;
    title: string;
    userId: string;
    userName: string;
    messageCount: number;
  };
};

export type SessionUpdate =
  | SessionCreatedUpdate
  | UserJoinedUpdate
  | UserLeftUpdate
  | SessionClosedUpdate
  | ConversationSharedUpdate;

export type SessionUpdateType = SessionUpdate["type"];

// ============================================================================
// Document Updates
// ============================================================================

export type DocumentCreatedUpdate = {
  type: "documentCreated";
  documentId: string;
  userId: string;
  payload: { title: string; creatorName: string; sessionId: string; version: number };
};

export type DocumentSharedUpdate = {
  type: "documentShared";
  documentId: string;
  userId: string;
  payload: { title: string; userName: string; role: Role; previousRole?: Role };
};

export type DocumentEditedUpdate = {
  type: "documentEdited";
  documentId: string;
  userId: string;
  payload: {
    title: string;
    userName: string;
    operation: EditOperation;
    description: string;
    version: number;
  };
};

export type AnnotationAddedUpdate = {
  type: "annotationAdded";
  documentId: string;
  userId: string;
  payload: {
    title: string;
    userName: string;
    annotationId: string;
    annotationType: AnnotationType;
    position: number;
  };
};

export type AnnotationRepliedUpdate = {
  type: "annotationReplied";
  documentId: string;
  userId: string;
  payload: { title: string; userName: string; annotationId: string; replyId: string };
};

export type DocumentUpdate =
  | DocumentCreatedUpdate
  | DocumentSharedUpdate
  | DocumentEditedUpdate
  | AnnotationAddedUpdate
  | AnnotationRepliedUpdate;

export type DocumentUpdateType = DocumentUpdate["type"];

// ============================================================================
// Subscribers
// ============================================================================

/** Envelope used by subscribers to both families */
export type CollabEvent =
  | { family: "session"; update: SessionUpdate }
  | { family: "document"; update: DocumentUpdate };

export type SessionUpdateSubscriber = (update: SessionUpdate) => void;
export type DocumentUpdateSubscriber = (update: DocumentUpdate) => void;
export type CollabEventSubscriber = (event: CollabEvent) => void;
