/**
 * Collaboration Core - Data Model
 *
 * Plain structured records shared by every module. None of them carry
 * closures or handles, so each can be serialized and sent across a process
 * boundary unchanged. Timestamps are Unix epoch milliseconds.
 */

export type SessionStatus = "active" | "closed";

/** A collaboration session. At most one is active per registry. */
export type CollaborationSession = {
  id: string;
  name: string;
  createdAt: number;
  /** User ID of the initiator */
  createdBy: string;
  status: SessionStatus;
  closedAt?: number;
};

/** Caller-supplied identity. The core performs no authentication. */
export type CollaborationUser = {
  id: string;
  name: string;
  email: string;
  avatarUrl?: string;
};

/** Metadata for a shared document. Content lives in its ReplicatedDocument. */
export type SharedDocument = {
  id: string;
  title: string;
  /** Session that was active when the document was created */
  sessionId: string;
  createdAt: number;
  createdBy: string;
  lastModifiedAt: number;
  lastModifiedBy: string;
  /** Starts at 1, +1 per applied edit */
  version: number;
};

export type EditOperationType = "insert" | "delete" | "replace";

/**
 * A single positional edit. `position` counts characters (grapheme clusters).
 *
 * For `delete` and `replace`, the length of the affected run is the character
 * count of `content`, not of the live text at `position`.
 */
export type EditOperation = {
  type: EditOperationType;
  position: number;
  content: string;
  timestamp: number;
  userId: string;
};

export type EditHistoryItem = {
  operation: EditOperation;
  userName: string;
};

export type AnnotationType = "comment" | "highlight" | "suggestion" | "drawing";

export type AnnotationReply = {
  id: string;
  userId: string;
  createdAt: number;
  content: string;
};

/**
 * An annotation anchored at a fixed offset.
 *
 * `position` is recorded at creation and never shifted by later edits.
 */
export type DocumentAnnotation = {
  id: string;
  userId: string;
  createdAt: number;
  type: AnnotationType;
  position: number;
  content: string;
  replies: AnnotationReply[];
};

export type SharedMessage = {
  id: string;
  userId: string;
  timestamp: number;
  content: string;
  isAI: boolean;
};

/** A chat conversation shared into the active session */
export type SharedConversation = {
  id: string;
  title: string;
  createdAt: number;
  createdBy: string;
  messages: SharedMessage[];
};

export const UNKNOWN_USER_NAME = "Unknown User";

/** Resolves a display name for a user ID, if known */
export type UserNameResolver = (userId: string) => string | undefined;
