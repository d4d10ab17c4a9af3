/**
 * Collaboration Protocol - Zod Schemas
 *
 * Runtime validation for request messages arriving from outside the process.
 * Every mutating call of the core has a message form here.
 *
 * @module schemas
 */

import { z } from "zod";

// ============================================================================
// Base Schemas
// ============================================================================

export const RoleSchema = z.enum(["viewer", "editor", "owner"]);

export const UserSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  email: z.string(),
  avatarUrl: z.string().optional(),
});

const TimestampSchema = z.number().int().nonnegative();

/** Positions may be out of range; they are clamped when applied */
export const EditOperationSchema = z.object({
  type: z.enum(["insert", "delete", "replace"]),
  position: z.number().int(),
  content: z.string(),
  timestamp: TimestampSchema,
  userId: z.string().min(1),
});

export const AnnotationReplySchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  createdAt: TimestampSchema,
  content: z.string(),
});

export const DocumentAnnotationSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  createdAt: TimestampSchema,
  type: z.enum(["comment", "highlight", "suggestion", "drawing"]),
  position: z.number().int(),
  content: z.string(),
  replies: z.array(AnnotationReplySchema).default([]),
});

export const SharedMessageSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  timestamp: TimestampSchema,
  content: z.string(),
  isAI: z.boolean(),
});

export const SharedConversationSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  createdAt: TimestampSchema,
  createdBy: z.string().min(1),
  messages: z.array(SharedMessageSchema),
});

// ============================================================================
// Requests
// ============================================================================

const RequestBase = z.object({
  requestId: z.string().optional(),
  ts: TimestampSchema,
});

export const CreateSessionRequestSchema = RequestBase.extend({
  kind: z.literal("session.create"),
  name: z.string().min(1),
  user: UserSchema,
});

export const JoinSessionRequestSchema = RequestBase.extend({
  kind: z.literal("session.join"),
  sessionId: z.string().min(1),
  user: UserSchema,
});

export const LeaveSessionRequestSchema = RequestBase.extend({
  kind: z.literal("session.leave"),
  sessionId: z.string().min(1),
  user: UserSchema,
});

export const ShareConversationRequestSchema = RequestBase.extend({
  kind: z.literal("conversation.share"),
  sessionId: z.string().min(1),
  userId: z.string().min(1),
  conversation: SharedConversationSchema,
});

export const CreateDocumentRequestSchema = RequestBase.extend({
  kind: z.literal("document.create"),
  sessionId: z.string().min(1),
  user: UserSchema,
  title: z.string(),
  content: z.string(),
});

export const ShareDocumentRequestSchema = RequestBase.extend({
  kind: z.literal("document.share"),
  documentId: z.string().min(1),
  /** Owner granting the role */
  actorId: z.string().min(1),
  /** User receiving the role */
  userId: z.string().min(1),
  role: RoleSchema,
});

export const EditDocumentRequestSchema = RequestBase.extend({
  kind: z.literal("document.edit"),
  documentId: z.string().min(1),
  userId: z.string().min(1),
  operation: EditOperationSchema,
});

export const AddAnnotationRequestSchema = RequestBase.extend({
  kind: z.literal("annotation.add"),
  documentId: z.string().min(1),
  userId: z.string().min(1),
  annotation: DocumentAnnotationSchema,
});

export const ReplyAnnotationRequestSchema = RequestBase.extend({
  kind: z.literal("annotation.reply"),
  documentId: z.string().min(1),
  userId: z.string().min(1),
  annotationId: z.string().min(1),
  reply: AnnotationReplySchema,
});

export const CollabRequestSchema = z.discriminatedUnion("kind", [
  CreateSessionRequestSchema,
  JoinSessionRequestSchema,
  LeaveSessionRequestSchema,
  ShareConversationRequestSchema,
  CreateDocumentRequestSchema,
  ShareDocumentRequestSchema,
  EditDocumentRequestSchema,
  AddAnnotationRequestSchema,
  ReplyAnnotationRequestSchema,
]);

/** Request as sent by a client (replies may be omitted) */
export type CollabRequestInput = z.input<typeof CollabRequestSchema>;
export type CollabRequest = z.infer<typeof CollabRequestSchema>;
export type CollabRequestKind = CollabRequest["kind"];
