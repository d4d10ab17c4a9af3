/**
 * Collaboration Document - Replicated Document
 *
 * In-memory replica of one document: content, an append-only operation log,
 * and append-only annotations.
 *
 * Operations are applied strictly in call order. That order is the document's
 * total order, so every edit must pass through one instance (the ordering
 * authority). Two replicas fed the same operations in different orders will
 * diverge; there is no merge.
 *
 * Access checks and version bookkeeping live in DocumentStore.
 */

import {
  type AnnotationReply,
  type DocumentAnnotation,
  type EditHistoryItem,
  type EditOperation,
  UNKNOWN_USER_NAME,
  type UserNameResolver,
} from "../types";
import { applyOperationToContent } from "./editOperation";

export type ReplicatedDocumentConfig = {
  documentId: string;
  initialContent: string;
  /** Resolves user names for history entries */
  resolveUserName?: UserNameResolver;
};

function copyAnnotation(annotation: DocumentAnnotation): DocumentAnnotation {
  return {
    ...annotation,
    replies: annotation.replies.map((reply) => ({ ...reply })),
  };
}

export class ReplicatedDocument {
  readonly documentId: string;

  private content: string;
  private operations: EditOperation[] = [];
  private annotations: DocumentAnnotation[] = [];
  private resolveUserName: UserNameResolver;

  constructor(config: ReplicatedDocumentConfig) {
    this.documentId = config.documentId;
    this.content = config.initialContent;
    this.resolveUserName = config.resolveUserName ?? (() => undefined);
  }

  /**
   * Apply an operation to the content and append it to the log.
   * @returns The content after the operation
   */
  applyOperation(op: EditOperation): string {
    this.content = applyOperationToContent(this.content, op);
    this.operations.push({ ...op });
    return this.content;
  }

  /**
   * Append an annotation. Its position is stored as given and is not moved
   * by later operations.
   */
  addAnnotation(annotation: DocumentAnnotation): void {
    this.annotations.push(copyAnnotation(annotation));
  }

  /**
   * Append a reply to an existing annotation.
   * @returns false if the annotation is unknown
   */
  addReply(annotationId: string, reply: AnnotationReply): boolean {
    const annotation = this.annotations.find((a) => a.id === annotationId);
    if (!annotation) {
      return false;
    }
    annotation.replies.push({ ...reply });
    return true;
  }

  getContent(): string {
    return this.content;
  }

  getHistory(): EditHistoryItem[] {
    return this.operations.map((operation) => ({
      operation: { ...operation },
      userName: this.resolveUserName(operation.userId) ?? UNKNOWN_USER_NAME,
    }));
  }

  getAnnotations(): DocumentAnnotation[] {
    return this.annotations.map(copyAnnotation);
  }

  getAnnotation(annotationId: string): DocumentAnnotation | undefined {
    const annotation = this.annotations.find((a) => a.id === annotationId);
    return annotation ? copyAnnotation(annotation) : undefined;
  }

  getOperationCount(): number {
    return this.operations.length;
  }
}
