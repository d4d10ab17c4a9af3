/**
 * Collaboration Store - Document Store Tests
 *
 * Covers the mutation gate (existence, role, session lock), version
 * bookkeeping and the updates published for each mutation.
 */

import * as fc from "fast-check";
import { describe, expect, it } from "vitest";

import { MemoryAuditStore } from "../audit/memoryAuditStore";
import { CollabError } from "../errors";
import type { DocumentUpdate } from "../events/types";
import type { DocumentAnnotation } from "../types";
import { START_TIME, createTestCore, makeUser, op, recordingLogger } from "./testUtils";

const alice = makeUser("Alice");
const bob = makeUser("Bob");
const carol = makeUser("Carol");

function annotation(id: string, userId: string, position: number): DocumentAnnotation {
  return {
    id,
    userId,
    createdAt: START_TIME,
    type: "comment",
    position,
    content: "Needs a source",
    replies: [],
  };
}

/** Core with Alice's session "id-1" and Bob connected */
function setup(overrides: Parameters<typeof createTestCore>[0] = {}) {
  const core = createTestCore(overrides);
  core.sessions.createSession("Design Sync", alice);
  core.sessions.joinSession("id-1", bob);
  const updates: DocumentUpdate[] = [];
  core.bus.subscribeDocument((update) => updates.push(update));
  return { core, updates };
}

describe("DocumentStore", () => {
  describe("createSharedDocument", () => {
    it("throws NO_ACTIVE_SESSION without an active session", () => {
      const core = createTestCore();

      let caught: unknown;
      try {
        core.documents.createSharedDocument("Notes", "", alice);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CollabError);
      expect(caught instanceof CollabError && caught.code).toBe("NO_ACTIVE_SESSION");
      expect(core.documents.getSharedDocuments()).toEqual([]);
    });

    it("starts at version 1 with the creator as sole owner", () => {
      fc.assert(
        fc.property(fc.string(), fc.string(), (title, content) => {
          const { core } = setup();
          const document = core.documents.createSharedDocument(title, content, alice);

          expect(document.version).toBe(1);
          expect(core.documents.getAccessEntries(document.id)).toEqual([
            { documentId: document.id, userId: alice.id, role: "owner" },
          ]);
          expect(core.documents.getDocumentContent(document.id)).toBe(content);
          expect(core.documents.getEditHistory(document.id)).toEqual([]);
        })
      );
    });

    it("records the session and publishes documentCreated", () => {
      const { core, updates } = setup();
      const document = core.documents.createSharedDocument("Roadmap", "Hello", alice);

      expect(document).toEqual({
        id: "id-2",
        title: "Roadmap",
        sessionId: "id-1",
        createdAt: START_TIME,
        createdBy: alice.id,
        lastModifiedAt: START_TIME,
        lastModifiedBy: alice.id,
        version: 1,
      });
      expect(updates).toEqual([
        {
          type: "documentCreated",
          documentId: "id-2",
          userId: alice.id,
          payload: { title: "Roadmap", creatorName: "Alice", sessionId: "id-1", version: 1 },
        },
      ]);
    });
  });

  describe("shareDocument", () => {
    it("upserts roles and reports the previous role", () => {
      const { core, updates } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);

      expect(core.documents.shareDocument(id, bob.id, "viewer")).toBe(true);
      expect(core.documents.shareDocument(id, bob.id, "editor")).toBe(true);

      expect(core.documents.getRole(bob.id, id)).toBe("editor");
      expect(updates.slice(1)).toEqual([
        {
          type: "documentShared",
          documentId: id,
          userId: bob.id,
          payload: { title: "Roadmap", userName: "Bob", role: "viewer" },
        },
        {
          type: "documentShared",
          documentId: id,
          userId: bob.id,
          payload: { title: "Roadmap", userName: "Bob", role: "editor", previousRole: "viewer" },
        },
      ]);
    });

    it("returns false for an unknown document", () => {
      const { core, updates } = setup();
      expect(core.documents.shareDocument("missing", bob.id, "viewer")).toBe(false);
      expect(updates).toEqual([]);
    });
  });

  describe("tryShareDocument", () => {
    it("lets an owner grant roles", () => {
      const { core, updates } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);

      expect(core.documents.tryShareDocument(id, alice.id, bob.id, "editor")).toEqual({
        ok: true,
        value: "editor",
      });
      expect(core.documents.getRole(bob.id, id)).toBe("editor");
      expect(updates.at(-1)?.type).toBe("documentShared");
    });

    it("refuses non-owners, including self-promotion", () => {
      const { core, updates } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);
      core.documents.shareDocument(id, bob.id, "editor");
      const published = updates.length;

      expect(core.documents.tryShareDocument(id, bob.id, bob.id, "owner")).toEqual({
        ok: false,
        error: "ACCESS_DENIED",
      });
      expect(core.documents.tryShareDocument(id, carol.id, carol.id, "viewer")).toEqual({
        ok: false,
        error: "ACCESS_DENIED",
      });

      expect(core.documents.getRole(bob.id, id)).toBe("editor");
      expect(core.documents.getRole(carol.id, id)).toBeUndefined();
      expect(updates).toHaveLength(published);
    });

    it("reports NOT_FOUND for unknown documents", () => {
      const { core } = setup();
      expect(core.documents.tryShareDocument("missing", alice.id, bob.id, "viewer")).toEqual({
        ok: false,
        error: "NOT_FOUND",
      });
    });
  });

  describe("hasAccess", () => {
    it("follows the role order", () => {
      const { core } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);
      core.documents.shareDocument(id, bob.id, "viewer");

      expect(core.documents.hasAccess(alice.id, id, "owner")).toBe(true);
      expect(core.documents.hasDocumentAccess(alice.id, id, "viewer")).toBe(true);
      expect(core.documents.hasAccess(bob.id, id, "viewer")).toBe(true);
      expect(core.documents.hasAccess(bob.id, id, "editor")).toBe(false);
      expect(core.documents.hasAccess(carol.id, id, "viewer")).toBe(false);
      expect(core.documents.hasAccess(alice.id, "missing", "viewer")).toBe(false);
    });
  });

  describe("applyEdit", () => {
    it("applies an owner edit and bumps the version", () => {
      const { core, updates } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);
      core.clock.advance(250);

      const result = core.documents.tryApplyEdit(id, alice.id, op("insert", 5, " World"));

      expect(result).toEqual({ ok: true, value: 2 });
      expect(core.documents.getDocumentContent(id)).toBe("Hello World");
      expect(core.documents.getSharedDocument(id)).toMatchObject({
        version: 2,
        lastModifiedAt: START_TIME + 250,
        lastModifiedBy: alice.id,
      });
      expect(updates[1]).toEqual({
        type: "documentEdited",
        documentId: id,
        userId: alice.id,
        payload: {
          title: "Roadmap",
          userName: "Alice",
          operation: op("insert", 5, " World"),
          description: 'Inserted " World" at position 5',
          version: 2,
        },
      });
    });

    it("refuses viewers without changing anything", () => {
      const { core, updates } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);
      core.documents.shareDocument(id, bob.id, "viewer");
      const publishedBefore = updates.length;

      expect(core.documents.applyEdit(id, bob.id, op("insert", 0, "X", bob.id))).toBe(false);
      expect(core.documents.tryApplyEdit(id, bob.id, op("insert", 0, "X", bob.id))).toEqual({
        ok: false,
        error: "ACCESS_DENIED",
      });

      expect(core.documents.getSharedDocument(id)?.version).toBe(1);
      expect(core.documents.getDocumentContent(id)).toBe("Hello");
      expect(core.documents.getEditHistory(id)).toEqual([]);
      expect(updates).toHaveLength(publishedBefore);
    });

    it("reports NOT_FOUND for unknown documents", () => {
      const { core } = setup();
      expect(core.documents.tryApplyEdit("missing", alice.id, op("insert", 0, "X"))).toEqual({
        ok: false,
        error: "NOT_FOUND",
      });
    });

    it("keeps one history entry per successful edit", () => {
      const { core } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "", alice);
      core.documents.shareDocument(id, bob.id, "editor");

      const attempts = [
        core.documents.applyEdit(id, alice.id, op("insert", 0, "a")),
        core.documents.applyEdit(id, carol.id, op("insert", 0, "c", carol.id)),
        core.documents.applyEdit(id, bob.id, op("insert", 1, "b", bob.id)),
        core.documents.applyEdit("missing", bob.id, op("insert", 0, "x", bob.id)),
      ];

      expect(attempts).toEqual([true, false, true, false]);
      expect(core.documents.getEditHistory(id).map((item) => item.userName)).toEqual([
        "Alice",
        "Bob",
      ]);
      expect(core.documents.getSharedDocument(id)?.version).toBe(3);
      expect(core.documents.getDocumentContent(id)).toBe("ab");
    });

    it("records operation.userId verbatim", () => {
      const { core } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "", alice);

      core.documents.applyEdit(id, alice.id, op("insert", 0, "a", "user-ghost"));

      expect(core.documents.getEditHistory(id)).toEqual([
        { operation: op("insert", 0, "a", "user-ghost"), userName: "Unknown User" },
      ]);
      expect(core.documents.getSharedDocument(id)?.lastModifiedBy).toBe(alice.id);
    });

    it("accepts edits after the session closes by default", () => {
      const { core } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);
      core.sessions.leaveSession(alice);
      core.sessions.leaveSession(bob);

      expect(core.sessions.hasActiveSession()).toBe(false);
      expect(core.documents.applyEdit(id, alice.id, op("insert", 5, "!"))).toBe(true);
      expect(core.documents.getDocumentContent(id)).toBe("Hello!");
    });

    it("refuses mutations on closed sessions when locking is enabled", () => {
      const { core } = setup({ lockDocumentsOnSessionClose: true });
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);
      core.documents.addAnnotation(id, alice.id, annotation("ann-1", alice.id, 0));
      core.sessions.createSession("Next meeting", carol);

      expect(core.documents.tryApplyEdit(id, alice.id, op("insert", 0, "X"))).toEqual({
        ok: false,
        error: "SESSION_CLOSED",
      });
      expect(
        core.documents.tryAddAnnotation(id, alice.id, annotation("ann-2", alice.id, 1))
      ).toEqual({ ok: false, error: "SESSION_CLOSED" });
      expect(
        core.documents.tryAddAnnotationReply(id, "ann-1", alice.id, {
          id: "reply-1",
          userId: alice.id,
          createdAt: START_TIME,
          content: "ok",
        })
      ).toEqual({ ok: false, error: "SESSION_CLOSED" });
      expect(core.documents.getSharedDocument(id)?.version).toBe(1);
    });

    it("checks access before the session lock", () => {
      const { core } = setup({ lockDocumentsOnSessionClose: true });
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);
      core.sessions.leaveSession(alice);
      core.sessions.leaveSession(bob);

      expect(core.documents.tryApplyEdit(id, carol.id, op("insert", 0, "X", carol.id))).toEqual({
        ok: false,
        error: "ACCESS_DENIED",
      });
    });
  });

  describe("annotations", () => {
    it("lets viewers annotate without bumping the version", () => {
      const { core, updates } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello World", alice);
      core.documents.shareDocument(id, bob.id, "viewer");

      expect(core.documents.addAnnotation(id, bob.id, annotation("ann-1", bob.id, 6))).toBe(true);

      expect(core.documents.getSharedDocument(id)?.version).toBe(1);
      expect(updates.at(-1)).toEqual({
        type: "annotationAdded",
        documentId: id,
        userId: bob.id,
        payload: {
          title: "Roadmap",
          userName: "Bob",
          annotationId: "ann-1",
          annotationType: "comment",
          position: 6,
        },
      });
    });

    it("refuses users without a role", () => {
      const { core } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);

      expect(
        core.documents.tryAddAnnotation(id, carol.id, annotation("ann-1", carol.id, 0))
      ).toEqual({ ok: false, error: "ACCESS_DENIED" });
      expect(core.documents.getAnnotations(id)).toEqual([]);
    });

    it("does not move annotations when text is inserted before them", () => {
      const { core } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello World", alice);
      core.documents.addAnnotation(id, alice.id, annotation("ann-1", alice.id, 6));
      core.documents.applyEdit(id, alice.id, op("insert", 0, "Big "));

      expect(core.documents.getAnnotations(id)[0]?.position).toBe(6);
    });

    it("appends replies and reports unknown annotations", () => {
      const { core, updates } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);
      core.documents.shareDocument(id, bob.id, "viewer");
      core.documents.addAnnotation(id, alice.id, annotation("ann-1", alice.id, 0));
      const reply = { id: "reply-1", userId: bob.id, createdAt: START_TIME, content: "Added" };

      expect(core.documents.tryAddAnnotationReply(id, "ann-9", bob.id, reply)).toEqual({
        ok: false,
        error: "NOT_FOUND",
      });
      expect(core.documents.addAnnotationReply(id, "ann-1", bob.id, reply)).toBe(true);

      expect(core.documents.getAnnotations(id)[0]?.replies).toEqual([reply]);
      expect(updates.at(-1)).toEqual({
        type: "annotationReplied",
        documentId: id,
        userId: bob.id,
        payload: { title: "Roadmap", userName: "Bob", annotationId: "ann-1", replyId: "reply-1" },
      });
    });
  });

  describe("lookups", () => {
    it("returns empty results for unknown documents", () => {
      const { core } = setup();

      expect(core.documents.getSharedDocument("missing")).toBeUndefined();
      expect(core.documents.getDocumentContent("missing")).toBeUndefined();
      expect(core.documents.getEditHistory("missing")).toEqual([]);
      expect(core.documents.getAnnotations("missing")).toEqual([]);
      expect(core.documents.getAccessEntries("missing")).toEqual([]);
      expect(core.documents.getRole(alice.id, "missing")).toBeUndefined();
    });

    it("hands out copies of document metadata", () => {
      const { core } = setup();
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);

      const [copy] = core.documents.getSharedDocuments();
      if (copy) {
        copy.version = 42;
      }

      expect(core.documents.getSharedDocument(id)?.version).toBe(1);
    });
  });

  it("tags document log entries with the session and document", () => {
    const { logger, entries } = recordingLogger();
    const { core } = setup({ logger });
    const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);
    core.documents.applyEdit(id, alice.id, op("insert", 0, "X"));
    core.documents.applyEdit(id, carol.id, op("insert", 0, "X", carol.id));

    const applied = entries.find((entry) => entry.message === "Applied insert");
    const denied = entries.find((entry) => entry.message === "Denied edit: ACCESS_DENIED");
    expect(applied?.context).toEqual({ sessionId: "id-1", documentId: id });
    expect(denied?.context).toEqual({ sessionId: "id-1", documentId: id });
  });

  describe("audit of refused attempts", () => {
    it("records DENIED events with the error code", async () => {
      const store = new MemoryAuditStore();
      const { core } = setup({ auditStore: store });
      const { id } = core.documents.createSharedDocument("Roadmap", "Hello", alice);
      core.documents.shareDocument(id, bob.id, "viewer");

      core.documents.applyEdit(id, bob.id, op("insert", 0, "X", bob.id));
      await core.dispose();

      const denied = await store.query({ eventTypes: ["DENIED"] });
      expect(denied).toHaveLength(1);
      expect(denied[0]).toMatchObject({
        eventType: "DENIED",
        sessionId: "id-1",
        documentId: id,
        actorId: bob.id,
        errorCode: "ACCESS_DENIED",
        role: "viewer",
        metadata: { action: "edit" },
      });
    });
  });
});
