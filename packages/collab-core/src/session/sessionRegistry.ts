/**
 * Collaboration Session - Session Registry
 *
 * Tracks the single active session of this registry instance and its
 * connected participants. Creating a session replaces the active one; the
 * session closes automatically when its last participant leaves.
 *
 * Closing a session does not touch documents created in it. Whether those
 * documents still accept edits is decided by DocumentStore.
 */

import { randomUUID } from "node:crypto";
import type { EventBus } from "../events/eventBus";
import { type CollabLogger, getLogger } from "../observability/logger";
import {
  type CollaborationSession,
  type CollaborationUser,
  type SharedConversation,
  UNKNOWN_USER_NAME,
} from "../types";

/** Configuration for SessionRegistry */
export type SessionRegistryConfig = {
  /** Bus that receives SessionUpdate events */
  bus: EventBus;
  logger?: CollabLogger;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
  /** ID generator (default: randomUUID) */
  generateId?: () => string;
};

export class SessionRegistry {
  private readonly bus: EventBus;
  private readonly logger: CollabLogger;
  /** `logger` scoped to the active session */
  private activeLogger: CollabLogger;
  private readonly now: () => number;
  private readonly generateId: () => string;

  private activeSession: CollaborationSession | null = null;

  /** Connected participants of the active session, in join order */
  private connectedUsers = new Map<string, CollaborationUser>();

  /** Every session created by this registry, including closed ones */
  private sessions = new Map<string, CollaborationSession>();

  /** Every user seen by this registry, for name resolution */
  private knownUsers = new Map<string, CollaborationUser>();

  constructor(config: SessionRegistryConfig) {
    this.bus = config.bus;
    this.logger = config.logger ?? getLogger();
    this.activeLogger = this.logger;
    this.now = config.now ?? Date.now;
    this.generateId = config.generateId ?? randomUUID;
  }

  /**
   * Create a session and make it the active one.
   *
   * An already active session is closed first. The creator becomes the only
   * connected participant.
   */
  createSession(name: string, creator: CollaborationUser): CollaborationSession {
    if (this.activeSession) {
      this.closeActiveSession();
    }

    const session: CollaborationSession = {
      id: this.generateId(),
      name,
      createdAt: this.now(),
      createdBy: creator.id,
      status: "active",
    };

    this.activeSession = session;
    this.sessions.set(session.id, session);
    this.connectedUsers = new Map([[creator.id, creator]]);
    this.rememberUser(creator);

    this.activeLogger = this.logger.child({ sessionId: session.id });
    this.activeLogger.info("session", `Session "${name}" created`, { userId: creator.id });

    this.bus.publishSession({
      type: "sessionCreated",
      sessionId: session.id,
      payload: { name, creatorId: creator.id, creatorName: creator.name },
    });

    return { ...session };
  }

  /**
   * Join the active session.
   *
   * @returns false when `sessionId` is not the active session; true when the
   * user joined or was already connected
   */
  joinSession(sessionId: string, user: CollaborationUser): boolean {
    const session = this.activeSession;
    if (!session || session.id !== sessionId) {
      this.logger.logDenied("join", "no matching active session", {
        sessionId,
        userId: user.id,
      });
      return false;
    }

    if (this.connectedUsers.has(user.id)) {
      return true;
    }

    this.connectedUsers.set(user.id, user);
    this.rememberUser(user);

    this.activeLogger.info("session", `${user.name} joined`, { userId: user.id });

    this.bus.publishSession({
      type: "userJoined",
      sessionId,
      payload: { userId: user.id, userName: user.name },
    });

    return true;
  }

  /**
   * Leave the active session. Unconnected users are ignored.
   * The session closes when nobody is left.
   */
  leaveSession(user: CollaborationUser): void {
    const session = this.activeSession;
    if (!session || !this.connectedUsers.has(user.id)) {
      return;
    }

    this.connectedUsers.delete(user.id);

    this.activeLogger.info("session", `${user.name} left`, { userId: user.id });

    this.bus.publishSession({
      type: "userLeft",
      sessionId: session.id,
      payload: { userId: user.id, userName: user.name, remaining: this.connectedUsers.size },
    });

    if (this.connectedUsers.size === 0) {
      this.closeActiveSession();
    }
  }

  /**
   * Share a conversation with the active session.
   * @returns false when no session is active
   */
  shareConversation(conversation: SharedConversation, userId: string): boolean {
    const session = this.activeSession;
    if (!session) {
      return false;
    }

    this.bus.publishSession({
      type: "conversationShared",
      sessionId: session.id,
      payload: {
        conversationId: conversation.id,
        title: conversation.title,
        userId,
        userName: this.resolveUserName(userId) ?? UNKNOWN_USER_NAME,
        messageCount: conversation.messages.length,
      },
    });

    return true;
  }

  getConnectedUsers(): CollaborationUser[] {
    return Array.from(this.connectedUsers.values()).map((user) => ({ ...user }));
  }

  isConnected(userId: string): boolean {
    return this.connectedUsers.has(userId);
  }

  getActiveSession(): CollaborationSession | undefined {
    return this.activeSession ? { ...this.activeSession } : undefined;
  }

  hasActiveSession(): boolean {
    return this.activeSession !== null;
  }

  isSessionActive(sessionId: string): boolean {
    return this.activeSession?.id === sessionId;
  }

  /**
   * Look up any session created by this registry, active or closed.
   */
  getSession(sessionId: string): CollaborationSession | undefined {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : undefined;
  }

  resolveUserName(userId: string): string | undefined {
    return this.knownUsers.get(userId)?.name;
  }

  private rememberUser(user: CollaborationUser): void {
    this.knownUsers.set(user.id, user);
  }

  private closeActiveSession(): void {
    const session = this.activeSession;
    if (!session) {
      return;
    }

    const closedAt = this.now();
    session.status = "closed";
    session.closedAt = closedAt;

    this.activeSession = null;
    this.connectedUsers = new Map();

    this.activeLogger.info("session", `Session "${session.name}" closed`, { closedAt });
    this.activeLogger = this.logger;

    this.bus.publishSession({
      type: "sessionClosed",
      sessionId: session.id,
      payload: { closedAt },
    });
  }
}
