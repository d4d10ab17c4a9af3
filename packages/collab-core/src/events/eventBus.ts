/**
 * Collaboration Events - Event Bus
 *
 * Synchronous publish/subscribe for session and document updates.
 *
 * - Delivery happens inside `publish`, before it returns.
 * - Only subscribers registered when `publish` is called receive the event;
 *   there is no buffering or replay.
 * - A throwing subscriber is logged and does not stop delivery to the rest.
 */

import { type CollabLogger, getLogger } from "../observability/logger";
import type {
  CollabEvent,
  CollabEventSubscriber,
  DocumentUpdate,
  DocumentUpdateSubscriber,
  SessionUpdate,
  SessionUpdateSubscriber,
} from "./types";

export type EventBusConfig = {
  logger?: CollabLogger;
};

export class EventBus {
  private readonly sessionSubscribers = new Set<SessionUpdateSubscriber>();
  private readonly documentSubscribers = new Set<DocumentUpdateSubscriber>();
  private readonly eventSubscribers = new Set<CollabEventSubscriber>();
  private readonly logger: CollabLogger;

  constructor(config: EventBusConfig = {}) {
    this.logger = config.logger ?? getLogger();
  }

  // ============================================================================
  // Subscription API
  // ============================================================================

  subscribeSession(callback: SessionUpdateSubscriber): () => void {
    this.sessionSubscribers.add(callback);
    return () => {
      this.sessionSubscribers.delete(callback);
    };
  }

  subscribeDocument(callback: DocumentUpdateSubscriber): () => void {
    this.documentSubscribers.add(callback);
    return () => {
      this.documentSubscribers.delete(callback);
    };
  }

  /** Subscribe to both families through a single envelope */
  subscribe(callback: CollabEventSubscriber): () => void {
    this.eventSubscribers.add(callback);
    return () => {
      this.eventSubscribers.delete(callback);
    };
  }

  // ============================================================================
  // Publishing
  // ============================================================================

  publishSession(update: SessionUpdate): void {
    this.logger.debug("events", `Session update ${update.type}`, { sessionId: update.sessionId });
    const event: CollabEvent = { family: "session", update };
    const direct = Array.from(this.sessionSubscribers);
    const enveloped = Array.from(this.eventSubscribers);
    this.deliver(direct, update);
    this.deliver(enveloped, event);
  }

  publishDocument(update: DocumentUpdate): void {
    this.logger.debug("events", `Document update ${update.type}`, {
      documentId: update.documentId,
      userId: update.userId,
    });
    const event: CollabEvent = { family: "document", update };
    const direct = Array.from(this.documentSubscribers);
    const enveloped = Array.from(this.eventSubscribers);
    this.deliver(direct, update);
    this.deliver(enveloped, event);
  }

  getSubscriberCount(): number {
    return (
      this.sessionSubscribers.size + this.documentSubscribers.size + this.eventSubscribers.size
    );
  }

  clear(): void {
    this.sessionSubscribers.clear();
    this.documentSubscribers.clear();
    this.eventSubscribers.clear();
  }

  private deliver<T>(subscribers: Array<(value: T) => void>, value: T): void {
    for (const callback of subscribers) {
      try {
        callback(value);
      } catch (error) {
        this.logger.error(
          "events",
          "Subscriber error",
          error instanceof Error ? error : new Error(String(error))
        );
      }
    }
  }
}
