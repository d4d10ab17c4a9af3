/**
 * Collaboration Audit - In-Memory Audit Store
 *
 * Keeps the trail in append order with per-document and per-session indexes,
 * so document and session queries only scan their own events. Events are lost
 * on restart and the store is unbounded; hosts that need durability or
 * retention implement AuditStore against their own storage.
 */

import { CollabError } from "../errors";
import {
  type AuditEvent,
  type AuditEventType,
  type AuditQueryParams,
  type AuditStore,
  isValidAuditEvent,
} from "./auditTypes";

function compareEvents(a: AuditEvent, b: AuditEvent): number {
  return a.ts - b.ts || a.seq - b.seq;
}

function inVersionRange(event: AuditEvent, params: AuditQueryParams): boolean {
  if (params.fromVersion === undefined && params.toVersion === undefined) {
    return true;
  }
  if (event.version === undefined) {
    return false;
  }
  return (
    (params.fromVersion === undefined || event.version >= params.fromVersion) &&
    (params.toVersion === undefined || event.version <= params.toVersion)
  );
}

function matches(
  event: AuditEvent,
  params: AuditQueryParams,
  types: ReadonlySet<AuditEventType> | undefined
): boolean {
  return (
    (params.sessionId === undefined || event.sessionId === params.sessionId) &&
    (params.documentId === undefined || event.documentId === params.documentId) &&
    (params.actorId === undefined || event.actorId === params.actorId) &&
    (types === undefined || types.has(event.eventType)) &&
    (params.since === undefined || event.ts >= params.since) &&
    (params.until === undefined || event.ts <= params.until) &&
    inVersionRange(event, params)
  );
}

export class MemoryAuditStore implements AuditStore {
  private events: AuditEvent[] = [];
  private byDocument = new Map<string, AuditEvent[]>();
  private bySession = new Map<string, AuditEvent[]>();

  /**
   * Append a batch. The whole batch is rejected if any event is malformed.
   *
   * @throws CollabError with code INVALID_REQUEST for a malformed event
   */
  async append(events: AuditEvent[]): Promise<void> {
    const invalid = events.findIndex((event) => !isValidAuditEvent(event));
    if (invalid !== -1) {
      throw new CollabError("INVALID_REQUEST", "Malformed audit event", {
        context: { index: invalid, batchSize: events.length },
      });
    }

    for (const event of events) {
      const stored = { ...event };
      this.events.push(stored);
      if (stored.documentId !== undefined) {
        this.index(this.byDocument, stored.documentId, stored);
      }
      if (stored.sessionId !== undefined) {
        this.index(this.bySession, stored.sessionId, stored);
      }
    }
  }

  async query(params: AuditQueryParams): Promise<AuditEvent[]> {
    const types = params.eventTypes ? new Set(params.eventTypes) : undefined;
    const offset = Math.max(params.offset ?? 0, 0);
    const limit = params.limit !== undefined && params.limit > 0 ? params.limit : undefined;

    return this.candidates(params)
      .filter((event) => matches(event, params, types))
      .sort(compareEvents)
      .slice(offset, limit === undefined ? undefined : offset + limit);
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  getAllEvents(): AuditEvent[] {
    return [...this.events];
  }

  clear(): void {
    this.events = [];
    this.byDocument.clear();
    this.bySession.clear();
  }

  getEventCount(): number {
    return this.events.length;
  }

  /** Narrowest index that can hold every match */
  private candidates(params: AuditQueryParams): AuditEvent[] {
    if (params.documentId !== undefined) {
      return this.byDocument.get(params.documentId) ?? [];
    }
    if (params.sessionId !== undefined) {
      return this.bySession.get(params.sessionId) ?? [];
    }
    return this.events;
  }

  private index(map: Map<string, AuditEvent[]>, key: string, event: AuditEvent): void {
    const bucket = map.get(key);
    if (bucket) {
      bucket.push(event);
    } else {
      map.set(key, [event]);
    }
  }
}
