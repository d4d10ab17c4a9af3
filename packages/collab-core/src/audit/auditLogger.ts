/**
 * Collaboration Audit - Audit Logger
 *
 * Buffers trail entries and writes them to an AuditStore in batches. `log`
 * stamps each entry with an id, a timestamp and the next trail sequence
 * number, and only appends to a buffer, so it never blocks a mutation.
 * Batches are written one at a time and in sequence order.
 */

import { randomUUID } from "node:crypto";
import { type CollabLogger, getLogger } from "../observability/logger";
import type { AuditEvent, AuditEventInput, AuditStore } from "./auditTypes";

export type AuditLoggerConfig = {
  store: AuditStore;
  /** Flush interval in milliseconds (default: 5000) */
  flushIntervalMs?: number;
  /** Buffered entries that trigger a flush (default: 100) */
  batchSize?: number;
  logger?: CollabLogger;
  now?: () => number;
};

export class AuditLogger {
  private config: Required<AuditLoggerConfig>;
  private buffer: AuditEvent[] = [];
  private nextSeq = 0;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private isStopped = false;

  constructor(config: AuditLoggerConfig) {
    this.config = {
      store: config.store,
      flushIntervalMs: config.flushIntervalMs ?? 5000,
      batchSize: config.batchSize ?? 100,
      logger: config.logger ?? getLogger(),
      now: config.now ?? Date.now,
    };
    this.startFlushTimer();
  }

  log(input: AuditEventInput): void {
    if (this.isStopped) {
      this.config.logger.warn("audit", "Attempted to log after stop", {
        eventType: input.eventType,
        sessionId: input.sessionId,
        documentId: input.documentId,
      });
      return;
    }

    this.buffer.push({
      ...input,
      eventId: randomUUID(),
      seq: this.nextSeq++,
      ts: this.config.now(),
    });

    if (this.buffer.length >= this.config.batchSize) {
      void this.flush();
    }
  }

  /**
   * Write every buffered entry, including entries logged while an earlier
   * batch is still being written. Resolves once the buffer is empty and no
   * write is pending. A failed batch is logged and dropped.
   */
  async flush(): Promise<void> {
    while (this.inFlight || this.buffer.length > 0) {
      if (this.inFlight) {
        await this.inFlight;
        continue;
      }

      const batch = this.buffer;
      this.buffer = [];
      const write = this.writeBatch(batch);
      this.inFlight = write;
      try {
        await write;
      } finally {
        if (this.inFlight === write) {
          this.inFlight = null;
        }
      }
    }
  }

  /**
   * Refuse further entries and drain the buffer.
   */
  async stop(): Promise<void> {
    this.isStopped = true;

    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }

    await this.flush();
  }

  getBufferSize(): number {
    return this.buffer.length;
  }

  /** Entries recorded so far, written or not */
  getLoggedCount(): number {
    return this.nextSeq;
  }

  isRunning(): boolean {
    return !this.isStopped;
  }

  private async writeBatch(batch: AuditEvent[]): Promise<void> {
    try {
      await this.config.store.append(batch);
    } catch (error) {
      this.config.logger.error(
        "audit",
        `Failed to write ${batch.length} events`,
        error instanceof Error ? error : new Error(String(error)),
        { firstSeq: batch[0]?.seq, lastSeq: batch[batch.length - 1]?.seq }
      );
    }
  }

  private startFlushTimer(): void {
    this.flushTimer = setInterval(() => {
      void this.flush();
    }, this.config.flushIntervalMs);

    if (this.flushTimer.unref) {
      this.flushTimer.unref();
    }
  }
}
