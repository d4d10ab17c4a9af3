/**
 * Collaboration Core - Composition Root
 *
 * Builds one EventBus, SessionRegistry and DocumentStore that share a clock,
 * an id generator and a logger. Hosts own the returned instance; there are no
 * module-level singletons.
 */

import { AuditLogger } from "./audit/auditLogger";
import { attachAuditTrail } from "./audit/auditTrail";
import type { AuditStore } from "./audit/auditTypes";
import { type CollabEnvConfig, loadCollabConfigFromEnv } from "./config";
import { EventBus } from "./events/eventBus";
import { CollabLogger, getLogger } from "./observability/logger";
import { SessionRegistry } from "./session/sessionRegistry";
import { DocumentStore } from "./store/documentStore";

export type CollabCoreConfig = {
  logger?: CollabLogger;
  /** Audit destination; no audit trail is recorded when omitted */
  auditStore?: AuditStore;
  auditFlushIntervalMs?: number;
  auditBatchSize?: number;
  lockDocumentsOnSessionClose?: boolean;
  now?: () => number;
  generateId?: () => string;
};

export type CollabCore = {
  bus: EventBus;
  sessions: SessionRegistry;
  documents: DocumentStore;
  logger: CollabLogger;
  auditLogger?: AuditLogger;
  /** Detach the audit trail and flush pending audit events */
  dispose(): Promise<void>;
};

export function createCollabCore(config: CollabCoreConfig = {}): CollabCore {
  const logger = config.logger ?? getLogger();
  const bus = new EventBus({ logger });

  const auditLogger = config.auditStore
    ? new AuditLogger({
        store: config.auditStore,
        flushIntervalMs: config.auditFlushIntervalMs,
        batchSize: config.auditBatchSize,
        logger,
        now: config.now,
      })
    : undefined;
  const sessions = new SessionRegistry({
    bus,
    logger,
    now: config.now,
    generateId: config.generateId,
  });

  const documents = new DocumentStore({
    sessions,
    bus,
    logger,
    auditLogger,
    lockDocumentsOnSessionClose: config.lockDocumentsOnSessionClose,
    now: config.now,
    generateId: config.generateId,
  });

  const detachAudit = auditLogger
    ? attachAuditTrail(bus, auditLogger, {
        resolveSessionId: (documentId) => documents.getSharedDocument(documentId)?.sessionId,
      })
    : () => undefined;

  return {
    bus,
    sessions,
    documents,
    logger,
    auditLogger,
    async dispose() {
      detachAudit();
      await auditLogger?.stop();
    },
  };
}

/**
 * Build a core from environment variables, with `overrides` taking precedence.
 */
export function createCollabCoreFromEnv(
  overrides: CollabCoreConfig = {},
  env?: Record<string, string | undefined>
): CollabCore {
  const envConfig: CollabEnvConfig = loadCollabConfigFromEnv(env);
  return createCollabCore({
    logger: overrides.logger ?? new CollabLogger({ minLevel: envConfig.logLevel }),
    auditFlushIntervalMs: envConfig.auditFlushIntervalMs,
    auditBatchSize: envConfig.auditBatchSize,
    lockDocumentsOnSessionClose: envConfig.lockDocumentsOnSessionClose,
    ...overrides,
  });
}
