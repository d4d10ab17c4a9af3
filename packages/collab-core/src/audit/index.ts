/**
 * Audit Module
 *
 * Exports audit logging types and implementations.
 */

export type {
  AuditEventType,
  AuditEvent,
  AuditEventInput,
  AuditStore,
  AuditQueryParams,
} from "./auditTypes";
export { VALID_AUDIT_EVENT_TYPES, isValidAuditEvent, isValidAuditEventType } from "./auditTypes";
export { AuditLogger, type AuditLoggerConfig } from "./auditLogger";
export { MemoryAuditStore } from "./memoryAuditStore";
export {
  attachAuditTrail,
  documentUpdateToAudit,
  sessionUpdateToAudit,
  type AuditTrailOptions,
} from "./auditTrail";
