/**
 * Audit Log Module
 *
 * Append-only record of every attempt and state transition.
 */

// Types
export type {
  AttemptEvent,
  TransitionEvent,
  CancelEvent,
  ReconciledEvent,
  AuditEvent,
  AuditLog,
} from './types.js';

// Classes & functions
export { SafeAuditLog } from './SafeAuditLog.js';
export { InMemoryAuditLog } from './InMemoryAuditLog.js';
export { FileAuditLog } from './FileAuditLog.js';
export { payloadDigest } from './digest.js';
