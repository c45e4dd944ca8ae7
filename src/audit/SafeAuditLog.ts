/**
 * Safe Audit Log
 *
 * Wraps any AuditLog so that a failing sink never reaches order processing.
 * Failures (sync throws, rejected promises and those the sink reports
 * later through onFailure) are counted and logged.
 */

import { logger } from '../logger.js';
import { toError } from '../errors.js';
import type { AuditEvent, AuditLog } from './types.js';

export class SafeAuditLog implements AuditLog {
  private readonly sink: AuditLog;
  private failures = 0;

  constructor(sink: AuditLog) {
    this.sink = sink;
    sink.onFailure?.((error) => this.handleFailure(error));
  }

  /**
   * Fire-and-forget: returns immediately, never throws
   */
  record(event: AuditEvent): void {
    try {
      const result = this.sink.record(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.handleFailure(error, event));
      }
    } catch (error) {
      this.handleFailure(error, event);
    }
  }

  /**
   * Number of events the sink failed to record
   */
  get failureCount(): number {
    return this.failures;
  }

  private handleFailure(error: unknown, event?: AuditEvent): void {
    this.failures++;
    logger.warn('Audit log write failed', {
      type: event?.type,
      orderId: event?.orderId,
      failures: this.failures,
      error: toError(error).message,
    });
  }
}
