import type { AuditEvent, AuditLog } from './types.js';

/**
 * Append-only in-process audit sink, queryable for reconciliation
 */
export class InMemoryAuditLog implements AuditLog {
  private readonly events: AuditEvent[] = [];

  record(event: AuditEvent): void {
    this.events.push(event);
  }

  getEvents(): readonly AuditEvent[] {
    return this.events;
  }

  /**
   * Events for one order, and for its TWAP children when given a parent id
   */
  forOrder(orderId: string): AuditEvent[] {
    return this.events.filter((e) => e.orderId === orderId || e.parentId === orderId);
  }

  clear(): void {
    this.events.length = 0;
  }
}
