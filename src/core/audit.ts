// Audit sink for committed protocol events

import type { AuditEvent, AuditKind, IdentityId } from './types.js';

/** Receives every event after its unit of work has committed */
export interface AuditSink {
  append(event: AuditEvent): void;
}

export class MemoryAuditSink implements AuditSink {
  private events: AuditEvent[] = [];

  append(event: AuditEvent): void {
    this.events.push({ ...event });
  }

  getEvents(): AuditEvent[] {
    return [...this.events];
  }

  getByKind(kind: AuditKind): AuditEvent[] {
    return this.events.filter(e => e.kind === kind);
  }

  getByTarget(target: IdentityId): AuditEvent[] {
    return this.events.filter(e => e.target === target);
  }

  clear(): void {
    this.events = [];
  }

  toJSON(): string {
    return JSON.stringify(this.events, null, 2);
  }
}
